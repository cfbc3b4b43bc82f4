import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import * as yaml from 'js-yaml';
import { PipelineConfigLoaderService } from './pipeline-config-loader.service.js';
import { ConfigValidationError } from '../../common/errors/index.js';
import { MatchStrategyName, VenueId } from '../../common/types/index.js';

const mockExistsSync = vi.fn<(path: string) => boolean>();
const mockReadFileSync = vi.fn<(path: string, encoding: string) => string>();

vi.mock('fs', () => ({
  existsSync: (...args: [string]) => mockExistsSync(...args),
  readFileSync: (...args: [string, string]) => mockReadFileSync(...args),
}));

const VALID_CONFIG = {
  detection: { minEdgeThreshold: 0.03 },
  scan: { venues: ['polymarket', 'predyx'] },
  fees: [
    { venue: 'polymarket', tradingFeeRate: 0.02, fixedCost: 0.005 },
    { venue: 'predyx', tradingFeeRate: 0.01, fixedCost: 0.0001 },
  ],
};

function mockFsWithContent(content: Record<string, unknown> | null): void {
  mockExistsSync.mockReturnValue(true);
  mockReadFileSync.mockReturnValue(content ? yaml.dump(content) : '');
}

async function createService(
  configOverrides: Record<string, string> = {},
): Promise<PipelineConfigLoaderService> {
  const module: TestingModule = await Test.createTestingModule({
    providers: [
      PipelineConfigLoaderService,
      {
        provide: ConfigService,
        useValue: {
          get: vi.fn((key: string, defaultVal: string) => {
            return configOverrides[key] ?? defaultVal;
          }),
        },
      },
    ],
  }).compile();

  return module.get<PipelineConfigLoaderService>(PipelineConfigLoaderService);
}

async function loadExpectingError(
  service: PipelineConfigLoaderService,
): Promise<ConfigValidationError> {
  try {
    await service.load();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected ConfigValidationError');
}

describe('PipelineConfigLoaderService', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('successful loading', () => {
    it('should load typed fee schedules keyed by venue', async () => {
      mockFsWithContent(VALID_CONFIG);
      const service = await createService();

      const config = await service.load();

      expect(config.fees[VenueId.POLYMARKET]).toEqual({
        venue: VenueId.POLYMARKET,
        tradingFeeRate: 0.02,
        fixedCost: 0.005,
        description: undefined,
      });
      expect(config.fees[VenueId.PREDYX]?.tradingFeeRate).toBe(0.01);
      expect(config.fees[VenueId.KALSHI]).toBeUndefined();
    });

    it('should apply defaults to omitted sections and keep provided overrides', async () => {
      mockFsWithContent(VALID_CONFIG);
      const service = await createService();

      const config = await service.load();

      expect(config.detection.minEdgeThreshold).toBe(0.03);
      expect(config.detection.minMatchConfidence).toBe(0.7);
      expect(config.detection.maxSlippageTolerance).toBe(0.01);
      expect(config.matching.confidenceThreshold).toBe(0.75);
      expect(config.matching.strategyWeights).toEqual({
        [MatchStrategyName.EXACT_TITLE]: 0.3,
        [MatchStrategyName.FUZZY_TITLE]: 0.2,
        [MatchStrategyName.ENTITY_OVERLAP]: 0.2,
        [MatchStrategyName.SEMANTIC_EMBEDDING]: 0.15,
        [MatchStrategyName.RESOLUTION_CRITERIA]: 0.1,
        [MatchStrategyName.TEMPORAL_ALIGNMENT]: 0.05,
      });
      expect(config.depth.depthPercentages).toEqual([0.01, 0.05, 0.1]);
      expect(config.depth.minLevelSize).toBe(10);
      expect(config.scan.maxConsecutiveErrors).toBe(3);
      expect(config.scan.maxIntervalMs).toBe(600000);
    });

    it('should leave the spread monitor off with an empty watch list by default', async () => {
      mockFsWithContent(VALID_CONFIG);
      const service = await createService();

      const config = await service.load();

      expect(config.spreadMonitor).toMatchObject({
        enabled: false,
        historySize: 20,
        compressionThreshold: 0.2,
        expansionThreshold: 0.5,
        cooldownMs: 300000,
        markets: [],
      });
    });

    it('should map spread monitor markets with an optional venue', async () => {
      mockFsWithContent({
        ...VALID_CONFIG,
        spreadMonitor: {
          enabled: true,
          markets: [{ marketId: 'pm-1', venue: 'polymarket' }, { marketId: 'px-1' }],
        },
      });
      const service = await createService();

      const config = await service.load();

      expect(config.spreadMonitor.enabled).toBe(true);
      expect(config.spreadMonitor.markets).toEqual([
        { marketId: 'pm-1', venue: VenueId.POLYMARKET },
        { marketId: 'px-1', venue: null },
      ]);
    });

    it('should read from PIPELINE_CONFIG_PATH when set', async () => {
      mockFsWithContent(VALID_CONFIG);
      const service = await createService({
        PIPELINE_CONFIG_PATH: 'custom/pipeline.yaml',
      });

      await service.load();

      expect(mockExistsSync).toHaveBeenCalledWith(
        expect.stringContaining('custom/pipeline.yaml'),
      );
    });
  });

  describe('file errors', () => {
    it('should throw when the file does not exist', async () => {
      mockExistsSync.mockReturnValue(false);
      const service = await createService();

      const error = await loadExpectingError(service);

      expect(error.message).toContain('Pipeline config file not found');
      expect(error.validationErrors[0]).toMatch(/^File not found: /);
    });

    it('should throw on malformed YAML', async () => {
      mockExistsSync.mockReturnValue(true);
      mockReadFileSync.mockReturnValue(': invalid: yaml: {{{}}}');
      const service = await createService();

      const error = await loadExpectingError(service);

      expect(error.message).toContain('Failed to parse YAML config');
    });

    it('should throw on an empty file', async () => {
      mockFsWithContent(null);
      const service = await createService();

      const error = await loadExpectingError(service);

      expect(error.validationErrors).toEqual([
        'YAML content is empty or not an object',
      ]);
    });
  });

  describe('validation', () => {
    it('should reject negative thresholds', async () => {
      mockFsWithContent({
        ...VALID_CONFIG,
        detection: { minEdgeThreshold: -0.01 },
      });
      const service = await createService();

      const error = await loadExpectingError(service);

      expect(error.validationErrors).toContain(
        'detection.minEdgeThreshold: minEdgeThreshold must not be less than 0',
      );
    });

    it('should reject unknown venue keys in fee schedules', async () => {
      mockFsWithContent({
        ...VALID_CONFIG,
        fees: [
          ...VALID_CONFIG.fees,
          { venue: 'mystery_exchange', tradingFeeRate: 0, fixedCost: 0 },
        ],
      });
      const service = await createService();

      const error = await loadExpectingError(service);

      expect(error.validationErrors).toEqual([
        expect.stringMatching(
          /^fees\[2\]\.venue: venue must be one of the following values/,
        ),
      ]);
    });

    it('should collect every failure instead of stopping at the first', async () => {
      mockFsWithContent({
        ...VALID_CONFIG,
        feasibility: { targetEdge: -1, maxSlippagePerLeg: -1 },
      });
      const service = await createService();

      const error = await loadExpectingError(service);

      expect(error.validationErrors).toHaveLength(2);
      expect(error.message).toBe(
        'Pipeline config validation failed with 2 error(s)',
      );
    });

    it('should reject unknown strategy names', async () => {
      mockFsWithContent({
        ...VALID_CONFIG,
        matching: { strategyWeights: { exact_title: 0.5, vibes: 0.5 } },
      });
      const service = await createService();

      const error = await loadExpectingError(service);

      expect(error.validationErrors).toHaveLength(1);
      expect(error.validationErrors[0]).toMatch(
        /^matching\.strategyWeights\.vibes: unknown strategy/,
      );
    });

    it('should reject duplicate fee schedules', async () => {
      mockFsWithContent({
        ...VALID_CONFIG,
        fees: [...VALID_CONFIG.fees, VALID_CONFIG.fees[0]],
      });
      const service = await createService();

      const error = await loadExpectingError(service);

      expect(error.validationErrors).toEqual([
        'fees[2].venue: duplicate fee schedule for polymarket',
      ]);
    });

    it('should require a fee schedule for every scanned venue', async () => {
      mockFsWithContent({
        ...VALID_CONFIG,
        scan: { venues: ['polymarket', 'predyx', 'kalshi'] },
      });
      const service = await createService();

      const error = await loadExpectingError(service);

      expect(error.validationErrors).toEqual([
        'fees: missing fee schedule for scanned venue kalshi',
      ]);
    });

    it('should reject a backoff cap below the base interval', async () => {
      mockFsWithContent({
        ...VALID_CONFIG,
        scan: {
          venues: ['polymarket', 'predyx'],
          intervalMs: 60000,
          maxIntervalMs: 30000,
        },
      });
      const service = await createService();

      const error = await loadExpectingError(service);

      expect(error.validationErrors).toEqual([
        'scan.maxIntervalMs: must be at least scan.intervalMs (60000)',
      ]);
    });

    it('should reject repeated or too many spread monitor markets', async () => {
      mockFsWithContent({
        ...VALID_CONFIG,
        spreadMonitor: {
          maxMarkets: 1,
          markets: [{ marketId: 'pm-1' }, { marketId: 'pm-1' }],
        },
      });
      const service = await createService();

      const error = await loadExpectingError(service);

      expect(error.validationErrors).toEqual([
        'spreadMonitor.markets: market ids must be distinct',
        'spreadMonitor.markets: at most spreadMonitor.maxMarkets (1) markets',
      ]);
    });
  });
});
