import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import * as fs from 'fs';
import * as yaml from 'js-yaml';
import * as path from 'path';
import {
  ConfigValidationError,
  MARKET_DATA_ERROR_CODES,
  MarketDataError,
} from '../../common/errors/index.js';
import type { IDepthSource, IEventSource } from '../../common/interfaces/index.js';
import { Event, RawPriceLevel, VenueId } from '../../common/types/index.js';
import { flattenValidationErrors, isRecord } from '../../common/utils/index.js';
import { DEFAULT_MARKET_SNAPSHOT_PATH } from '../connector.constants.js';
import {
  MarketSnapshotDto,
  SnapshotEventDto,
  SnapshotOrderBookDto,
} from './dto/market-snapshot.dto.js';

function toEvent(dto: SnapshotEventDto): Event {
  return {
    eventId: dto.eventId,
    sourceIds: { [dto.venue]: dto.marketId ?? dto.eventId },
    title: dto.title,
    entities: [...dto.entities],
    category: dto.category,
    resolutionCriteria: dto.resolutionCriteria,
    resolutionSourceUrl: dto.resolutionSourceUrl ?? null,
    deadline: dto.deadline,
    venue: dto.venue,
    marketType: dto.marketType,
    contractSides: dto.contractSides.map((side) => ({
      sideId: `${dto.eventId}:${side.name}`,
      name: side.name,
      price: side.price,
      impliedProbability: side.price,
      volume24h: side.volume24h ?? null,
      liquidity: side.liquidity ?? null,
    })),
    feeSchedule: dto.feeSchedule
      ? {
          venue: dto.venue,
          tradingFeeRate: dto.feeSchedule.tradingFeeRate,
          fixedCost: dto.feeSchedule.fixedCost,
          description: dto.feeSchedule.description,
        }
      : null,
    totalVolume: dto.totalVolume ?? null,
  };
}

function toPriceLevels(book: SnapshotOrderBookDto): RawPriceLevel[] {
  return [
    ...book.bids.map(
      (level): RawPriceLevel => ({
        price: level.price,
        side: 'BUY',
        size: level.size,
      }),
    ),
    ...book.asks.map(
      (level): RawPriceLevel => ({
        price: level.price,
        side: 'SELL',
        size: level.size,
      }),
    ),
  ];
}

/**
 * Serves listings and order books from a YAML snapshot file.
 * Default binding for both source tokens until live venue connectors
 * are bound in their place.
 */
@Injectable()
export class SnapshotConnector
  implements IEventSource, IDepthSource, OnModuleInit
{
  private readonly logger = new Logger(SnapshotConnector.name);
  private eventsByVenue = new Map<VenueId, Event[]>();
  private levelsByMarket = new Map<string, RawPriceLevel[]>();

  constructor(private readonly configService: ConfigService) {}

  async onModuleInit(): Promise<void> {
    await this.load();
  }

  /**
   * Reads and validates the snapshot, replacing whatever was loaded before.
   * @throws ConfigValidationError listing every problem in the file
   */
  async load(): Promise<void> {
    const snapshotPath = path.resolve(
      process.cwd(),
      this.configService.get<string>(
        'MARKET_SNAPSHOT_PATH',
        DEFAULT_MARKET_SNAPSHOT_PATH,
      ),
    );
    const parsed = this.parseFile(snapshotPath);

    const dto = plainToInstance(MarketSnapshotDto, parsed);
    const errors = flattenValidationErrors(await validate(dto));
    if (errors.length === 0) {
      errors.push(...MarketSnapshotDto.validateCrossFieldRules(dto));
    }
    if (errors.length > 0) {
      throw new ConfigValidationError(
        `Market snapshot validation failed with ${errors.length} error(s)`,
        errors,
      );
    }

    const eventsByVenue = new Map<VenueId, Event[]>();
    for (const eventDto of dto.events) {
      const events = eventsByVenue.get(eventDto.venue) ?? [];
      events.push(toEvent(eventDto));
      eventsByVenue.set(eventDto.venue, events);
    }
    this.eventsByVenue = eventsByVenue;
    this.levelsByMarket = new Map(
      dto.orderBooks.map((book) => [book.marketId, toPriceLevels(book)]),
    );

    this.logger.log({
      message: `Market snapshot loaded from ${snapshotPath}`,
      module: 'connector',
      data: {
        events: dto.events.length,
        orderBooks: dto.orderBooks.length,
        venues: [...eventsByVenue.keys()],
      },
    });
  }

  listEvents(venue: VenueId): Promise<Event[]> {
    return Promise.resolve([...(this.eventsByVenue.get(venue) ?? [])]);
  }

  getPriceLevels(marketId: string): Promise<RawPriceLevel[]> {
    const levels = this.levelsByMarket.get(marketId);
    if (!levels) {
      return Promise.reject(
        new MarketDataError(
          MARKET_DATA_ERROR_CODES.MARKET_NOT_FOUND,
          `No order book in snapshot for market ${marketId}`,
          null,
          marketId,
          'warning',
        ),
      );
    }
    return Promise.resolve(levels.map((level) => ({ ...level })));
  }

  private parseFile(snapshotPath: string): Record<string, unknown> {
    if (!fs.existsSync(snapshotPath)) {
      throw new ConfigValidationError(
        `Market snapshot file not found: ${snapshotPath}`,
        [`File not found: ${snapshotPath}`],
      );
    }

    let result: unknown;
    try {
      result = yaml.load(fs.readFileSync(snapshotPath, 'utf-8'));
    } catch (error) {
      const message =
        error instanceof Error ? error.message : 'Unknown YAML parse error';
      throw new ConfigValidationError(
        `Failed to parse market snapshot at ${snapshotPath}: ${message}`,
        [message],
      );
    }
    if (!isRecord(result)) {
      throw new ConfigValidationError(
        `Failed to parse market snapshot at ${snapshotPath}: file is empty or does not contain a valid object`,
        ['YAML content is empty or not an object'],
      );
    }
    return result;
  }
}
