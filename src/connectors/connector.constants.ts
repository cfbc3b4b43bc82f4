export const EVENT_SOURCE_TOKEN = 'IEventSource';
export const DEPTH_SOURCE_TOKEN = 'IDepthSource';

export const DEFAULT_MARKET_SNAPSHOT_PATH = 'config/market-snapshot.yaml';
