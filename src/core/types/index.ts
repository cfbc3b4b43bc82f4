export type { ScanCycleResult } from './scan-cycle-result.type.js';
