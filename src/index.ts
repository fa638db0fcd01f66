export * from './modules/index.js';
export { CameraDiscoveryService } from './service.js';
export type { ServiceOptions } from './service.js';
export { parseConfig, parseConfigText, getDefaultConfig } from './config-parser.js';
export { CamsweepError, classifyError, classifySocketError } from './error-handling.js';
export type { CamsweepErrorType } from './error-handling.js';
export { ScanAuditLog } from './audit/index.js';
export { detectLocalSubnet } from './utils/network.js';
export type * from './types/index.js';
