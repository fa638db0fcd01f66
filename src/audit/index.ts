export { ScanAuditLog } from './logger.js';
