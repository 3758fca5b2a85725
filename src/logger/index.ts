export { SERVICE_NAME, createLogger, createComponentLogger, getRootLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
export { AuditDb, AUDIT_EVENT_TYPES, sanitiseDetails } from './audit.js';
export type { AuditEvent, AuditEventType, AuditRow, QueryOptions } from './audit.js';
