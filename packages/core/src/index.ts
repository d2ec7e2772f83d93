// Types
export type { TaskId, Task, TaskJson, DataResult, CreateResult, Failure } from './types/index.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, createTestDb, getRawDb, closeDb, CREATE_SCHEMA_SQL } from './db.js';
export type { TodoDb } from './db.js';

// Context, clock, logging, configuration
export { createStoreContext } from './context.js';
export type { StoreContext } from './context.js';
export { systemClock, fixedClock } from './clock.js';
export type { Clock, ManualClock } from './clock.js';
export { createLogger, silentLogger, formatLogLine, describeError, errorCode, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel, LogFields } from './logger.js';
export { loadConfig, getDefaultDbPath, ConfigError } from './config.js';
export type { TodoHotelConfig } from './config.js';

// Calendar
export * from './calendar/index.js';

// Validation
export * from './validation/index.js';

// Queries
export * from './queries/index.js';

// Grouping
export * from './grouping/index.js';
