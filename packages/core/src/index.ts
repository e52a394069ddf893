/**
 * @wikibot/core - Stateful MediaWiki API client
 *
 * Sessions, lag-aware reads, continuation-driven lists and a serialized,
 * throttled mutation pipeline.
 */

export const VERSION = '0.1.0';

export * from './api/index.js';
export * from './config/index.js';
export * from './models/index.js';
export * from './wire/index.js';
export * from './transport/index.js';
export * from './session/index.js';
export * from './query/index.js';
export * from './mutation/index.js';
export { StatusChecker } from './status/checker.js';
export * from './site/capabilities.js';
export { systemClock, type Clock } from './utils/clock.js';
export { Mutex } from './utils/mutex.js';
export { createLogger, silentLogger, type Logger, type LogLevel, type LoggerOptions } from './utils/logger.js';
