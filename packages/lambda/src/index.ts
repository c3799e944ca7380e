export { createHandler } from './createHandler.js';
export type { HandlerDependencies, HandlerContext, HandlerResult, ImportHandler } from './createHandler.js';
export { parseTriggerEvent, InvalidTriggerEventError } from './event.js';
export type { ImportTarget, ImportTriggerEvent } from './event.js';
export { loadImportEnv, ConfigError } from './config/env.js';
export type { ImportEnv, LogLevel } from './config/env.js';
export { createLogger } from './logging/logger.js';
export type { CreateLoggerOptions, Logger } from './logging/logger.js';
export { attachLogger } from './logging/attachLogger.js';
export { formatBytes } from './logging/formatBytes.js';
export { S3RangeSource, s3RangeReader } from './aws/S3RangeSource.js';
export type { RangeReader, S3RangeSourceOptions } from './aws/S3RangeSource.js';
export { LambdaContinuationTrigger, lambdaInvoker } from './aws/LambdaContinuationTrigger.js';
export type { AsyncInvoker } from './aws/LambdaContinuationTrigger.js';
