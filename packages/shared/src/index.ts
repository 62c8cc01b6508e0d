export * from './geometry';
export * from './hd-map';
export { EventBus, type EventMap } from './eventBus';
export { Logger, LogLevel, logger, parseLogLevel, type ScopedLogger } from './logger';
export { QueryProfiler, type OperationTiming } from './performance';
