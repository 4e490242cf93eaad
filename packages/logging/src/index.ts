export {activeRequestScope, runInRequestScope, type RequestLogScope} from './context';
export {
  createStructuredLogger,
  LogLevelSchema,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type StructuredLogger,
  type StructuredLoggerOptions
} from './logger';
export {createRedactor, type MetadataRedactor} from './redaction';
