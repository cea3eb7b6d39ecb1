export {
  OutboundRecorder,
  configure,
  enable,
  disable,
  isEnabled,
  setLoggable,
  setMetadata,
  addMetadata,
  clearContext,
  withLogging,
  withConfiguration,
  withIsolatedContext,
  resetForTesting,
} from './api';
export type { ConfigureInput } from './api';
export { bootstrap } from './bootstrap';
export type { BootstrapOptions, BootstrapResult } from './bootstrap';
export { Configuration, REDACTION_MARKER } from './config/configuration';
export type { ConfigurationOptions } from './config/configuration';
export { ConfigManager } from './config/config-manager';
export { RecorderContext } from './context';
export { RecorderError, RecorderConfigError, InfiniteRecursionError } from './core/errors';
export { getLogger, setLogger, fromPino } from './core/logging/logger';
export type { RecorderLogger } from './core/logging/logger';
export { logHttpRequest, flushPendingRecords, pendingRecordCount } from './core/pipeline/log-http-request';
export type {
  BodyTap,
  RecordingOptions,
  RequestCapture,
  RequestDataThunk,
  ResponseCapture,
  ResponseDataFn,
  UnderlyingCall,
} from './core/pipeline/log-http-request';
export type { CapturedBody } from './core/pipeline/stream-tap';
export { addHook, removeHook, clearHooks, getHooks } from './core/pipeline/hooks';
export type { ObservabilityHook } from './core/pipeline/hooks';
export {
  InstrumentationAdapter,
  FetchAdapter,
  UndiciAdapter,
  instrumentFetch,
  instrumentUndiciRequest,
  getAdapter,
  applyAdapters,
  appliedAdapters,
} from './instrumentations';
export { MetricsCollector } from './observability/metrics-collector';
export { StructuredLogHook } from './observability/structured-logger';
export { getSink, setSink, NoopSink, isQueryableSink } from './store/sink';
export type { Sink, QueryableSink } from './store/sink';
export { MemorySink } from './store/memory-sink';
export { NdjsonSink, readNdjsonLogs } from './store/ndjson-sink';
export { PostgresSink } from './store/postgres-sink';
export { FanoutSink } from './store/fanout-sink';
export { createSink } from './store/create-sink';
export type { SinkOptions } from './store/create-sink';
export { matchesQuery, applyQuery, summarizeLogs } from './store/query';
export type { RequestLogQuery, RequestLogSummary } from './store/query';
export type * from './types/schema';
