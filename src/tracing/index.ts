export { TraceStore } from './trace-store.js';
export { initTracingSchema } from './schema.js';
export { TRACE_STATUSES } from './types.js';
export type {
  SessionRecord,
  TraceRecord,
  TraceStatus,
  TraceUsage,
  CreateSessionInput,
  CreateTraceInput,
  FinalizeTraceInput,
  TraceQueryOptions,
} from './types.js';
