/**
 * Trace module.
 * Append-only record of every attempt, and its on-disk sink.
 */

export { TraceRecorder, TraceOrderError } from './recorder.js';
export type { TraceSink } from './recorder.js';
export { JsonlTraceSink, readTraceFile, TRACE_FILE_NAME } from './jsonlSink.js';
