// ─── Types ──────────────────────────────────────────────────────────────────
export type {
  AttachmentKind,
  AttachmentDescriptor,
  JobState,
  FailureKind,
  JobFailure,
  StatusOwner,
  StatusHandle,
  BackendReference,
  UploadResult,
  Job,
  InboxMessage,
} from './types.js';
export { JOB_STATE_ORDER, isTerminal } from './types.js';

// ─── Transports ─────────────────────────────────────────────────────────────
export type {
  SentMessageRef,
  FrontendTransport,
  BackendMessage,
  BackendTransport,
  ContentStore,
  StatusReporter,
  InboxHandler,
} from './transport.js';

// ─── Config ─────────────────────────────────────────────────────────────────
export { configSchema, loadConfig } from './config.js';
export type { RelayConfig } from './config.js';

// ─── Errors ─────────────────────────────────────────────────────────────────
export { RelayError, isRelayError, toRelayError, toFailure, truncate } from './errors.js';

// ─── Database ───────────────────────────────────────────────────────────────
export { relayJobs } from './db/schema.js';
export type { RelayJobRow, NewRelayJobRow } from './db/schema.js';
export { createDatabase } from './db/client.js';
export type { RelayDatabase } from './db/client.js';
export { JobHistory } from './job-history.js';

// ─── Lib ────────────────────────────────────────────────────────────────────
export { statusText, formatSize } from './lib/status-text.js';
export {
  sanitizeFileName,
  synthesizeFileName,
  displayName,
  withStagedFile,
} from './lib/staging.js';

// ─── Envelope ───────────────────────────────────────────────────────────────
export { ENVELOPE_MARKER, encodeEnvelope, decodeEnvelope, isEnvelope } from './envelope.js';
export type { Envelope, DecodeResult } from './envelope.js';

// ─── Relay ──────────────────────────────────────────────────────────────────
export { CorrelationStore, canTransition } from './correlation-store.js';
export type {
  CorrelationStoreOptions,
  CreateJobInput,
  TransitionResult,
  BindResult,
  SweepResult,
} from './correlation-store.js';
export { RoutedStatusReporter } from './status-reporter.js';
export { RelayCoordinator } from './coordinator.js';
export type { CoordinatorOptions } from './coordinator.js';
export { FetchAndRelayWorker } from './worker.js';
export type { WorkerOptions, Scheduler } from './worker.js';
export { RelayEngine } from './relay-engine.js';
export type { RelayEngineOptions } from './relay-engine.js';
