// Public API: embed a DriftMonitor in an agent process.

export { DriftMonitor } from './services/monitor.js';
export type {
  DriftCallback,
  DriftMonitorOptions,
  RecentIncidentOptions,
  TrackOptions,
} from './services/monitor.js';

export { EventStore } from './services/event-store.js';
export { BaselineCalibrator, findCommonSequences, mean, populationStd } from './services/calibrator.js';
export type { CalibratorOptions } from './services/calibrator.js';
export {
  AlertDispatcher,
  webhookFlavor,
  slackPayload,
  discordPayload,
  genericPayload,
} from './services/alert-dispatcher.js';
export type { AlertDispatcherOptions, FetchFunction, WebhookFlavor } from './services/alert-dispatcher.js';
export {
  loadConfig,
  parseConfig,
  resolveAlertSettings,
  resolveMonitorOptions,
  resolveWebhookUrl,
} from './services/config-service.js';
export type { AlertSettings, DriftwatchConfig, MonitorSettings } from './services/config-service.js';
export { exportRecords } from './services/export-service.js';
export { parseRecords, replayRecords, validateRecords } from './services/ingest-service.js';

export {
  ActionLoopDetector,
  BaseDetector,
  GoalDriftDetector,
  ResourceSpikeDetector,
  cosineSimilarity,
  extractOutputText,
} from './detectors/index.js';
export type {
  ActionHistory,
  ActionLoopOptions,
  EmbedFunction,
  GoalDriftOptions,
  IncidentDraft,
  ResourceSpikeOptions,
  RunCounter,
  SimilarityObserver,
} from './detectors/index.js';

export * from './models/enums.js';
export * from './models/errors.js';
export type * from './models/types.js';
export {
  encodeTraceEvent,
  decodeTraceEvent,
  encodeIncident,
  decodeIncident,
  encodeBaseline,
  decodeBaseline,
  emptyBaseline,
} from './models/codec.js';

export { createLogger, ConsoleSink, MemorySink, StructuredLogger } from './utils/logger.js';
export type { LogEntry, LogLevel, LogSink, LoggerConfig } from './utils/logger.js';
