/**
 * JSM Alerts: Main Exports
 *
 * Public API surface for embedding the alert console.
 *
 * @module jsm-alerts
 * @version 1.0.0
 */

// Types
export {
  type Config,
  type JsonObject,
  type LogLevel,
  type NotificationLevel,
  type Result,
  ConfigSchema,
  ok,
  err,
} from './types/index.js';

// Config
export { loadConfig, expandPath, DEFAULT_BASE_DIR, DEFAULT_LOG_FILE } from './config/config.js';

// Alerts
export type { Alert, AlertRow, AlertDescription, AlertAction } from './alerts/types.js';
export {
  AlertConsoleError,
  NormalizationFailure,
  InvalidResponseShapeError,
  TransportError,
  PreconditionError,
  ConfigError,
} from './alerts/errors.js';
export { normalizeAlert, formatAcknowledgedBy } from './alerts/normalizer.js';
export { extractAlertList, extractSingleAlert } from './alerts/extractor.js';
export { formatAge, formatTags, sortByCreatedDesc, toAlertRow, toAlertDescription } from './alerts/derived.js';
export { AlertStore } from './alerts/store.js';
export { OptimisticMutator, OptimisticMutation, type MutationOutcome } from './alerts/mutator.js';
export { RefreshCycle, type RefreshOutcome } from './alerts/refresh-cycle.js';
export { AlertConsole, type ActionOutcome, type DetailOutcome } from './alerts/console.js';
export type { AlertTransport } from './alerts/transport.js';

// Transport
export { JsmOpsClient, jsmBaseUrl } from './integrations/jsm/client.js';

// Kernel
export { EventBus, type EventMap } from './kernel/event-bus.js';

// Logging
export { configureLogging, closeLogging, createLogger } from './utils/logger.js';
