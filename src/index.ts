export type {
  CanonicalIncident,
  IdentityKey,
  KnownIdentities,
  KnownIncident,
  NotificationBatch,
  OutboundMessage,
  RawIncident,
  RunStatus,
} from './core/types.js';
export * from './core/errors.js';
export { loadConfig, type AppConfig } from './config/index.js';
export { getLogger, configureLogger } from './utils/logging.js';
export { identityOf } from './utils/identity.js';
export { normalizeIncident, normalizeAll, type NormalizeOptions } from './services/normalizer.js';
export { reconcile } from './services/reconciler.js';
export { IncidentRepository, type IncidentStore } from './repositories/incidentRepository.js';
export { openDatabase, getDatabase, closeDatabase } from './db/client.js';
export { Notifier, renderSummary, renderSubject } from './services/notifier.js';
export {
  SmtpMailTransport,
  FileMailTransport,
  type MailTransport,
  type SmtpConfig,
} from './services/mailTransport.js';
export {
  FileFeedSource,
  HttpFeedSource,
  parseFeed,
  type FeedSource,
} from './services/feedSource.js';
export {
  RunOrchestrator,
  type RunOutcome,
  type RunEvents,
  type BatchNotifier,
} from './services/runOrchestrator.js';
export { EventBus } from './events/eventBus.js';
export { registry, writeMetricsTextfile } from './metrics/index.js';
