// Domain model shared by the engine, decoupled from the feed and storage formats

/** A record as produced by a feed source, before timezone normalization. */
export interface RawIncident {
  description: string;
  /** Local wall-clock time in the feed's timezone and fixed format. */
  timestamp: string;
}

export interface CanonicalIncident {
  /** UTC instant, `Date#toISOString()` form. */
  readonly occurredAt: string;
  readonly description: string;
}

/** Hex SHA-256 over the canonical fields of an incident. */
export type IdentityKey = string;

export type KnownIdentities = ReadonlySet<IdentityKey>;

/** Incidents selected for one run's notification, in feed order. */
export type NotificationBatch = readonly CanonicalIncident[];

export interface KnownIncident extends CanonicalIncident {
  identity: IdentityKey;
  notifiedAt: Date;
  runId: string;
}

export type RunStatus =
  | 'Fetching'
  | 'Normalizing'
  | 'Reconciling'
  | 'NoNewIncidents'
  | 'Notifying'
  | 'Committing'
  | 'Done'
  | 'Failed';

export interface OutboundMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}
