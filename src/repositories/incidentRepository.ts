import Database from 'better-sqlite3';
import { getDatabase } from '../db/client.js';
import type {
  CanonicalIncident,
  IdentityKey,
  KnownIncident,
} from '../core/types.js';
import { ConstraintViolationError, StoreUnavailableError } from '../core/errors.js';
import { identityOf } from '../utils/identity.js';

interface RowShape {
  identity: string;
  occurred_at: string;
  description: string;
  notified_at: string;
  run_id: string;
}

function map(row: RowShape): KnownIncident {
  return {
    identity: row.identity,
    occurredAt: row.occurred_at,
    description: row.description,
    notifiedAt: new Date(row.notified_at),
    runId: row.run_id,
  };
}

function isConstraintError(err: unknown): boolean {
  return err instanceof Database.SqliteError && err.code.startsWith('SQLITE_CONSTRAINT');
}

/** Durable record of the incidents already notified about. */
export interface IncidentStore {
  loadKnownIdentities(): Promise<Set<IdentityKey>>;
  /** Inserts every incident in one transaction; all or nothing. */
  commit(incidents: readonly CanonicalIncident[], runId: string): Promise<void>;
}

export class IncidentRepository implements IncidentStore {
  /** An open connection, or a database URL opened lazily on first use. */
  constructor(private readonly source?: Database.Database | string) {}

  private get db(): Database.Database {
    return typeof this.source === 'object' ? this.source : getDatabase(this.source);
  }

  async loadKnownIdentities(): Promise<Set<IdentityKey>> {
    try {
      const rows = this.db
        .prepare('SELECT identity FROM incidents')
        .pluck()
        .all();
      return new Set(rows.filter((v): v is string => typeof v === 'string'));
    } catch (err) {
      if (err instanceof StoreUnavailableError) throw err;
      throw new StoreUnavailableError('Failed to load known incident identities', err);
    }
  }

  async commit(incidents: readonly CanonicalIncident[], runId: string): Promise<void> {
    if (incidents.length === 0) return;
    const notifiedAt = new Date().toISOString();
    try {
      const insert = this.db.prepare(
        `INSERT INTO incidents (identity, occurred_at, description, notified_at, run_id)
         VALUES (@identity, @occurred_at, @description, @notified_at, @run_id)`,
      );
      const insertAll = this.db.transaction((batch: readonly CanonicalIncident[]) => {
        for (const incident of batch) {
          insert.run({
            identity: identityOf(incident),
            occurred_at: incident.occurredAt,
            description: incident.description,
            notified_at: notifiedAt,
            run_id: runId,
          });
        }
      });
      insertAll(incidents);
    } catch (err) {
      if (err instanceof StoreUnavailableError) throw err;
      if (isConstraintError(err)) {
        throw new ConstraintViolationError(
          `Commit of ${incidents.length} incident(s) would duplicate a known identity`,
          err,
        );
      }
      throw new StoreUnavailableError(`Failed to commit ${incidents.length} incident(s)`, err);
    }
  }

  async list(limit = 50): Promise<KnownIncident[]> {
    try {
      const rows = this.db
        .prepare<[number], RowShape>(
          `SELECT identity, occurred_at, description, notified_at, run_id
           FROM incidents ORDER BY notified_at DESC, rowid DESC LIMIT ?`,
        )
        .all(limit);
      return rows.map(map);
    } catch (err) {
      if (err instanceof StoreUnavailableError) throw err;
      throw new StoreUnavailableError('Failed to list known incidents', err);
    }
  }
}
