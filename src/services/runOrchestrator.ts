import { randomUUID } from 'crypto';
import { EventBus } from '../events/eventBus.js';
import { EngineError } from '../core/errors.js';
import type { NotificationBatch, RunStatus } from '../core/types.js';
import type { IncidentStore } from '../repositories/incidentRepository.js';
import type { FeedSource } from './feedSource.js';
import { normalizeAll, type NormalizeAllOptions } from './normalizer.js';
import { reconcile } from './reconciler.js';
import { getLogger } from '../utils/logging.js';
import {
  incidentsFetchedTotal,
  incidentsNotifiedTotal,
  runDurationSeconds,
  runsTotal,
} from '../metrics/index.js';

export interface RunEvents {
  [k: string]: unknown;
  transition: {
    runId: string;
    from: RunStatus | null;
    to: RunStatus;
    at: Date;
  };
}

/** The part of `Notifier` the orchestrator depends on. */
export interface BatchNotifier {
  notify(batch: NotificationBatch): Promise<void>;
}

export interface RunOrchestratorDeps {
  feed: FeedSource;
  store: IncidentStore;
  notifier: BatchNotifier;
  normalize: NormalizeAllOptions;
  bus?: EventBus<RunEvents>;
}

export type RunOutcome =
  | {
      status: 'Done';
      runId: string;
      fetched: number;
      skipped: number;
      /** Incidents notified and committed by this run; empty when nothing was new. */
      batch: NotificationBatch;
      transitions: RunStatus[];
    }
  | {
      status: 'Failed';
      runId: string;
      failedIn: RunStatus;
      error: EngineError;
      /** True when the notification went out but the commit did not. */
      notificationSent: boolean;
      transitions: RunStatus[];
    };

/**
 * One reconciliation pass:
 * Fetching → Normalizing → Reconciling → (NoNewIncidents | Notifying → Committing) → Done,
 * or Failed from any step.
 *
 * Incidents are committed only after the notification was accepted. A crash or
 * commit failure after sending therefore re-notifies on the next run instead of
 * losing the alert.
 */
export class RunOrchestrator {
  private bus: EventBus<RunEvents>;

  constructor(private readonly deps: RunOrchestratorDeps) {
    this.bus = deps.bus || new EventBus<RunEvents>();
  }

  get eventBus() {
    return this.bus;
  }

  async run(): Promise<RunOutcome> {
    const runId = randomUUID();
    const log = getLogger().child({ runId });
    const transitions: RunStatus[] = [];
    const enter = async (to: RunStatus) => {
      const from = transitions.at(-1) ?? null;
      transitions.push(to);
      log.debug({ from, to }, 'run-transition');
      await this.bus.emit('transition', { runId, from, to, at: new Date() });
    };
    const endTimer = runDurationSeconds.startTimer();
    let notificationSent = false;

    try {
      await enter('Fetching');
      const raws = await this.deps.feed.fetch();
      incidentsFetchedTotal.inc(raws.length);

      await enter('Normalizing');
      const { incidents, skipped } = normalizeAll(raws, this.deps.normalize);

      await enter('Reconciling');
      const known = await this.deps.store.loadKnownIdentities();
      const batch = reconcile(incidents, known);
      log.info(
        { fetched: raws.length, skipped: skipped.length, known: known.size, count: batch.length },
        'reconciled',
      );

      if (batch.length === 0) {
        await enter('NoNewIncidents');
      } else {
        await enter('Notifying');
        await this.deps.notifier.notify(batch);
        notificationSent = true;
        incidentsNotifiedTotal.inc(batch.length);

        await enter('Committing');
        await this.deps.store.commit(batch, runId);
      }

      await enter('Done');
      runsTotal.inc({ outcome: 'done', kind: 'none' });
      return {
        status: 'Done',
        runId,
        fetched: raws.length,
        skipped: skipped.length,
        batch,
        transitions,
      };
    } catch (err) {
      if (!(err instanceof EngineError)) throw err;
      const failedIn = transitions.at(-1) ?? 'Fetching';
      await enter('Failed');
      runsTotal.inc({ outcome: 'failed', kind: err.kind });
      if (notificationSent) {
        log.error(
          { err, kind: err.kind, failedIn },
          'notification sent but incidents not committed; the next run will notify them again',
        );
      } else {
        log.error({ err, kind: err.kind, failedIn }, 'run failed');
      }
      return { status: 'Failed', runId, failedIn, error: err, notificationSent, transitions };
    } finally {
      endTimer();
    }
  }
}
