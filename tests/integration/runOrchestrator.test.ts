import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { openDatabase } from '../../src/db/client.js';
import {
  IncidentRepository,
  type IncidentStore,
} from '../../src/repositories/incidentRepository.js';
import { Notifier } from '../../src/services/notifier.js';
import { RunOrchestrator, type RunEvents } from '../../src/services/runOrchestrator.js';
import type { FeedSource } from '../../src/services/feedSource.js';
import { EventBus } from '../../src/events/eventBus.js';
import { StoreUnavailableError, FeedUnavailableError } from '../../src/core/errors.js';
import type { CanonicalIncident, RawIncident } from '../../src/core/types.js';
import { identityOf } from '../../src/utils/identity.js';
import { incidentsNotifiedTotal, registry, runsTotal } from '../../src/metrics/index.js';
import { EASTERN, FailingTransport, RecordingTransport, StaticFeed } from '../utils/fakes.js';

const normalize = { ...EASTERN, invalidRecords: 'fail' as const };
const line1 = { occurredAt: '2024-06-01T10:00:00.000Z', description: 'Delay on Line 1' };
const line2 = { occurredAt: '2024-06-01T11:00:00.000Z', description: 'Delay on Line 2' };
const feedRecords: RawIncident[] = [
  { timestamp: '2024-06-01T06:00:00', description: 'Delay on Line 1' },
  { timestamp: '2024-06-01T07:00:00', description: 'Delay on Line 2' },
];
const mailOpts = { from: 'alerts@example.com', to: 'oncall@example.com', subjectPrefix: 'Alert' };

describe('RunOrchestrator', () => {
  let db: Database.Database;
  let store: IncidentRepository;
  let transport: RecordingTransport;

  function orchestrator(feed: FeedSource, overrides: Partial<{ store: IncidentStore; notifier: Notifier }> = {}) {
    return new RunOrchestrator({
      feed,
      store: overrides.store ?? store,
      notifier: overrides.notifier ?? new Notifier({ ...mailOpts, transport }),
      normalize,
    });
  }

  beforeEach(() => {
    registry.resetMetrics();
    db = openDatabase(':memory:');
    store = new IncidentRepository(db);
    transport = new RecordingTransport();
  });

  afterEach(() => {
    db.close();
  });

  it('fails on a local time in the DST gap without notifying or committing', async () => {
    const outcome = await orchestrator(
      new StaticFeed([{ timestamp: '2024-03-10T02:30:00', description: 'Signal failure at Station A' }]),
    ).run();
    expect(outcome.status).toBe('Failed');
    if (outcome.status !== 'Failed') return;
    expect(outcome.error.kind).toBe('AmbiguousLocalTime');
    expect(outcome.failedIn).toBe('Normalizing');
    expect(outcome.notificationSent).toBe(false);
    expect(outcome.transitions).toEqual(['Fetching', 'Normalizing', 'Failed']);
    expect(transport.sent).toHaveLength(0);
    expect((await store.loadKnownIdentities()).size).toBe(0);
  });

  it('notifies only the incident that is not already known, then commits it', async () => {
    await store.commit([line1], 'earlier-run');
    const outcome = await orchestrator(new StaticFeed(feedRecords)).run();

    expect(outcome.status).toBe('Done');
    if (outcome.status !== 'Done') return;
    expect(outcome.batch).toEqual([line2]);
    expect(outcome.fetched).toBe(2);
    expect(outcome.transitions).toEqual([
      'Fetching',
      'Normalizing',
      'Reconciling',
      'Notifying',
      'Committing',
      'Done',
    ]);
    expect(transport.sent).toHaveLength(1);
    expect(transport.sent[0].text).toBe('2024-06-01T11:00:00.000Z Delay on Line 2\n');
    expect(await store.loadKnownIdentities()).toEqual(new Set([identityOf(line1), identityOf(line2)]));
  });

  it('does not notify the same incidents on a later run', async () => {
    const first = await orchestrator(new StaticFeed(feedRecords)).run();
    expect(first.status === 'Done' && first.batch.length).toBe(2);

    const second = await orchestrator(new StaticFeed([...feedRecords].reverse())).run();
    expect(second.status).toBe('Done');
    if (second.status !== 'Done') return;
    expect(second.batch).toEqual([]);
    expect(second.transitions).toEqual([
      'Fetching',
      'Normalizing',
      'Reconciling',
      'NoNewIncidents',
      'Done',
    ]);
    expect(transport.sent).toHaveLength(1);
  });

  it('completes without sending anything for an empty feed', async () => {
    const outcome = await orchestrator(new StaticFeed([])).run();
    expect(outcome.status).toBe('Done');
    expect(transport.sent).toHaveLength(0);
  });

  it('sends a duplicated feed entry once', async () => {
    const outcome = await orchestrator(new StaticFeed([feedRecords[1], feedRecords[0], feedRecords[1]])).run();
    expect(outcome.status === 'Done' && outcome.batch).toEqual([line2, line1]);
    expect(transport.sent[0].subject).toBe('Alert: 2 new incidents');
  });

  it('leaves the store untouched when delivery fails', async () => {
    const failing = new FailingTransport();
    const outcome = await orchestrator(new StaticFeed(feedRecords), {
      notifier: new Notifier({ ...mailOpts, transport: failing }),
    }).run();
    expect(outcome.status).toBe('Failed');
    if (outcome.status !== 'Failed') return;
    expect(outcome.error.kind).toBe('DeliveryFailed');
    expect(outcome.failedIn).toBe('Notifying');
    expect(outcome.notificationSent).toBe(false);
    expect(failing.attempts).toBe(1);
    expect((await store.loadKnownIdentities()).size).toBe(0);
  });

  it('reports a commit failure after a successful send', async () => {
    const brokenStore: IncidentStore = {
      loadKnownIdentities: async () => new Set<string>(),
      commit: async () => {
        throw new StoreUnavailableError('disk full');
      },
    };
    const outcome = await orchestrator(new StaticFeed(feedRecords), { store: brokenStore }).run();
    expect(outcome.status).toBe('Failed');
    if (outcome.status !== 'Failed') return;
    expect(outcome.error.kind).toBe('StoreUnavailable');
    expect(outcome.failedIn).toBe('Committing');
    expect(outcome.notificationSent).toBe(true);
    expect(transport.sent).toHaveLength(1);
  });

  it('counts incidents as notified once the send succeeds, even if the commit fails', async () => {
    const brokenStore: IncidentStore = {
      loadKnownIdentities: async () => new Set<string>(),
      commit: async () => {
        throw new StoreUnavailableError('disk full');
      },
    };
    await orchestrator(new StaticFeed(feedRecords), { store: brokenStore }).run();
    const { values } = await incidentsNotifiedTotal.get();
    expect(values[0]?.value).toBe(2);
  });

  it('fails cleanly when a concurrent run committed the same incidents first', async () => {
    const racing = {
      notify: async (batch: readonly CanonicalIncident[]) => {
        await store.commit(batch, 'racing-run');
      },
    };
    const outcome = await new RunOrchestrator({
      feed: new StaticFeed(feedRecords),
      store,
      notifier: racing,
      normalize,
    }).run();
    expect(outcome.status === 'Failed' && outcome.error.kind).toBe('ConstraintViolation');
    const rows = await store.list(10);
    expect(rows.map((r) => r.runId)).toEqual(['racing-run', 'racing-run']);
  });

  it('fails in Fetching when the feed is unavailable', async () => {
    const feed: FeedSource = {
      fetch: async () => {
        throw new FeedUnavailableError('feed responded 503');
      },
    };
    const outcome = await orchestrator(feed).run();
    expect(outcome.status === 'Failed' && outcome.failedIn).toBe('Fetching');
    expect(outcome.transitions).toEqual(['Fetching', 'Failed']);
  });

  it('skips defective records under the skip policy', async () => {
    const outcome = await new RunOrchestrator({
      feed: new StaticFeed([
        { timestamp: '2024-03-10T02:30:00', description: 'Signal failure at Station A' },
        ...feedRecords,
      ]),
      store,
      notifier: new Notifier({ ...mailOpts, transport }),
      normalize: { ...normalize, invalidRecords: 'skip' },
    }).run();
    expect(outcome.status).toBe('Done');
    if (outcome.status !== 'Done') return;
    expect(outcome.skipped).toBe(1);
    expect(outcome.batch).toEqual([line1, line2]);
  });

  it('propagates errors outside the engine taxonomy', async () => {
    const broken = {
      notify: async () => {
        throw new TypeError('bug');
      },
    };
    await expect(
      new RunOrchestrator({ feed: new StaticFeed(feedRecords), store, notifier: broken, normalize }).run(),
    ).rejects.toThrow('bug');
  });

  it('publishes every transition on the event bus', async () => {
    const bus = new EventBus<RunEvents>();
    const seen: string[] = [];
    const off = bus.on('transition', (evt) => {
      seen.push(`${evt.from ?? '-'}>${evt.to}`);
    });
    const outcome = await new RunOrchestrator({
      feed: new StaticFeed([]),
      store,
      notifier: new Notifier({ ...mailOpts, transport }),
      normalize,
      bus,
    }).run();
    expect(seen).toEqual([
      '->Fetching',
      'Fetching>Normalizing',
      'Normalizing>Reconciling',
      'Reconciling>NoNewIncidents',
      'NoNewIncidents>Done',
    ]);
    off();
    await bus.emit('transition', { runId: outcome.runId, from: null, to: 'Done', at: new Date() });
    expect(seen).toHaveLength(5);
  });

  it('counts runs by outcome', async () => {
    await orchestrator(new StaticFeed(feedRecords)).run();
    await orchestrator(
      new StaticFeed([{ timestamp: 'bad', description: 'x' }]),
    ).run();
    const { values } = await runsTotal.get();
    expect(values.find((v) => v.labels.outcome === 'done')?.value).toBe(1);
    expect(
      values.find((v) => v.labels.outcome === 'failed' && v.labels.kind === 'MalformedTimestamp')?.value,
    ).toBe(1);
  });
});
