import { DateTime, IANAZone } from 'luxon';
import type { CanonicalIncident, RawIncident } from '../core/types.js';
import {
  AmbiguousLocalTimeError,
  EmptyDescriptionError,
  MalformedTimestampError,
  isInputDefect,
  type InputDefect,
} from '../core/errors.js';
import { getLogger } from '../utils/logging.js';

export interface NormalizeOptions {
  /** IANA zone the feed reports its wall-clock times in. */
  timezone: string;
  /** luxon format token string, e.g. `yyyy-MM-dd'T'HH:mm:ss`. */
  timestampFormat: string;
}

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

/**
 * Every UTC instant whose local time in `zone` equals the given wall clock.
 * `wallMs` is the wall clock read as if it were UTC. Candidate offsets are
 * taken from the zone a day either side, which covers any single transition.
 */
function instantsForWallClock(wallMs: number, zone: IANAZone): number[] {
  const offsets = new Set([
    zone.offset(wallMs - DAY_MS),
    zone.offset(wallMs),
    zone.offset(wallMs + DAY_MS),
  ]);
  const instants = new Set<number>();
  for (const offset of offsets) {
    const candidate = wallMs - offset * MINUTE_MS;
    if (zone.offset(candidate) === offset) instants.add(candidate);
  }
  return [...instants].sort((a, b) => a - b);
}

export function normalizeIncident(raw: RawIncident, opts: NormalizeOptions): CanonicalIncident {
  if (raw.description.trim() === '') {
    throw new EmptyDescriptionError(`Incident at ${raw.timestamp} has an empty description`);
  }
  const wall = DateTime.fromFormat(raw.timestamp, opts.timestampFormat, { zone: 'utc' });
  if (!wall.isValid) {
    throw new MalformedTimestampError(
      `Timestamp "${raw.timestamp}" does not match format ${opts.timestampFormat}: ${wall.invalidExplanation ?? wall.invalidReason}`,
    );
  }
  const zone = IANAZone.create(opts.timezone);
  if (!zone.isValid) {
    throw new Error(`Unknown timezone ${opts.timezone}`);
  }
  const instants = instantsForWallClock(wall.toMillis(), zone);
  if (instants.length === 0) {
    throw new AmbiguousLocalTimeError(
      `Local time ${raw.timestamp} does not exist in ${opts.timezone} (DST gap)`,
    );
  }
  if (instants.length > 1) {
    throw new AmbiguousLocalTimeError(
      `Local time ${raw.timestamp} occurs ${instants.length} times in ${opts.timezone} (DST fold)`,
    );
  }
  return Object.freeze({
    occurredAt: new Date(instants[0]).toISOString(),
    description: raw.description,
  });
}

export interface NormalizeAllOptions extends NormalizeOptions {
  /** `fail` aborts on the first defective record; `skip` drops it and continues. */
  invalidRecords: 'fail' | 'skip';
}

export interface NormalizeAllResult {
  incidents: CanonicalIncident[];
  skipped: { index: number; error: InputDefect }[];
}

export function normalizeAll(
  raws: readonly RawIncident[],
  opts: NormalizeAllOptions,
): NormalizeAllResult {
  const incidents: CanonicalIncident[] = [];
  const skipped: NormalizeAllResult['skipped'] = [];
  raws.forEach((raw, index) => {
    try {
      incidents.push(normalizeIncident(raw, opts));
    } catch (err) {
      if (opts.invalidRecords === 'skip' && isInputDefect(err)) {
        getLogger().warn(
          { index, kind: err.kind, timestamp: raw.timestamp, err },
          'skipping invalid incident record',
        );
        skipped.push({ index, error: err });
        return;
      }
      throw err;
    }
  });
  return { incidents, skipped };
}
