import type { CanonicalIncident, KnownIdentities, NotificationBatch } from '../core/types.js';
import { identityOf } from '../utils/identity.js';

/**
 * Selects the incidents that have not been notified yet.
 *
 * The result is the subsequence of `incoming` whose identity is absent from
 * `known`, in input order. A feed may list the same incident more than once
 * in one poll; only the first occurrence is kept. Pure: no I/O and no state
 * beyond the call.
 */
export function reconcile(
  incoming: readonly CanonicalIncident[],
  known: KnownIdentities,
): NotificationBatch {
  const seen = new Set<string>();
  const batch: CanonicalIncident[] = [];
  for (const incident of incoming) {
    const id = identityOf(incident);
    if (known.has(id) || seen.has(id)) continue;
    seen.add(id);
    batch.push(incident);
  }
  return batch;
}
