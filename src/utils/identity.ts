import crypto from 'crypto';
import type { CanonicalIncident, IdentityKey } from '../core/types.js';

export function buildCanonicalPayload(obj: unknown): string {
  // Stable stringify by sorting object keys recursively
  return JSON.stringify(sortObj(obj));
}

function sortObj(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortObj);
  if (value && typeof value === 'object') {
    const rec = Object.fromEntries(Object.entries(value));
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(rec).sort()) {
      out[key] = sortObj(rec[key]);
    }
    return out;
  }
  return value;
}

/**
 * Identity of an incident, derived from its canonical fields only. The feed
 * carries no stable incident id, so a changed description is a new incident.
 */
export function identityOf(incident: CanonicalIncident): IdentityKey {
  const canonical = buildCanonicalPayload({
    occurredAt: incident.occurredAt,
    description: incident.description,
  });
  return crypto.createHash('sha256').update(canonical, 'utf8').digest('hex');
}
