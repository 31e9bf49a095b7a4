import { z } from 'zod';
import fs from 'fs/promises';
import type { RawIncident } from '../core/types.js';
import { FeedUnavailableError } from '../core/errors.js';
import { getLogger } from '../utils/logging.js';

/** Upstream producer of raw incident records, in feed order. */
export interface FeedSource {
  fetch(): Promise<RawIncident[]>;
}

const rawIncidentSchema = z.object({
  description: z.string(),
  timestamp: z.string(),
});

// Transit-authority envelope: PascalCase keys, wall-clock `DateUpdated`.
// Other fields (IncidentID, LinesAffected, ...) are not used for identity.
const authorityEnvelopeSchema = z.object({
  Incidents: z.array(
    z
      .object({
        DateUpdated: z.string(),
        Description: z.string(),
      })
      .passthrough(),
  ),
});

const feedSchema = z.union([z.array(rawIncidentSchema), authorityEnvelopeSchema]);

export function parseFeed(json: unknown): RawIncident[] {
  const parsed = feedSchema.safeParse(json);
  if (!parsed.success) {
    throw new FeedUnavailableError(`Unrecognized feed payload: ${parsed.error.message}`);
  }
  if (Array.isArray(parsed.data)) {
    return parsed.data.map(({ description, timestamp }) => ({ description, timestamp }));
  }
  return parsed.data.Incidents.map((i) => ({ description: i.Description, timestamp: i.DateUpdated }));
}

function parseJsonText(text: string, origin: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new FeedUnavailableError(`Feed from ${origin} is not valid JSON`, err);
  }
}

async function readStdin(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

/** Reads a JSON feed from a file, or from stdin when the path is `-`. */
export class FileFeedSource implements FeedSource {
  constructor(
    private readonly file: string,
    private readonly stdin: NodeJS.ReadableStream = process.stdin,
  ) {}

  async fetch(): Promise<RawIncident[]> {
    const origin = this.file === '-' ? 'stdin' : this.file;
    let text: string;
    try {
      text = this.file === '-' ? await readStdin(this.stdin) : await fs.readFile(this.file, 'utf8');
    } catch (err) {
      throw new FeedUnavailableError(`Cannot read feed from ${origin}`, err);
    }
    const records = parseFeed(parseJsonText(text, origin));
    getLogger().debug({ origin, count: records.length }, 'feed read');
    return records;
  }
}

/** Fetches a JSON feed with a plain GET. */
export class HttpFeedSource implements FeedSource {
  constructor(private readonly url: string) {}

  async fetch(): Promise<RawIncident[]> {
    let text: string;
    try {
      const res = await fetch(this.url, { headers: { accept: 'application/json' } });
      if (!res.ok) {
        throw new Error(`feed responded ${res.status}`);
      }
      text = await res.text();
    } catch (err) {
      throw new FeedUnavailableError(`Cannot fetch feed from ${this.url}`, err);
    }
    const records = parseFeed(parseJsonText(text, this.url));
    getLogger().debug({ origin: this.url, count: records.length }, 'feed fetched');
    return records;
  }
}
