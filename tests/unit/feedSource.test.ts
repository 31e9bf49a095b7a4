import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { FileFeedSource, HttpFeedSource, parseFeed } from '../../src/services/feedSource.js';
import { FeedUnavailableError } from '../../src/core/errors.js';

const originalFetch = global.fetch;

describe('parseFeed', () => {
  it('accepts a plain array of records', () => {
    expect(
      parseFeed([{ description: 'Delay on Line 1', timestamp: '2024-06-01T06:00:00' }]),
    ).toEqual([{ description: 'Delay on Line 1', timestamp: '2024-06-01T06:00:00' }]);
  });

  it('accepts the transit-authority envelope and drops unused fields', () => {
    const body = {
      Incidents: [
        {
          DateUpdated: '2024-06-01T06:00:00',
          Description: 'Delay on Line 1',
          IncidentID: 'abc',
          LinesAffected: 'RD;',
        },
        { DateUpdated: '2024-06-01T07:00:00', Description: 'Delay on Line 2' },
      ],
    };
    expect(parseFeed(body)).toEqual([
      { description: 'Delay on Line 1', timestamp: '2024-06-01T06:00:00' },
      { description: 'Delay on Line 2', timestamp: '2024-06-01T07:00:00' },
    ]);
  });

  it('rejects unrecognized payloads', () => {
    expect(() => parseFeed({ incidents: [] })).toThrow(FeedUnavailableError);
    expect(() => parseFeed([{ description: 'x' }])).toThrow(FeedUnavailableError);
  });
});

describe('FileFeedSource', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'transit-feed-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads a JSON file', async () => {
    const file = path.join(dir, 'feed.json');
    fs.writeFileSync(file, JSON.stringify([{ description: 'a', timestamp: '2024-06-01T06:00:00' }]));
    expect(await new FileFeedSource(file).fetch()).toEqual([
      { description: 'a', timestamp: '2024-06-01T06:00:00' },
    ]);
  });

  it('reads stdin for "-"', async () => {
    const stdin = Readable.from([
      '{"Incidents":[{"DateUpdated":"2024-06-01T06:00:00",',
      '"Description":"Delay on Line 1"}]}',
    ]);
    expect(await new FileFeedSource('-', stdin).fetch()).toEqual([
      { description: 'Delay on Line 1', timestamp: '2024-06-01T06:00:00' },
    ]);
  });

  it('fails with FeedUnavailable for a missing file or invalid JSON', async () => {
    await expect(new FileFeedSource(path.join(dir, 'missing.json')).fetch()).rejects.toBeInstanceOf(
      FeedUnavailableError,
    );
    const bad = path.join(dir, 'bad.json');
    fs.writeFileSync(bad, '{ not json');
    await expect(new FileFeedSource(bad).fetch()).rejects.toThrow(`Feed from ${bad} is not valid JSON`);
  });
});

describe('HttpFeedSource', () => {
  afterEach(() => {
    global.fetch = originalFetch;
  });

  it('fetches and parses the feed', async () => {
    const urls: string[] = [];
    global.fetch = (async (input: unknown) => {
      urls.push(String(input));
      return new Response(
        JSON.stringify({ Incidents: [{ DateUpdated: '2024-06-01T06:00:00', Description: 'x' }] }),
        { status: 200 },
      );
    }) as typeof fetch;
    const records = await new HttpFeedSource('https://feed.example.test/incidents').fetch();
    expect(urls).toEqual(['https://feed.example.test/incidents']);
    expect(records).toEqual([{ description: 'x', timestamp: '2024-06-01T06:00:00' }]);
  });

  it('fails with FeedUnavailable on a non-2xx response', async () => {
    global.fetch = (async () => new Response('busy', { status: 503 })) as typeof fetch;
    const err = await new HttpFeedSource('https://feed.example.test/incidents')
      .fetch()
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FeedUnavailableError);
    expect(err).toMatchObject({ message: 'Cannot fetch feed from https://feed.example.test/incidents' });
  });

  it('fails with FeedUnavailable on a network error', async () => {
    global.fetch = (async () => {
      throw new TypeError('fetch failed');
    }) as typeof fetch;
    await expect(new HttpFeedSource('https://feed.example.test/incidents').fetch()).rejects.toBeInstanceOf(
      FeedUnavailableError,
    );
  });
});
