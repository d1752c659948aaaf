import { describe, it, expect, beforeEach } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import { ensureTranscript, metadataToJson, rateVideo, streamSummary, summarizeVideo, type DigestDeps } from '../src/pipeline/digest';
import { getValue, keyExists, loadStore, setValue, type ResultStore } from '../src/pipeline/store';
import { ConfigError, FetchError, KeyPathError, ParseError } from '../src/pipeline/errors';
import { collect, fakeBackend, fakeTranscripts, makeTmpDir, type FakeBackend } from './helpers';

const META = { url: 'https://www.youtube.com/watch?v=v1', processedOn: '2024-05-01T10:00:00.000Z' };

describe('digest flow', () => {
  let store: ResultStore;

  beforeEach(async () => {
    store = await loadStore(path.join(await makeTmpDir(), 'video_dict.json'));
  });

  function deps(backend: FakeBackend, transcripts = fakeTranscripts({ v1: { success: true, data: 'the transcript' } })): DigestDeps & { backendCalls: number } {
    const d: DigestDeps & { backendCalls: number } = {
      store,
      transcripts,
      backendCalls: 0,
      backend: () => {
        d.backendCalls++;
        return backend;
      },
    };
    return d;
  }

  it('streams, then caches a summary on first request', async () => {
    const d = deps(fakeBackend({ fragments: ['Hel', 'lo'] }));
    expect(keyExists(store, ['v1', 'summary', 'en'])).toBe(false);

    const summary = streamSummary(d, { videoId: 'v1', language: 'en', transcript: 'the transcript' });
    expect(summary).toMatchObject({ cached: false, stored: true });
    expect(await collect(summary.fragments)).toEqual(['Hel', 'lo']);

    expect(keyExists(store, ['v1', 'summary', 'en'])).toBe(true);
    expect(getValue(store, ['v1', 'summary', 'en'])).toBe('Hello');
    expect(await fs.readJson(store.path)).toEqual({ v1: { summary: { en: 'Hello' } } });
  });

  it('replays a cached summary without calling the backend', async () => {
    const backend = fakeBackend({ fragments: ['unused'] });
    const d = deps(backend);
    await collect(streamSummary(deps(fakeBackend({ fragments: ['Cached text'] })), {
      videoId: 'v1',
      language: 'English',
      transcript: 't',
    }).fragments);

    const again = streamSummary(d, { videoId: 'v1', language: 'English', transcript: 't' });
    expect(again.cached).toBe(true);
    expect((await collect(again.fragments)).join('')).toBe('Cached text');
    expect(d.backendCalls).toBe(0);
    expect(backend.prompts).toEqual([]);
  });

  it('puts the language and transcript into the default prompt', async () => {
    const backend = fakeBackend({ fragments: ['x'] });
    await collect(streamSummary(deps(backend), { videoId: 'v1', language: 'German', transcript: 'Wort für Wort' }).fragments);
    expect(backend.prompts).toHaveLength(1);
    expect(backend.prompts[0]).toContain('The summary must be written in German.');
    expect(backend.prompts[0]).toContain('---\nWort für Wort\n---');
  });

  it('does not cache replies to custom instructions', async () => {
    const backend = fakeBackend({ fragments: ['Custom'] });
    const summary = streamSummary(deps(backend), {
      videoId: 'v1',
      language: 'English',
      transcript: 't',
      instructions: 'List every person mentioned.',
    });
    expect(summary.stored).toBe(false);
    expect(await collect(summary.fragments)).toEqual(['Custom']);
    expect(keyExists(store, ['v1', 'summary', 'English'])).toBe(false);
    expect(backend.prompts[0].startsWith('List every person mentioned.\nRespond in English.')).toBe(true);
  });

  it('generates even when a custom prompt meets a cached default summary', async () => {
    await collect(streamSummary(deps(fakeBackend({ fragments: ['Default'] })), {
      videoId: 'v1',
      language: 'English',
      transcript: 't',
    }).fragments);
    const custom = streamSummary(deps(fakeBackend({ fragments: ['Other'] })), {
      videoId: 'v1',
      language: 'English',
      transcript: 't',
      instructions: 'Be brief.',
    });
    expect(custom.cached).toBe(false);
    expect(await collect(custom.fragments)).toEqual(['Other']);
    expect(getValue(store, ['v1', 'summary', 'English'])).toBe('Default');
  });

  describe('ensureTranscript', () => {
    it('fetches, stores and persists the transcript with metadata', async () => {
      const transcripts = fakeTranscripts({ v1: { success: true, data: 'hello there' } });
      const out = await ensureTranscript({ store, transcripts }, 'v1', META);
      expect(out).toEqual({ transcript: 'hello there', cached: false });
      expect(await fs.readJson(store.path)).toEqual({
        v1: { transcript: 'hello there', metadata: META },
      });
    });

    it('uses the stored transcript on the next call', async () => {
      const transcripts = fakeTranscripts({ v1: { success: true, data: 'hello there' } });
      await ensureTranscript({ store, transcripts }, 'v1', META);
      const out = await ensureTranscript({ store, transcripts }, 'v1', META);
      expect(out).toEqual({ transcript: 'hello there', cached: true });
      expect(transcripts.calls).toEqual(['v1']);
    });

    it('turns a provider failure into a FetchError and stores nothing', async () => {
      const transcripts = fakeTranscripts({
        v1: { success: false, error: 'transcripts-disabled', message: 'disabled' },
      });
      const err = await ensureTranscript({ store, transcripts }, 'v1', META).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(FetchError);
      if (err instanceof FetchError) {
        expect(err.kind).toBe('transcripts-disabled');
        expect(err.message).toBe('Transcripts are disabled for this video (v1)');
      }
      expect(keyExists(store, ['v1'])).toBe(false);
    });
  });

  describe('rateVideo', () => {
    it('repairs and caches a structured reply', async () => {
      const backend = fakeBackend({ reply: "```json\n[{'name': 'ACME', 'bullish': True}]\n```" });
      const out = await rateVideo(deps(backend), { videoId: 'v1', language: 'English', transcript: 't' });
      expect(out).toEqual({ value: [{ name: 'ACME', bullish: true }], cached: false });
      expect(getValue(store, ['v1', 'rating', 'English'])).toEqual([{ name: 'ACME', bullish: true }]);
      expect(await fs.readJson(store.path)).toEqual({ v1: { rating: { English: [{ name: 'ACME', bullish: true }] } } });
    });

    it('returns a cached rating without calling the backend', async () => {
      await rateVideo(deps(fakeBackend({ reply: '{"score": 1}' })), { videoId: 'v1', language: 'English', transcript: 't' });
      const d = deps(fakeBackend({ reply: '{"score": 2}' }));
      const out = await rateVideo(d, { videoId: 'v1', language: 'English', transcript: 't' });
      expect(out).toEqual({ value: { score: 1 }, cached: true });
      expect(d.backendCalls).toBe(0);
    });

    it('stores nothing when the reply cannot be repaired', async () => {
      const backend = fakeBackend({ reply: 'I could not find any stocks.' });
      await expect(
        rateVideo(deps(backend), { videoId: 'v1', language: 'English', transcript: 't' })
      ).rejects.toBeInstanceOf(ParseError);
      expect(keyExists(store, ['v1', 'rating'])).toBe(false);
    });
  });

  it('refuses to rate into a rating slot that holds plain text', async () => {
    setValue(store, ['v1', 'rating'], 'legacy text');
    const backend = fakeBackend({ reply: '[]' });
    const err = await rateVideo(deps(backend), { videoId: 'v1', language: 'English', transcript: 't' }).catch(
      (e: unknown) => e
    );
    expect(err).toBeInstanceOf(KeyPathError);
    expect(err).toHaveProperty('message', '"v1.rating" holds a non-mapping value');
    expect(backend.prompts).toEqual([]);
  });

  it('metadataToJson drops absent fields', () => {
    expect(metadataToJson({ url: 'u', title: undefined, processedOn: 'p' })).toEqual({ url: 'u', processedOn: 'p' });
  });

  describe('summarizeVideo', () => {
    const transcripts = () => fakeTranscripts({ abc123def45: { success: true, data: 'shared transcript' } });
    const now = () => new Date('2024-05-01T10:00:00.000Z');

    it('resolves a URL and stores transcript and metadata before streaming', async () => {
      const d = deps(fakeBackend({ fragments: ['Short ', 'summary'] }), transcripts());
      const result = await summarizeVideo(d, {
        video: 'https://youtu.be/abc123def45',
        language: 'German',
        category: 'summary',
        now,
      });
      expect(result.category).toBe('summary');
      expect(result.videoId).toBe('abc123def45');
      if (result.category !== 'summary') return;
      expect(await collect(result.summary.fragments)).toEqual(['Short ', 'summary']);
      expect(getValue(store, ['abc123def45'])).toEqual({
        transcript: 'shared transcript',
        metadata: { url: 'https://www.youtube.com/watch?v=abc123def45', processedOn: '2024-05-01T10:00:00.000Z' },
        summary: { German: 'Short summary' },
      });
    });

    it('rates a video', async () => {
      const d = deps(fakeBackend({ reply: '```json\n[{"name": "ACME"}]\n```' }), transcripts());
      const result = await summarizeVideo(d, { video: 'abc123def45', language: 'English', category: 'rating', now });
      if (result.category !== 'rating') throw new Error('expected a rating');
      expect(result.rating).toEqual({ value: [{ name: 'ACME' }], cached: false });
      expect(getValue(store, ['abc123def45', 'rating', 'English'])).toEqual([{ name: 'ACME' }]);
    });

    it('rejects input that is not a video', async () => {
      const d = deps(fakeBackend({}), transcripts());
      await expect(
        summarizeVideo(d, { video: 'https://example.com/page', language: 'English', category: 'summary' })
      ).rejects.toBeInstanceOf(ConfigError);
    });

    it('rejects a window that ends before it starts', async () => {
      const provider = transcripts();
      const d = deps(fakeBackend({}), provider);
      await expect(
        summarizeVideo(d, { video: 'abc123def45', language: 'English', category: 'summary', fetch: { startSec: 90, endSec: 30 } })
      ).rejects.toThrow('Invalid time window: 90s to 30s');
      expect(provider.calls).toEqual([]);
    });

    it('keeps a windowed transcript and its summary out of the store', async () => {
      const provider = transcripts();
      const d = deps(fakeBackend({ fragments: ['Intro ', 'only'] }), provider);
      const result = await summarizeVideo(d, {
        video: 'abc123def45',
        language: 'English',
        category: 'summary',
        fetch: { startSec: 0, endSec: 60 },
        now,
      });
      if (result.category !== 'summary') throw new Error('expected a summary');
      expect(result.summary.stored).toBe(false);
      expect(await collect(result.summary.fragments)).toEqual(['Intro ', 'only']);
      expect(provider.calls).toEqual(['abc123def45']);
      expect(keyExists(store, ['abc123def45'])).toBe(false);
    });

    it('fetches again instead of reusing the stored transcript for another caption language', async () => {
      setValue(store, ['abc123def45', 'transcript'], 'stored english text');
      const provider = transcripts();
      const d = deps(fakeBackend({ reply: '[]' }), provider);
      const result = await summarizeVideo(d, {
        video: 'abc123def45',
        language: 'German',
        category: 'rating',
        fetch: { lang: 'de' },
        now,
      });
      expect(result.transcript).toBe('shared transcript');
      expect(provider.calls).toEqual(['abc123def45']);
      expect(getValue(store, ['abc123def45'])).toEqual({ transcript: 'stored english text' });
    });
  });
});
