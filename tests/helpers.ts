import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import type {
  CatalogItem,
  CatalogProvider,
  GenerationBackend,
  SourceConfig,
  TranscriptProvider,
  TranscriptResult,
} from '../src/pipeline/types';

export async function makeTmpDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'digest-test-'));
}

export async function* fromArray(fragments: string[]): AsyncGenerator<string, void, undefined> {
  for (const f of fragments) yield f;
}

export async function collect(fragments: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const f of fragments) out.push(f);
  return out;
}

/** Transcript provider answering from a fixed table; unknown ids fail with no-transcript-found. */
export function fakeTranscripts(table: Record<string, TranscriptResult>): TranscriptProvider & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async fetch(videoId) {
      calls.push(videoId);
      return table[videoId] ?? { success: false, error: 'no-transcript-found', message: 'missing' };
    },
  };
}

export interface FakeBackend extends GenerationBackend {
  prompts: string[];
}

export function fakeBackend(opts: { fragments?: string[]; reply?: string | ((prompt: string) => string) }): FakeBackend {
  const prompts: string[] = [];
  return {
    prompts,
    stream(prompt) {
      prompts.push(prompt);
      return fromArray(opts.fragments ?? []);
    },
    async generate(prompt) {
      prompts.push(prompt);
      const reply = opts.reply ?? '[]';
      return typeof reply === 'function' ? reply(prompt) : reply;
    },
  };
}

export function fakeCatalog(items: Record<string, CatalogItem[]>): CatalogProvider & { calls: Array<[string, number]> } {
  const calls: Array<[string, number]> = [];
  return {
    calls,
    async latestItems(source: SourceConfig, limit: number) {
      calls.push([source.id, limit]);
      return (items[source.id] ?? []).slice(0, limit);
    },
  };
}

export function item(id: string, title = `Video ${id}`): CatalogItem {
  return { id, title, url: `https://www.youtube.com/watch?v=${id}` };
}
