import { setTimeout as sleep } from 'timers/promises';
import { persistStore, setValue, type ResultStore } from './store';
import { debug, info } from './log';
import type { KeyPath } from './types';

export interface TeeSink {
  store: ResultStore;
  keyPath: KeyPath;
  /** False for results that must not be cached, e.g. replies to a caller-supplied prompt. */
  storeResult: boolean;
}

/**
 * Forwards every fragment the consumer pulls, unchanged and in order, while
 * buffering it. Once upstream is exhausted, and before this generator reports
 * completion, the joined text is written to `sink.keyPath` and the store is
 * persisted. A consumer that stops early (break / return()) never triggers the
 * commit, and an upstream error propagates without one.
 */
export async function* teeToStore(
  fragments: AsyncIterable<string> | Iterable<string>,
  sink: TeeSink
): AsyncGenerator<string, void, undefined> {
  const buffer: string[] = [];
  for await (const fragment of fragments) {
    buffer.push(fragment);
    yield fragment;
  }
  const joined = buffer.join('');
  if (!sink.storeResult) {
    debug('tee.discard', { keyPath: [...sink.keyPath], chars: joined.length });
    return;
  }
  setValue(sink.store, sink.keyPath, joined);
  await persistStore(sink.store);
  info('tee.commit', { keyPath: [...sink.keyPath], fragments: buffer.length, chars: joined.length });
}

/**
 * Replays cached text word by word so it renders like a live stream.
 * Concatenating the fragments gives back `text` exactly.
 */
export async function* replayText(text: string, delayMs = 0): AsyncGenerator<string, void, undefined> {
  const words = text.split(' ');
  for (let i = 0; i < words.length; i++) {
    const fragment = i < words.length - 1 ? words[i] + ' ' : words[i];
    if (!fragment) continue;
    yield fragment;
    if (delayMs > 0) await sleep(delayMs);
  }
}

/** Drains a fragment sequence into `write`, returning the full text. */
export async function drain(
  fragments: AsyncIterable<string>,
  write: (fragment: string) => void
): Promise<string> {
  let text = '';
  for await (const fragment of fragments) {
    write(fragment);
    text += fragment;
  }
  return text;
}
