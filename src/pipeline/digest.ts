import { blockingPrefix, getValue, isJsonObject, keyExists, persistStore, setValue, type ResultStore } from './store';
import { replayText, teeToStore } from './tee';
import { repairStructured, type StructuredValue } from './repair';
import { requireTranscript } from './transcript';
import { buildPrompt, isDefaultPrompt } from './prompts';
import { info } from './log';
import { ConfigError, KeyPathError } from './errors';
import { toVideoId, watchUrl } from './ids';
import type {
    GenerationBackend,
    JsonObject,
    JsonValue,
    TranscriptFetchOptions,
    TranscriptProvider,
    VideoMetadata,
} from './types';

export interface DigestDeps {
    store: ResultStore;
    transcripts: TranscriptProvider;
    /** Called only on a cache miss, so cached reads need no credential. */
    backend: () => GenerationBackend;
    replayDelayMs?: number;
}

export interface TranscriptOutcome {
    transcript: string;
    cached: boolean;
}

export function metadataToJson(meta: VideoMetadata): JsonObject {
    const out: JsonObject = {};
    for (const [k, v] of Object.entries(meta)) {
        if (typeof v === 'string') out[k] = v;
    }
    return out;
}

/** True when `opts` asks for the whole transcript in the default caption track. */
export function isFullFetch(opts?: TranscriptFetchOptions): boolean {
    return opts?.lang === undefined && opts?.startSec === undefined && opts?.endSec === undefined;
}

/**
 * Returns the stored transcript for `videoId`, or fetches it and persists it
 * (with metadata, unless metadata is already stored). A caption language or
 * time window bypasses the store in both directions. Throws FetchError when
 * the provider reports a failure.
 */
export async function ensureTranscript(
    deps: Pick<DigestDeps, 'store' | 'transcripts'>,
    videoId: string,
    metadata: VideoMetadata,
    opts?: TranscriptFetchOptions
): Promise<TranscriptOutcome> {
    if (!isFullFetch(opts)) {
        const transcript = await requireTranscript(deps.transcripts, videoId, opts);
        return { transcript, cached: false };
    }
    const cached = getValue(deps.store, [videoId, 'transcript']);
    if (typeof cached === 'string') {
        return { transcript: cached, cached: true };
    }
    const transcript = await requireTranscript(deps.transcripts, videoId);
    setValue(deps.store, [videoId, 'transcript'], transcript);
    if (!keyExists(deps.store, [videoId, 'metadata'])) {
        setValue(deps.store, [videoId, 'metadata'], metadataToJson(metadata));
    }
    await persistStore(deps.store);
    return { transcript, cached: false };
}

export interface SummaryRequest {
    videoId: string;
    language: string;
    transcript: string;
    /** Caller-supplied instructions; the reply is shown but not cached. */
    instructions?: string;
    /** The transcript covers a window or another caption track; the reply is not cached. */
    partial?: boolean;
}

function isCacheable(req: SummaryRequest): boolean {
    return isDefaultPrompt(req) && !req.partial;
}

export interface SummaryStream {
    cached: boolean;
    /** Whether draining `fragments` commits the result to the store. */
    stored: boolean;
    fragments: AsyncIterable<string>;
}

export function streamSummary(deps: DigestDeps, req: SummaryRequest): SummaryStream {
    const keyPath = [req.videoId, 'summary', req.language];
    const storeResult = isCacheable(req);
    const cached = getValue(deps.store, keyPath);
    if (storeResult && typeof cached === 'string') {
        info('digest.summary.hit', { videoId: req.videoId, language: req.language });
        return { cached: true, stored: false, fragments: replayText(cached, deps.replayDelayMs) };
    }
    info('digest.summary.miss', { videoId: req.videoId, language: req.language, storeResult });
    const prompt = buildPrompt('summary', req);
    return {
        cached: false,
        stored: storeResult,
        fragments: teeToStore(deps.backend().stream(prompt), {
            store: deps.store,
            keyPath,
            storeResult,
        }),
    };
}

export interface RatingOutcome {
    value: StructuredValue;
    cached: boolean;
}

function asStructured(value: JsonValue | undefined): StructuredValue | undefined {
    if (Array.isArray(value) || isJsonObject(value)) return value;
    return undefined;
}

/**
 * Single-shot structured analysis. The reply goes through repair; a ParseError
 * propagates and nothing is stored. Replies to custom instructions are not cached.
 * Throws KeyPathError before calling the backend when the rating slot is not a mapping.
 */
export async function rateVideo(deps: DigestDeps, req: SummaryRequest): Promise<RatingOutcome> {
    const keyPath = [req.videoId, 'rating', req.language];
    const storeResult = isCacheable(req);
    const cached = storeResult ? asStructured(getValue(deps.store, keyPath)) : undefined;
    if (cached) {
        info('digest.rating.hit', { videoId: req.videoId, language: req.language });
        return { value: cached, cached: true };
    }
    const blocked = storeResult ? blockingPrefix(deps.store, keyPath) : undefined;
    if (blocked) {
        throw new KeyPathError(`"${blocked.join('.')}" holds a non-mapping value`, keyPath);
    }
    const raw = await deps.backend().generate(buildPrompt('rating', req));
    const { value, step } = repairStructured(raw);
    info('digest.rating.parsed', { videoId: req.videoId, language: req.language, step });
    if (storeResult) {
        setValue(deps.store, keyPath, value);
        await persistStore(deps.store);
    }
    return { value, cached: false };
}

export type DigestCategory = 'summary' | 'rating';

export interface DigestRequest {
    /** Watch URL, short link or bare video id. */
    video: string;
    language: string;
    category: DigestCategory;
    instructions?: string;
    /** Caption language and time window; any of them keeps the results out of the store. */
    fetch?: TranscriptFetchOptions;
    now?: () => Date;
}

export type DigestResult =
    | { category: 'summary'; videoId: string; transcript: string; summary: SummaryStream }
    | { category: 'rating'; videoId: string; transcript: string; rating: RatingOutcome };

/** Resolves the video, makes sure its transcript is stored, then summarizes or rates it. */
export async function summarizeVideo(deps: DigestDeps, req: DigestRequest): Promise<DigestResult> {
    const videoId = toVideoId(req.video);
    if (!videoId) {
        throw new ConfigError(`Not a valid YouTube URL or video id: ${req.video}`);
    }
    const startSec = req.fetch?.startSec ?? 0;
    const endSec = req.fetch?.endSec ?? Number.POSITIVE_INFINITY;
    if (!(startSec >= 0) || !(endSec >= startSec)) {
        throw new ConfigError(`Invalid time window: ${startSec}s to ${endSec}s`);
    }
    const now = req.now ?? (() => new Date());
    const { transcript } = await ensureTranscript(
        deps,
        videoId,
        { url: watchUrl(videoId), processedOn: now().toISOString() },
        req.fetch
    );
    const request: SummaryRequest = {
        videoId,
        language: req.language,
        transcript,
        instructions: req.instructions,
        partial: !isFullFetch(req.fetch),
    };
    if (req.category === 'rating') {
        return { category: 'rating', videoId, transcript, rating: await rateVideo(deps, request) };
    }
    return { category: 'summary', videoId, transcript, summary: streamSummary(deps, request) };
}
