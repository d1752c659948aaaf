export type ISO8601 = string;

export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Ordered keys addressing a nested value: entity → category → language. */
export type KeyPath = readonly string[];

export interface VideoMetadata {
    title?: string;
    url: string;
    publishedAt?: ISO8601;
    sourceId?: string;
    sourceName?: string;
    processedOn: ISO8601;
}

export type TranscriptErrorKind =
    | 'transcripts-disabled'
    | 'no-transcript-found'
    | 'not-translatable'
    | 'video-unavailable'
    | 'ip-blocked'
    | 'retrieval-failed';

export type TranscriptResult =
    | { success: true; data: string; language?: string }
    | { success: false; error: TranscriptErrorKind; message: string };

export interface TranscriptFetchOptions {
    /** Preferred caption language code; the first listed track is used otherwise. */
    lang?: string;
    startSec?: number;
    endSec?: number;
}

export interface TranscriptProvider {
    fetch(videoId: string, opts?: TranscriptFetchOptions): Promise<TranscriptResult>;
}

export interface GenerationBackend {
    /** Streams the reply as text fragments in the order the backend produces them. */
    stream(prompt: string): AsyncIterable<string>;
    /** Single-shot reply, used for structured output that goes through repair. */
    generate(prompt: string): Promise<string>;
}

export type SourceType = 'channel' | 'playlist';

export interface SourceConfig {
    id: string;
    name: string;
    type: SourceType;
    limit?: number;
}

export interface CatalogItem {
    id: string;
    title: string;
    publishedAt?: ISO8601;
    url: string;
}

export interface CatalogProvider {
    /** Newest first. */
    latestItems(source: SourceConfig, limit: number): Promise<CatalogItem[]>;
}
