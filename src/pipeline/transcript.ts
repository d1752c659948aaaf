import {
    YoutubeTranscript,
    YoutubeTranscriptDisabledError,
    YoutubeTranscriptNotAvailableError,
    YoutubeTranscriptNotAvailableLanguageError,
    YoutubeTranscriptTooManyRequestError,
    YoutubeTranscriptVideoUnavailableError,
} from 'youtube-transcript';
import { FetchError, errorMessage } from './errors';
import { debug, info, warn } from './log';
import type {
    TranscriptErrorKind,
    TranscriptFetchOptions,
    TranscriptProvider,
    TranscriptResult,
} from './types';

export function classifyTranscriptError(e: unknown): TranscriptErrorKind {
    if (e instanceof YoutubeTranscriptDisabledError) return 'transcripts-disabled';
    if (e instanceof YoutubeTranscriptNotAvailableLanguageError) return 'not-translatable';
    if (e instanceof YoutubeTranscriptNotAvailableError) return 'no-transcript-found';
    if (e instanceof YoutubeTranscriptVideoUnavailableError) return 'video-unavailable';
    if (e instanceof YoutubeTranscriptTooManyRequestError) return 'ip-blocked';
    return 'retrieval-failed';
}

const ENTITIES: Record<string, string> = {
    '&amp;': '&',
    '&lt;': '<',
    '&gt;': '>',
    '&quot;': '"',
    '&#39;': "'",
};

// Caption text arrives HTML-escaped, sometimes twice
export function decodeCaptionText(text: string): string {
    let out = text;
    for (let pass = 0; pass < 2; pass++) {
        out = out.replace(/&(amp|lt|gt|quot|#39);/g, (m) => ENTITIES[m] ?? m);
    }
    return out.replace(/\s+/g, ' ').trim();
}

export function createTranscriptProvider(): TranscriptProvider {
    return {
        async fetch(videoId: string, opts: TranscriptFetchOptions = {}): Promise<TranscriptResult> {
            const startSec = opts.startSec ?? 0;
            const endSec = opts.endSec ?? Number.POSITIVE_INFINITY;
            try {
                debug('transcript.fetch', { videoId, lang: opts.lang });
                const snippets = await YoutubeTranscript.fetchTranscript(
                    videoId,
                    opts.lang ? { lang: opts.lang } : undefined
                );
                const parts = snippets
                    .filter((s) => s.offset >= startSec && s.offset <= endSec)
                    .map((s) => decodeCaptionText(s.text))
                    .filter(Boolean);
                if (!parts.length) {
                    return {
                        success: false,
                        error: 'no-transcript-found',
                        message: `Transcript for ${videoId} is empty in the requested range`,
                    };
                }
                const data = parts.join(' ');
                info('transcript.fetch.ok', { videoId, snippets: parts.length, chars: data.length });
                return { success: true, data, language: snippets[0]?.lang };
            } catch (e) {
                const kind = classifyTranscriptError(e);
                warn('transcript.fetch.fail', { videoId, kind, error: errorMessage(e) });
                return { success: false, error: kind, message: errorMessage(e) };
            }
        },
    };
}

const KIND_MESSAGES: Record<TranscriptErrorKind, string> = {
    'transcripts-disabled': 'Transcripts are disabled for this video',
    'no-transcript-found': 'No transcript was found for this video',
    'not-translatable': 'The transcript is not available in the requested language',
    'video-unavailable': 'The video is unavailable',
    'ip-blocked': 'YouTube is blocking transcript requests from this IP',
    'retrieval-failed': 'The transcript could not be retrieved',
};

/** Unwraps a tagged result, turning a failure into a FetchError. */
export async function requireTranscript(
    provider: TranscriptProvider,
    videoId: string,
    opts?: TranscriptFetchOptions
): Promise<string> {
    const result = await provider.fetch(videoId, opts);
    if (result.success) return result.data;
    throw new FetchError(`${KIND_MESSAGES[result.error]} (${videoId})`, result.error, {
        videoId,
        reason: result.message,
    });
}
