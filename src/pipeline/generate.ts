import { GoogleGenerativeAI, GoogleGenerativeAIFetchError } from '@google/generative-ai';
import { BackendError, ConfigError, errorMessage } from './errors';
import { debug, warn } from './log';
import type { GenerationBackend } from './types';

export interface GeminiOptions {
    apiKey: string;
    /** Model used for streamed free-text replies. */
    model: string;
    /** Model used for single-shot replies; defaults to `model`. */
    structuredModel?: string;
}

export function toBackendError(e: unknown): BackendError {
    if (e instanceof BackendError) return e;
    const status = e instanceof GoogleGenerativeAIFetchError ? e.status : undefined;
    return new BackendError(`Generation backend failed: ${errorMessage(e)}`, status, { cause: e });
}

export function createGeminiBackend(opts: GeminiOptions): GenerationBackend {
    if (!opts.apiKey) {
        throw new ConfigError('API_KEY is missing. Set it in the environment or pass --api-key.');
    }
    const genAI = new GoogleGenerativeAI(opts.apiKey);
    const streamModel = genAI.getGenerativeModel({ model: opts.model });
    const structuredModel = genAI.getGenerativeModel({ model: opts.structuredModel || opts.model });

    return {
        async *stream(prompt: string): AsyncGenerator<string, void, undefined> {
            debug('backend.stream.start', { model: opts.model, promptChars: prompt.length });
            let fragments = 0;
            try {
                const result = await streamModel.generateContentStream(prompt);
                for await (const chunk of result.stream) {
                    const text = chunk.text();
                    if (!text) continue;
                    fragments++;
                    yield text;
                }
            } catch (e) {
                const err = toBackendError(e);
                warn('backend.stream.fail', { model: opts.model, status: err.status, error: err.message });
                throw err;
            }
            debug('backend.stream.end', { model: opts.model, fragments });
        },

        async generate(prompt: string): Promise<string> {
            const model = opts.structuredModel || opts.model;
            debug('backend.generate', { model, promptChars: prompt.length });
            try {
                const result = await structuredModel.generateContent(prompt);
                return result.response.text();
            } catch (e) {
                const err = toBackendError(e);
                warn('backend.generate.fail', { model, status: err.status, error: err.message });
                throw err;
            }
        },
    };
}
