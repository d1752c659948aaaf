import * as dotenv from 'dotenv';
import { ConfigError } from './errors';
dotenv.config();

/** Unset or empty means `fallback`; anything else must be an integer >= `min`. */
export function intSetting(name: string, raw: string | undefined, fallback: number, min: number): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`, { name });
    }
    return value;
}

const databaseUrl = process.env.DATABASE_URL || '';

export const ENV = {
    // Generation backend credential; CLIs also accept --api-key
    apiKey: process.env.API_KEY || '',
    geminiModel: process.env.GEMINI_MODEL || 'gemma-3n-e2b-it',
    // Single-shot structured replies (ratings) need a model that follows JSON instructions
    geminiStructuredModel: process.env.GEMINI_STRUCTURED_MODEL || 'gemini-2.0-flash',
    videoJsonPath: process.env.VIDEO_JSON_PATH || 'video_dict.json',
    monitorStatePath: process.env.MONITOR_STATE_PATH || 'monitor_state.json',
    knownIdsCap: intSetting('KNOWN_IDS_CAP', process.env.KNOWN_IDS_CAP, 50, 1),
    fetchLimit: intSetting('FETCH_LIMIT', process.env.FETCH_LIMIT, 5, 1),
    defaultLanguage: process.env.DEFAULT_LANGUAGE || 'English',
    // Pacing for replaying cached text word by word. 0 disables.
    replayDelayMs: intSetting('REPLAY_DELAY_MS', process.env.REPLAY_DELAY_MS, 20, 0),
    // Optional: override yt-dlp binary name/path
    ytdlpBin: process.env.YTDLP_BIN || 'yt-dlp',
    // Optional: explicit python interpreter with yt_dlp installed for fallback (e.g. .venv/bin/python)
    ytdlpPythonBin: process.env.YTDLP_PYTHON_BIN || '',
    ytdlpCookiesFile: process.env.YTDLP_COOKIES_FILE || '',
    ytdlpExtraArgs: process.env.YTDLP_EXTRA_ARGS || '',
    logLevel: process.env.LOG_LEVEL || 'info',
    logFile: process.env.LOG_FILE || '',
    databaseUrl,
    // The run ledger is off unless a database is configured
    disableDb: !databaseUrl || (process.env.DISABLE_DB || 'false').toLowerCase() === 'true',
};
