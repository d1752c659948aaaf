import { execa } from 'execa';
import { ENV } from './env';
import { FetchError, errorMessage } from './errors';
import { debug, info } from './log';
import { watchUrl } from './ids';
import { isJsonObject } from './store';
import type { CatalogItem, CatalogProvider, JsonObject, SourceConfig, SourceType } from './types';

const PLAYLIST_PREFIXES = ['PL', 'UU', 'OL', 'FL', 'RD', 'LL'];

export function inferSourceType(sourceId: string): SourceType {
    return PLAYLIST_PREFIXES.some((p) => sourceId.startsWith(p)) ? 'playlist' : 'channel';
}

export function sourceUrl(source: SourceConfig): string {
    // Accept a full URL as the source id
    if (source.id.startsWith('http')) return source.id;
    return source.type === 'playlist'
        ? `https://www.youtube.com/playlist?list=${source.id}`
        : `https://www.youtube.com/channel/${source.id}/videos`;
}

function str(entry: JsonObject, key: string): string | undefined {
    const v = entry[key];
    return typeof v === 'string' && v ? v : undefined;
}

function publishedAt(entry: JsonObject): string | undefined {
    for (const key of ['timestamp', 'release_timestamp']) {
        const v = entry[key];
        if (typeof v === 'number' && v > 0) return new Date(v * 1000).toISOString();
    }
    const day = str(entry, 'upload_date');
    if (day && /^\d{8}$/.test(day)) {
        return `${day.slice(0, 4)}-${day.slice(4, 6)}-${day.slice(6, 8)}T00:00:00.000Z`;
    }
    return undefined;
}

/** Maps `yt-dlp --flat-playlist -J` output to catalog items, keeping yt-dlp's (newest-first) order. */
export function parseFlatPlaylist(stdout: string, limit?: number): CatalogItem[] {
    const json: unknown = JSON.parse(stdout);
    const entries = isJsonObject(json) && Array.isArray(json.entries) ? json.entries : [];
    const items: CatalogItem[] = [];
    for (const entry of entries) {
        if (!isJsonObject(entry)) continue;
        const id = str(entry, 'id');
        if (!id) continue;
        items.push({
            id,
            title: str(entry, 'title') ?? '',
            publishedAt: publishedAt(entry),
            url: watchUrl(id),
        });
    }
    return typeof limit === 'number' ? items.slice(0, limit) : items;
}

export interface ChannelListOptions {
    limit?: number; // max videos
}

export async function listSourceItems(
    source: SourceConfig,
    opts: ChannelListOptions = {}
): Promise<CatalogItem[]> {
    const url = sourceUrl(source);
    const args = ['--flat-playlist', '-J'];
    if (typeof opts.limit === 'number') args.push('--playlist-end', String(opts.limit));
    if (ENV.ytdlpCookiesFile) args.push('--cookies', ENV.ytdlpCookiesFile);
    if (ENV.ytdlpExtraArgs) args.push(...ENV.ytdlpExtraArgs.split(/\s+/).filter(Boolean));
    args.push(url);

    const attempts: Array<[string, string[]]> = [];
    attempts.push([ENV.ytdlpBin, args]);
    if (ENV.ytdlpBin !== 'yt-dlp') attempts.push(['yt-dlp', args]);
    if (ENV.ytdlpPythonBin) attempts.push([ENV.ytdlpPythonBin, ['-m', 'yt_dlp', ...args]]);
    attempts.push(['python3', ['-m', 'yt_dlp', ...args]]);

    const errors: string[] = [];
    for (const [cmd, a] of attempts) {
        let stdout: string;
        try {
            debug('catalog.exec', { cmd, source: source.id });
            const res = await execa(cmd, a, { stdio: 'pipe' });
            stdout = res.stdout;
        } catch (e) {
            errors.push(`[${cmd}] ${errorMessage(e)}`);
            continue;
        }
        try {
            const items = parseFlatPlaylist(stdout, opts.limit);
            info('catalog.list', { source: source.id, type: source.type, items: items.length });
            return items;
        } catch (e) {
            throw new FetchError(
                `yt-dlp returned unreadable output for ${url}: ${errorMessage(e)}`,
                'catalog-failed',
                { source: source.id },
                { cause: e }
            );
        }
    }
    throw new FetchError(
        `All yt-dlp attempts failed for ${url}. Errors:\n${errors.join('\n---\n')}`,
        'catalog-failed',
        { source: source.id }
    );
}

export function createYtdlpCatalog(): CatalogProvider {
    return {
        latestItems: (source, limit) => listSourceItems(source, { limit }),
    };
}
