import {
    ConfigError,
    FetchError,
    MalformedStoreError,
    ParseError,
    PersistError,
    PipelineError,
    errorMessage,
} from './errors';
import {
    DEFAULT_KNOWN_CAP,
    pendingItems,
    recordAnalysis,
    saveState,
    updateKnown,
    type AnalysisRecord,
    type MonitorState,
} from './dedup';
import { ensureTranscript, rateVideo } from './digest';
import { info, startStep, warn, error as logError } from './log';
import type { RunLedger } from './run_db';
import type { ResultStore } from './store';
import { inferSourceType } from './ytdlp';
import type {
    CatalogItem,
    CatalogProvider,
    GenerationBackend,
    SourceConfig,
    SourceType,
    TranscriptProvider,
} from './types';

export interface MonitorDeps {
    store: ResultStore;
    transcripts: TranscriptProvider;
    catalog: CatalogProvider;
    backend: () => GenerationBackend;
    statePath: string;
    ledger?: RunLedger;
}

export interface CheckOptions {
    /** Restrict the check to these registered sources; all when empty. */
    sourceIds?: string[];
    /** Overrides every source's own limit when given. */
    limit?: number;
    /** Used for sources registered without a limit. */
    defaultLimit: number;
    language: string;
    knownCap?: number;
    now?: () => Date;
}

export interface SourceCheckStats {
    sourceId: string;
    listed: number;
    processed: number;
    skipped: number;
    failed: number;
    unparsed: number;
    catalogFailed: boolean;
}

export interface CheckResult {
    state: MonitorState;
    stats: SourceCheckStats[];
}

export function selectSources(state: MonitorState, sourceIds?: string[]): SourceConfig[] {
    const all = Object.values(state.sources);
    if (!sourceIds?.length) return all;
    const unknown = sourceIds.filter((id) => !state.sources[id]);
    if (unknown.length) warn('monitor.source.unknown', { sourceIds: unknown });
    return all.filter((s) => sourceIds.includes(s.id));
}

async function analyseItem(
    deps: MonitorDeps,
    source: SourceConfig,
    item: CatalogItem,
    language: string,
    analyzedAt: string
): Promise<AnalysisRecord> {
    const { transcript } = await ensureTranscript(deps, item.id, {
        title: item.title,
        url: item.url,
        publishedAt: item.publishedAt,
        sourceId: source.id,
        sourceName: source.name,
        processedOn: analyzedAt,
    });
    const base = { analyzedAt, sourceId: source.id, title: item.title, language };
    try {
        const rating = await rateVideo(deps, { videoId: item.id, language, transcript });
        const itemCount = Array.isArray(rating.value) ? rating.value.length : Object.keys(rating.value).length;
        return { ...base, outcome: rating.cached ? 'cached' : 'rated', itemCount };
    } catch (e) {
        if (!(e instanceof ParseError)) throw e;
        warn('monitor.item.unparsed', { videoId: item.id, error: e.message, rawChars: e.raw.length });
        return { ...base, outcome: 'unparsed' };
    }
}

async function checkSource(
    deps: MonitorDeps,
    state: MonitorState,
    source: SourceConfig,
    opts: CheckOptions
): Promise<CheckResult> {
    const now = opts.now ?? (() => new Date());
    const startedAt = now();
    const stats: SourceCheckStats = {
        sourceId: source.id,
        listed: 0,
        processed: 0,
        skipped: 0,
        failed: 0,
        unparsed: 0,
        catalogFailed: false,
    };
    const timer = startStep('monitor.source', { sourceId: source.id, name: source.name });

    let latest: CatalogItem[];
    try {
        latest = await deps.catalog.latestItems(source, opts.limit ?? source.limit ?? opts.defaultLimit);
    } catch (e) {
        if (!(e instanceof FetchError)) throw e;
        logError('monitor.catalog.fail', { sourceId: source.id, error: e.message });
        stats.catalogFailed = true;
        await deps.ledger?.record({ ...stats, status: 'catalog-failed', startedAt });
        timer.end({ catalogFailed: true });
        return { state, stats: [stats] };
    }
    stats.listed = latest.length;

    const pending = pendingItems(state, source.id, latest);
    stats.skipped = latest.length - pending.length;
    const failedIds = new Set<string>();

    for (const [i, item] of pending.entries()) {
        timer.eta(i, pending.length);
        const analyzedAt = now().toISOString();
        try {
            const record = await analyseItem(deps, source, item, opts.language, analyzedAt);
            state = recordAnalysis(state, item.id, record);
            if (record.outcome === 'unparsed') stats.unparsed++;
            stats.processed++;
            info('monitor.item.done', { videoId: item.id, outcome: record.outcome });
        } catch (e) {
            // Store-level failures end the pass; anything else only fails this item
            if (!(e instanceof PipelineError) || e instanceof PersistError || e instanceof MalformedStoreError) {
                throw e;
            }
            // Left out of the known list so the next check retries it
            failedIds.add(item.id);
            stats.failed++;
            state = recordAnalysis(state, item.id, {
                analyzedAt,
                sourceId: source.id,
                title: item.title,
                language: opts.language,
                outcome: 'failed',
            });
            warn('monitor.item.skip', { videoId: item.id, error: errorMessage(e), kind: e instanceof FetchError ? e.kind : e.code });
        }
    }

    state = updateKnown(
        state,
        source.id,
        latest.map((item) => item.id).filter((id) => !failedIds.has(id)),
        opts.knownCap ?? DEFAULT_KNOWN_CAP
    );
    await saveState(deps.statePath, state);
    await deps.ledger?.record({ ...stats, status: 'completed', startedAt });
    timer.end({ processed: stats.processed, failed: stats.failed });
    return { state, stats: [stats] };
}

/**
 * One pass over the selected sources. Sources and items run sequentially;
 * a failed item or catalog listing is logged and skipped. Persistence
 * failures propagate and end the pass.
 */
export async function runCheck(
    deps: MonitorDeps,
    initial: MonitorState,
    opts: CheckOptions
): Promise<CheckResult> {
    let state = initial;
    const stats: SourceCheckStats[] = [];
    for (const source of selectSources(state, opts.sourceIds)) {
        const result = await checkSource(deps, state, source, opts);
        state = result.state;
        stats.push(...result.stats);
    }
    return { state, stats };
}

export interface SourceOptions {
    name?: string;
    limit?: number;
    type?: SourceType;
}

export function createSourceConfig(sourceId: string, opts: SourceOptions = {}): SourceConfig {
    const id = sourceId.trim();
    if (!id) throw new ConfigError('Source id must not be empty');
    if (opts.limit !== undefined && (!Number.isInteger(opts.limit) || opts.limit < 1)) {
        throw new ConfigError(`Invalid limit for ${id}: ${opts.limit}`, { sourceId: id });
    }
    const source: SourceConfig = {
        id,
        name: opts.name?.trim() || id,
        type: opts.type ?? inferSourceType(id),
    };
    if (opts.limit !== undefined) source.limit = opts.limit;
    return source;
}
