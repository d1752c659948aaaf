import Ajv, { type JSONSchemaType } from 'ajv';
import fs from 'fs-extra';
import path from 'path';
import { MalformedStoreError } from './errors';
import { debug, info } from './log';
import { readDocument, writeDocument } from './store';
import type { CatalogItem, ISO8601, SourceConfig } from './types';

export const DEFAULT_KNOWN_CAP = 50;

export type AnalysisOutcome = 'rated' | 'cached' | 'unparsed' | 'failed';

export interface AnalysisRecord {
    analyzedAt: ISO8601;
    sourceId: string;
    title?: string;
    language?: string;
    outcome: AnalysisOutcome;
    /** Number of entries in the structured rating, when one was stored. */
    itemCount?: number;
}

export interface MonitorState {
    sources: Record<string, SourceConfig>;
    /** Newest first, at most the window cap per source. */
    known: Record<string, string[]>;
    analyses: Record<string, AnalysisRecord>;
}

export function emptyState(): MonitorState {
    return { sources: {}, known: {}, analyses: {} };
}

const stateSchema: JSONSchemaType<MonitorState> = {
    type: 'object',
    properties: {
        sources: {
            type: 'object',
            required: [],
            additionalProperties: {
                type: 'object',
                properties: {
                    id: { type: 'string' },
                    name: { type: 'string' },
                    type: { type: 'string', enum: ['channel', 'playlist'] },
                    limit: { type: 'integer', minimum: 1, nullable: true },
                },
                required: ['id', 'name', 'type'],
                additionalProperties: false,
            },
        },
        known: {
            type: 'object',
            required: [],
            additionalProperties: { type: 'array', items: { type: 'string' } },
        },
        analyses: {
            type: 'object',
            required: [],
            additionalProperties: {
                type: 'object',
                properties: {
                    analyzedAt: { type: 'string' },
                    sourceId: { type: 'string' },
                    title: { type: 'string', nullable: true },
                    language: { type: 'string', nullable: true },
                    outcome: { type: 'string', enum: ['rated', 'cached', 'unparsed', 'failed'] },
                    itemCount: { type: 'integer', nullable: true },
                },
                required: ['analyzedAt', 'sourceId', 'outcome'],
                additionalProperties: false,
            },
        },
    },
    required: ['sources', 'known', 'analyses'],
    additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validateState = ajv.compile(stateSchema);

export async function loadState(filePath: string): Promise<MonitorState> {
    const abs = path.resolve(filePath);
    if (!(await fs.pathExists(abs))) {
        const state = emptyState();
        await writeDocument(abs, state);
        info('state.create', { path: abs });
        return state;
    }
    const doc = await readDocument(abs);
    if (!validateState(doc)) {
        const errors = (validateState.errors || []).map((e) => `${e.instancePath} ${e.message}`);
        throw new MalformedStoreError(`Invalid monitor state in ${abs}: ${errors.join('; ')}`, abs);
    }
    return doc;
}

export async function saveState(filePath: string, state: MonitorState): Promise<void> {
    const abs = path.resolve(filePath);
    await writeDocument(abs, state);
    debug('state.persist', { path: abs, sources: Object.keys(state.known).length });
}

export function knownIds(state: MonitorState, sourceId: string): string[] {
    return state.known[sourceId] ?? [];
}

/**
 * New known list = latestIds, then previously known ids not in latestIds (in
 * their existing order), without duplicates, cut to the first `cap` entries.
 */
export function updateKnown(
    state: MonitorState,
    sourceId: string,
    latestIds: readonly string[],
    cap: number = DEFAULT_KNOWN_CAP
): MonitorState {
    const combined = [...new Set([...latestIds, ...knownIds(state, sourceId)])].slice(0, cap);
    return { ...state, known: { ...state.known, [sourceId]: combined } };
}

export function isNew(state: MonitorState, sourceId: string, id: string): boolean {
    return !knownIds(state, sourceId).includes(id);
}

/** New items of a newest-first fetch, oldest first. */
export function pendingItems(
    state: MonitorState,
    sourceId: string,
    latest: readonly CatalogItem[]
): CatalogItem[] {
    return latest.filter((item) => isNew(state, sourceId, item.id)).reverse();
}

export function recordAnalysis(state: MonitorState, itemId: string, analysis: AnalysisRecord): MonitorState {
    return { ...state, analyses: { ...state.analyses, [itemId]: analysis } };
}

export function addSource(state: MonitorState, source: SourceConfig): MonitorState {
    return { ...state, sources: { ...state.sources, [source.id]: source } };
}

/** Most recent analysis time among a source's items, if any. */
export function lastAnalyzedAt(state: MonitorState, sourceId: string): ISO8601 | undefined {
    let latest: ISO8601 | undefined;
    for (const record of Object.values(state.analyses)) {
        if (record.sourceId !== sourceId) continue;
        if (!latest || record.analyzedAt > latest) latest = record.analyzedAt;
    }
    return latest;
}
