import fs from 'fs-extra';
import path from 'path';
import { KeyPathError, MalformedStoreError, PersistError, errorMessage } from './errors';
import { debug, info, warn } from './log';
import type { JsonObject, JsonValue, KeyPath } from './types';

/**
 * Nested result cache: entity id → category → language → value.
 * The whole document is rewritten on every persist; there is no append log
 * and no locking, so one process should own a store file at a time.
 */
export interface ResultStore {
    /** Absolute path the store was loaded from; default target of persistStore. */
    path: string;
    data: JsonObject;
}

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function readDocument(filePath: string): Promise<JsonObject> {
    const text = await fs.readFile(filePath, 'utf8');
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (e) {
        throw new MalformedStoreError(
            `Cannot parse ${filePath}: ${errorMessage(e)}`,
            filePath,
            { cause: e }
        );
    }
    if (!isJsonObject(parsed)) {
        throw new MalformedStoreError(`${filePath} does not hold a JSON object`, filePath);
    }
    return parsed;
}

async function backupDocument(filePath: string): Promise<string | undefined> {
    if (!(await fs.pathExists(filePath))) return undefined;
    const stamp = new Date().toISOString().replace(/[:.]/g, '-');
    const backupPath = `${filePath}.${stamp}.bak`;
    try {
        await fs.copy(filePath, backupPath);
        warn('store.backup', { path: filePath, backupPath });
        return backupPath;
    } catch (e) {
        warn('store.backup.fail', { path: filePath, error: errorMessage(e) });
        return undefined;
    }
}

/**
 * Writes `data` as indented JSON through a sibling temp file. On failure the
 * current file (the last good state) is copied aside before the error propagates.
 */
export async function writeDocument(filePath: string, data: unknown): Promise<void> {
    const tmpPath = `${filePath}.tmp`;
    try {
        // Non-ASCII text is written as-is; JSON.stringify only escapes control characters
        const text = JSON.stringify(data, null, 4) + '\n';
        await fs.ensureDir(path.dirname(filePath));
        await fs.writeFile(tmpPath, text, 'utf8');
        await fs.rename(tmpPath, filePath);
    } catch (e) {
        const backupPath = await backupDocument(filePath);
        throw new PersistError(
            `Failed to write ${filePath}: ${errorMessage(e)}`,
            filePath,
            backupPath,
            { cause: e }
        );
    }
}

/**
 * Loads the store at `filePath`, creating an empty document when none exists.
 * Throws MalformedStoreError for an unreadable document and PersistError when
 * the empty document cannot be created.
 */
export async function loadStore(filePath: string): Promise<ResultStore> {
    const abs = path.resolve(filePath);
    if (!(await fs.pathExists(abs))) {
        const store: ResultStore = { path: abs, data: {} };
        await writeDocument(abs, store.data);
        info('store.create', { path: abs });
        return store;
    }
    const data = await readDocument(abs);
    debug('store.load', { path: abs, entries: Object.keys(data).length });
    return { path: abs, data };
}

/** Returns undefined when any key along the path is missing or an intermediate is not a mapping. */
export function getValue(store: ResultStore, keyPath: KeyPath): JsonValue | undefined {
    let node: JsonValue = store.data;
    for (const key of keyPath) {
        if (!isJsonObject(node) || !Object.hasOwn(node, key)) return undefined;
        node = node[key];
    }
    return node;
}

export function keyExists(store: ResultStore, keyPath: KeyPath): boolean {
    return getValue(store, keyPath) !== undefined;
}

/** First prefix of `keyPath` whose value is not a mapping, or undefined when `setValue` can create the path. */
export function blockingPrefix(store: ResultStore, keyPath: KeyPath): string[] | undefined {
    let node: JsonValue = store.data;
    for (let i = 0; i < keyPath.length - 1; i++) {
        if (!isJsonObject(node)) return keyPath.slice(0, i);
        const key = keyPath[i];
        if (!Object.hasOwn(node, key)) return undefined;
        node = node[key];
    }
    return isJsonObject(node) ? undefined : keyPath.slice(0, keyPath.length - 1);
}

export function setValue(store: ResultStore, keyPath: KeyPath, value: JsonValue): void {
    if (keyPath.length === 0) {
        throw new KeyPathError('Key path must not be empty', keyPath);
    }
    if (keyPath.includes('__proto__')) {
        throw new KeyPathError('Key path must not contain "__proto__"', keyPath);
    }
    let node: JsonObject = store.data;
    for (let i = 0; i < keyPath.length - 1; i++) {
        const key = keyPath[i];
        const next = Object.hasOwn(node, key) ? node[key] : undefined;
        if (next === undefined) {
            const created: JsonObject = {};
            node[key] = created;
            node = created;
        } else if (isJsonObject(next)) {
            node = next;
        } else {
            throw new KeyPathError(
                `"${keyPath.slice(0, i + 1).join('.')}" holds a non-mapping value`,
                keyPath
            );
        }
    }
    node[keyPath[keyPath.length - 1]] = value;
}

export async function persistStore(store: ResultStore, filePath: string = store.path): Promise<void> {
    await writeDocument(filePath, store.data);
    debug('store.persist', { path: filePath, entries: Object.keys(store.data).length });
}

export function entityIds(store: ResultStore): string[] {
    return Object.keys(store.data);
}
