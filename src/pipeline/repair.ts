import { ParseError } from './errors';
import { debug } from './log';
import { isJsonObject } from './store';
import type { JsonObject, JsonValue } from './types';

export type StructuredValue = JsonObject | JsonValue[];

export type RepairStepName =
    | 'direct'
    | 'fence'
    | 'extract'
    | 'literals'
    | 'trailing-commas'
    | 'control-chars';

interface RepairStep {
    name: RepairStepName;
    transform: (text: string) => string;
}

export interface RepairResult {
    value: StructuredValue;
    step: RepairStepName;
}

const FENCE_OPEN = /^```[\w-]*[ \t]*\r?\n?/;
const FENCE_CLOSE = /\r?\n?```\s*$/;

export function stripCodeFence(text: string): string {
    return text.replace(FENCE_OPEN, '').replace(FENCE_CLOSE, '').trim();
}

/** Greedy: from the first `{` or `[` to the last closer of the same kind. */
export function extractJsonSpan(text: string): string {
    const objStart = text.indexOf('{');
    const arrStart = text.indexOf('[');
    let start: number;
    if (objStart === -1) start = arrStart;
    else if (arrStart === -1) start = objStart;
    else start = Math.min(objStart, arrStart);
    if (start === -1) return text;
    const closer = text[start] === '{' ? '}' : ']';
    const end = text.lastIndexOf(closer);
    if (end <= start) return text;
    return text.slice(start, end + 1);
}

export function normalizeLiterals(text: string): string {
    return text
        .replace(/'/g, '"')
        .replace(/\bTrue\b/g, 'true')
        .replace(/\bFalse\b/g, 'false')
        .replace(/\bNone\b/g, 'null');
}

export function removeTrailingCommas(text: string): string {
    return text.replace(/,\s*([}\]])/g, '$1');
}

export function stripControlChars(text: string): string {
    // eslint-disable-next-line no-control-regex
    return text.replace(/[\u0000-\u001f\u007f-\u009f]/g, '');
}

// Order matters: each step transforms the output of the one before it.
export const REPAIR_STEPS: readonly RepairStep[] = [
    { name: 'direct', transform: (t) => t.trim() },
    { name: 'fence', transform: stripCodeFence },
    { name: 'extract', transform: extractJsonSpan },
    { name: 'literals', transform: normalizeLiterals },
    { name: 'trailing-commas', transform: removeTrailingCommas },
    { name: 'control-chars', transform: stripControlChars },
];

function tryParseStructured(text: string): StructuredValue | undefined {
    let parsed: JsonValue;
    try {
        parsed = JSON.parse(text);
    } catch {
        return undefined;
    }
    if (Array.isArray(parsed) || isJsonObject(parsed)) return parsed;
    return undefined;
}

/**
 * Recovers an object or array from a model reply, reporting which step
 * succeeded. Throws ParseError with the untouched reply when all steps fail.
 */
export function repairStructured(raw: string): RepairResult {
    let text = raw;
    for (const step of REPAIR_STEPS) {
        text = step.transform(text);
        const value = tryParseStructured(text);
        if (value !== undefined) {
            if (step.name !== 'direct') debug('repair.recovered', { step: step.name });
            return { value, step: step.name };
        }
    }
    throw new ParseError(
        `Could not recover structured data after ${REPAIR_STEPS.length} attempts`,
        raw
    );
}

export function parseStructured(raw: string): StructuredValue {
    return repairStructured(raw).value;
}
