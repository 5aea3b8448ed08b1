/**
 * FieldIssueFormatter: Readable Zod Issue Lines
 *
 * Turns the issues of a failed `safeParse` into one line per field:
 *
 *   a: Expected number, received string. You sent: '2'. Expected type: number.
 *   mode: Invalid enum value. ... You sent: 'fast'. Valid options: 'blocking', 'nonblocking'.
 *
 * Pure-function module: no state, no side effects.
 *
 * @module
 */
import { type ZodIssue } from 'zod';

const MAX_SENT_LENGTH = 60;

/**
 * Format validation issues for an {@link InvalidFieldsError}.
 *
 * @param issues - Issues from a failed `safeParse`
 * @param sent - The raw fields, for "You sent:" hints
 */
export function formatFieldIssues(issues: readonly ZodIssue[], sent: unknown): string[] {
    return issues.map((issue) => {
        const fieldPath = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        let line = `${fieldPath}: ${issue.message}`;

        const sentHint = formatSentValue(resolveValue(sent, issue.path));
        if (sentHint) line = appendSentence(line, `You sent: ${sentHint}.`);

        const suggestion = buildSuggestion(issue);
        if (suggestion) line = appendSentence(line, suggestion);

        return line;
    });
}

// ── Suggestion Builder ───────────────────────────────────

function buildSuggestion(issue: ZodIssue): string | undefined {
    switch (issue.code) {
        case 'invalid_type':
            return `Expected type: ${issue.expected}.`;

        case 'invalid_enum_value':
            return `Valid options: ${issue.options.map(o => `'${String(o)}'`).join(', ')}.`;

        case 'invalid_literal':
            return `Expected exactly: ${JSON.stringify(issue.expected)}.`;

        case 'unrecognized_keys':
            return `Remove unrecognized fields: ${issue.keys.map(k => `'${k}'`).join(', ')}.`;

        case 'too_small':
            if (issue.type === 'number' || issue.type === 'bigint') {
                return `Must be ${issue.inclusive ? '>=' : '>'} ${String(issue.minimum)}.`;
            }
            return undefined;

        case 'too_big':
            if (issue.type === 'number' || issue.type === 'bigint') {
                return `Must be ${issue.inclusive ? '<=' : '<'} ${String(issue.maximum)}.`;
            }
            return undefined;

        default:
            return undefined;
    }
}

// ── Value Resolution ─────────────────────────────────────

function resolveValue(root: unknown, path: readonly (string | number)[]): unknown {
    if (path.length === 0) return undefined;
    let current: unknown = root;
    for (const key of path) {
        if (typeof current !== 'object' || current === null) return undefined;
        current = Reflect.get(current, key);
    }
    return current;
}

function formatSentValue(value: unknown): string | undefined {
    if (value === undefined) return undefined;
    if (typeof value === 'string') {
        const clipped = value.length > MAX_SENT_LENGTH ? `${value.slice(0, MAX_SENT_LENGTH)}…` : value;
        return `'${clipped}'`;
    }
    if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint' || value === null) {
        return String(value);
    }
    if (typeof value === 'function' || typeof value === 'symbol') return typeof value;
    const json = stringifySent(value);
    if (json === undefined) return typeof value;
    return json.length > MAX_SENT_LENGTH ? `${json.slice(0, MAX_SENT_LENGTH)}…` : json;
}

/**
 * JSON with bigints written as `1n`. `undefined` when the value cannot be
 * serialized (circular references, a throwing `toJSON`); the hint then
 * falls back to the value's type.
 */
function stringifySent(value: unknown): string | undefined {
    try {
        const json: string | undefined = JSON.stringify(value, (_key, nested: unknown) =>
            (typeof nested === 'bigint' ? `${nested}n` : nested));
        return json;
    } catch {
        return undefined;
    }
}

function appendSentence(line: string, sentence: string): string {
    return /[.!?]$/.test(line) ? `${line} ${sentence}` : `${line}. ${sentence}`;
}
