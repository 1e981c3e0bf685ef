/**
 * Helpers for reading model output
 */

import type { z } from 'zod';
import { ModelOutputError } from '../errors.js';

/**
 * Remove <think>...</think> blocks emitted by reasoning models.
 */
export function stripThinkTags(text: string): string {
    let result = text;
    let start = result.indexOf('<think>');
    let end = result.indexOf('</think>', start);
    while (start !== -1 && end !== -1) {
        result = result.slice(0, start) + result.slice(end + '</think>'.length);
        start = result.indexOf('<think>');
        end = result.indexOf('</think>', start);
    }
    return result.trim();
}

function stripCodeFence(content: string): string {
    let clean = content.trim();
    if (clean.startsWith('```json')) {
        clean = clean.slice(7);
    } else if (clean.startsWith('```')) {
        clean = clean.slice(3);
    }
    if (clean.endsWith('```')) {
        clean = clean.slice(0, -3);
    }
    return clean.trim();
}

function tryParse(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

/**
 * Parse a JSON object out of a model reply and validate it.
 *
 * Tolerates code fences, trailing commas, unquoted keys and prose around
 * the object. Anything else is a ModelOutputError for the given stage.
 */
export function parseModelJson<T extends z.ZodTypeAny>(stage: string, content: string, schema: T): z.output<T> {
    const clean = stripCodeFence(stripThinkTags(content));
    if (!clean) {
        throw new ModelOutputError(stage, 'model returned an empty response', content);
    }

    let raw = tryParse(clean);
    if (raw === undefined) {
        const fixed = clean
            .replace(/,\s*([}\]])/g, '$1') // Remove trailing commas
            .replace(/([{,]\s*)(\w+)(\s*:)/g, '$1"$2"$3'); // Quote unquoted keys
        raw = tryParse(fixed);
    }
    if (raw === undefined) {
        const match = clean.match(/\{[\s\S]*\}/);
        if (match) raw = tryParse(match[0]);
    }
    if (raw === undefined) {
        throw new ModelOutputError(stage, 'model reply is not valid JSON', content);
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
        const detail = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join(', ');
        throw new ModelOutputError(stage, `unexpected JSON structure: ${detail}`, content);
    }
    return result.data;
}
