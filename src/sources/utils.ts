/**
 * Shared utilities for the OpenAlex adapter.
 */

import type { TopicScore } from '../types/index.js';

/**
 * Strip a URL-shaped reference down to its last path segment.
 * "https://openalex.org/C162324750" → "C162324750"
 * "C162324750" → "C162324750"
 */
export function bareId(ref: string | null | undefined): string {
    if (!ref) return '';
    const trimmed = ref.trim().replace(/\/+$/, '');
    const slash = trimmed.lastIndexOf('/');
    return slash === -1 ? trimmed : trimmed.slice(slash + 1);
}

/**
 * Normalize a raw concept tag into a TopicScore.
 * Missing score → 0, missing name → "".
 */
export function toTopicScore(raw: {
    id?: string | null;
    display_name?: string | null;
    score?: number | null;
}): TopicScore {
    return {
        id: bareId(raw.id),
        displayName: raw.display_name ?? '',
        score: typeof raw.score === 'number' && Number.isFinite(raw.score) ? raw.score : 0,
    };
}

/**
 * File-system friendly form of a field name.
 * "Environmental Science" → "environmental_science"
 */
export function safeName(name: string): string {
    return name
        .trim()
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '_')
        .replace(/^_+|_+$/g, '') || 'field';
}
