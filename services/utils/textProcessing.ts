/**
 * Text Processing Utilities
 *
 * Shared helpers for word counting and prompt similarity.
 *
 * @module services/utils/textProcessing
 */

/**
 * Normalizes text for similarity comparison.
 * Case-folds, removes punctuation, and collapses whitespace.
 *
 * @example
 * normalizeForSimilarity("Hello, World!") // "hello world"
 */
export function normalizeForSimilarity(s: string): string {
    return s
        .toLowerCase()
        .replace(/[^\p{L}\p{N}\s]/gu, "")
        .replace(/\s+/g, " ")
        .trim();
}

/**
 * @example
 * countWords("Hello world") // 2
 * countWords("") // 0
 */
export function countWords(s: string): number {
    const t = s.trim();
    if (!t) return 0;
    return t.split(/\s+/).filter(Boolean).length;
}

/**
 * Tokenizes text into a set of case-folded words.
 *
 * @example
 * tokenize("Hello World Hello") // Set { "hello", "world" }
 */
export function tokenize(text: string, minTokenLength: number = 1): Set<string> {
    return new Set(
        normalizeForSimilarity(text)
            .split(" ")
            .filter((w) => w.length >= minTokenLength)
    );
}

/**
 * Jaccard similarity of the token sets of two strings: |A ∩ B| / |A ∪ B|.
 *
 * @example
 * jaccardSimilarity("hello world", "hello there") // 0.333...
 */
export function jaccardSimilarity(a: string, b: string): number {
    const setA = tokenize(a);
    const setB = tokenize(b);

    if (setA.size === 0 && setB.size === 0) return 1;
    if (setA.size === 0 || setB.size === 0) return 0;

    let intersection = 0;
    for (const token of setA) {
        if (setB.has(token)) intersection++;
    }
    const union = setA.size + setB.size - intersection;

    return intersection / union;
}

/** Trims and shortens text for log and error previews */
export function previewText(text: string, maxLength: number = 200): string {
    const flat = text.replace(/\s+/g, " ").trim();
    return flat.length > maxLength ? `${flat.slice(0, maxLength)}...` : flat;
}
