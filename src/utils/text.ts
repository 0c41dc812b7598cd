const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const keywordPatterns = new Map<string, RegExp>();

/**
 * Case-insensitive keyword test anchored at a word start, so "store" matches
 * "stored" but not "restore".
 */
export const containsKeyword = (text: string, keyword: string): boolean => {
    let pattern = keywordPatterns.get(keyword);
    if (!pattern) {
        pattern = new RegExp(`(^|[^a-z0-9])${escapeRegExp(keyword.toLowerCase())}`, "i");
        keywordPatterns.set(keyword, pattern);
    }
    return pattern.test(text);
};

/** Removes every case-insensitive occurrence of `phrase` and collapses the leftover spacing. */
export const removePhrase = (text: string, phrase: string): string => {
    const needle = phrase.trim();
    if (!needle) return text;
    return text
        .replace(new RegExp(escapeRegExp(needle), "gi"), " ")
        .replace(/\s+/g, " ")
        .trim();
};

export const containsAnyKeyword = (text: string, keywords: readonly string[]): boolean =>
    keywords.some((keyword) => containsKeyword(text, keyword));

/**
 * Upper-cases the first letter of every alphabetic run ("anti-aging" -> "Anti-Aging").
 */
export const toTitleCase = (value: string): string =>
    value.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_match, lead: string, letter: string) => lead + letter.toUpperCase());

export const joinList = (items: readonly string[], separator = ", "): string => items.join(separator);

/** Appends a full stop unless the text already ends in sentence punctuation. */
export const asSentence = (value: string): string => {
    const trimmed = value.trim();
    return /[.!?]$/.test(trimmed) ? trimmed : `${trimmed}.`;
};

/**
 * Trims scalar input into text. Numbers and booleans are stringified; anything else,
 * and blank strings, yield null.
 */
export const toText = (value: unknown): string | null => {
    if (typeof value === "string") {
        const trimmed = value.trim();
        return trimmed.length > 0 ? trimmed : null;
    }
    if (typeof value === "number" && Number.isFinite(value)) {
        return String(value);
    }
    if (typeof value === "boolean") {
        return String(value);
    }
    return null;
};

/** Lower-cased, trimmed, blank-free copy used for set comparisons. */
export const normalizeList = (items: readonly string[]): string[] =>
    items.map((item) => item.trim().toLowerCase()).filter((item) => item.length > 0);
