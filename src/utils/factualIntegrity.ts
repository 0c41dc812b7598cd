export const DENYLIST = [
    "clinical",
    "clinically",
    "study",
    "studies",
    "proven",
    "fda",
    "dermatologist",
    "dermatologists",
    "guarantee",
    "guarantees",
    "guaranteed",
] as const;

const DENY_PATTERN = new RegExp(`\\b(${DENYLIST.join("|")})\\b`, "i");
const PERCENT_PATTERN = /(\d+(?:\.\d+)?)\s*%/g;
const DIGIT_GROUP_SEPARATOR = /(\d),(?=\d)/g;
const MULTI_DIGIT_NUMBER = /\b\d{2,}\b/g;

export const MIN_LENGTH_ALLOWANCE = 400;
export const LENGTH_MULTIPLIER = 3;

export type IntegrityFacts = {
    price: number | null;
    concentration: string | null;
};

export type IntegrityVerdict = { ok: true } | { ok: false; reason: string };

/** "10 %" and "10%" both yield "10%". */
export const extractPercentages = (text: string): string[] =>
    Array.from(text.matchAll(PERCENT_PATTERN), (match) => `${match[1]}%`);

/** Numbers of two or more digits, group separators ("1,299", "1,29,999") removed, percentages excluded. */
export const extractNumbers = (text: string): string[] => {
    const withoutPercentages = text.replace(PERCENT_PATTERN, " ").replace(DIGIT_GROUP_SEPARATOR, "$1");
    return withoutPercentages.match(MULTI_DIGIT_NUMBER) ?? [];
};

/**
 * Trims a backend reply and unwraps a surrounding code fence or pair of quotes.
 */
export const cleanRewrite = (text: string): string => {
    let cleaned = text.trim();
    const fenced = cleaned.match(/^```[a-z]*\s*([\s\S]*?)\s*```$/i);
    if (fenced) {
        cleaned = fenced[1].trim();
    }
    const quoted = cleaned.match(/^(["'“])([\s\S]*)(["'”])$/);
    if (quoted) {
        cleaned = quoted[2].trim();
    }
    return cleaned;
};

export const checkFactualIntegrity = (original: string, rewrite: unknown, facts: IntegrityFacts): IntegrityVerdict => {
    if (typeof rewrite !== "string" || !rewrite.trim()) {
        return { ok: false, reason: "empty rewrite" };
    }

    const denied = rewrite.match(DENY_PATTERN);
    if (denied) {
        return { ok: false, reason: `unverifiable claim "${denied[1]}"` };
    }

    if (facts.price !== null) {
        const price = String(facts.price);
        const stray = extractNumbers(rewrite).find((n) => String(Number(n)) !== price);
        if (stray) {
            return { ok: false, reason: `number ${stray} does not match the price` };
        }
    }

    const rewritePercentages = extractPercentages(rewrite);
    if (rewritePercentages.length > 0) {
        const recordPercentages = new Set(extractPercentages(facts.concentration ?? ""));
        const stray = rewritePercentages.find((p) => !recordPercentages.has(p));
        if (stray) {
            return { ok: false, reason: `percentage ${stray} is not in the record` };
        }
    }

    const limit = Math.max(MIN_LENGTH_ALLOWANCE, LENGTH_MULTIPLIER * original.length);
    if (rewrite.length > limit) {
        return { ok: false, reason: `rewrite longer than ${limit} characters` };
    }

    return { ok: true };
};
