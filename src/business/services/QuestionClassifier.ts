import { injectable } from "tsyringe";
import { Intent } from "../models/FaqModel";
import { containsAnyKeyword } from "../../utils/text";

export type ClassificationRule = {
    /** Short label for logs and tests. */
    name: string;
    intent: Intent;
    matches: (text: string) => boolean;
};

const keywordRule = (name: string, intent: Intent, keywords: readonly string[]): ClassificationRule => ({
    name,
    intent,
    matches: (text) => containsAnyKeyword(text, keywords),
});

export const USAGE_KEYWORDS = [
    "how do i use",
    "how to use",
    "how should i use",
    "how often",
    "when to use",
    "when should i use",
    "apply",
    "application",
    "usage",
    "routine",
] as const;

// Broad "can I use ..." phrasing; checked after the ingredient and safety rules so
// "Can I use it with retinol?" and "Can I use it on sensitive skin?" keep their intent.
export const GENERAL_USAGE_KEYWORDS = ["can i use", "should i use"] as const;

export const STORAGE_KEYWORDS = ["store", "storage"] as const;
export const SHELF_LIFE_KEYWORDS = ["shelf life", "shelf-life", "expire", "expiry", "expiration"] as const;
export const COMPARISON_KEYWORDS = ["compare", "comparison", "difference", "versus", "vs"] as const;

export const VALUE_KEYWORDS = [
    "price",
    "cost",
    "how much",
    "worth",
    "value",
    "buy",
    "purchase",
    "afford",
    "expensive",
    "cheap",
] as const;

export const INGREDIENT_KEYWORDS = [
    "ingredient",
    "contain",
    "formula",
    "made of",
    "retinol",
    "acid",
    "niacinamide",
    "combine",
    "mix",
] as const;

export const SAFETY_KEYWORDS = [
    "side effect",
    "safe",
    "sensitive",
    "irritat",
    "allerg",
    "reaction",
    "suitable",
    "skin type",
    "pregnan",
    "tingl",
] as const;

export const OVERVIEW_KEYWORDS = [
    "what is",
    "what does",
    "mean",
    "concentration",
    "benefit",
    "used for",
    "about",
    "good for",
] as const;

/**
 * Evaluated top to bottom, first match wins. Storage, shelf-life and comparison
 * phrases sit above the generic "what is" overview rule so they are not swallowed by it.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
    keywordRule("usage", "usage", USAGE_KEYWORDS),
    keywordRule("storage-shelf-life-comparison", "other", [
        ...STORAGE_KEYWORDS,
        ...SHELF_LIFE_KEYWORDS,
        ...COMPARISON_KEYWORDS,
    ]),
    keywordRule("value", "value", VALUE_KEYWORDS),
    keywordRule("ingredients", "ingredients", INGREDIENT_KEYWORDS),
    keywordRule("safety", "safety", SAFETY_KEYWORDS),
    keywordRule("general-usage", "usage", GENERAL_USAGE_KEYWORDS),
    keywordRule("overview", "overview", OVERVIEW_KEYWORDS),
];

@injectable()
export class QuestionClassifier {
    public classify(questionText: string): Intent {
        const text = questionText.trim().toLowerCase();
        if (!text) return "other";

        const rule = CLASSIFICATION_RULES.find((candidate) => candidate.matches(text));
        return rule ? rule.intent : "other";
    }
}
