import { injectable } from "tsyringe";
import { CanonicalProductModel, RawProductInput } from "../models/CanonicalProductModel";
import { ValidationError } from "../errors/ValidationError";
import { toText } from "../../utils/text";

export const DEFAULT_PRODUCT_ID = "product_001";

// Probed in order; the first present, non-null value wins.
export const FIELD_ALIASES = {
    id: ["id", "product_id", "productId", "Product ID"],
    name: ["product_name", "Product Name", "productName", "name", "Name"],
    concentration: ["concentration", "Concentration"],
    skinType: ["skin_type", "Skin Type", "skinType", "skin_types"],
    ingredients: ["key_ingredients", "Key Ingredients", "keyIngredients", "ingredients", "Ingredients"],
    benefits: ["benefits", "Benefits"],
    usage: ["how_to_use", "How to Use", "howToUse", "usage", "Usage"],
    sideEffects: ["side_effects", "Side Effects", "sideEffects"],
    price: ["price_inr", "price", "Price", "priceInr"],
} as const satisfies Record<string, readonly string[]>;

export const isPlainObject = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value);

export type ResolvedProductFields = {
    id: string | null;
    name: string | null;
    concentration: string | null;
    skinType: string[];
    ingredients: string[];
    benefits: string[];
    usage: string | null;
    sideEffects: string | null;
    price: number | null;
};

const probe = (raw: RawProductInput, aliases: readonly string[]): unknown => {
    for (const key of aliases) {
        const value = raw[key];
        if (value !== undefined && value !== null) {
            return value;
        }
    }
    return undefined;
};

/** Like `probe`, but keeps looking past values that do not trim to text. */
const probeText = (raw: RawProductInput, aliases: readonly string[]): string | null => {
    for (const key of aliases) {
        const text = toText(raw[key]);
        if (text) {
            return text;
        }
    }
    return null;
};

export const parseTagList = (value: unknown): string[] => {
    if (Array.isArray(value)) {
        return value.map((item) => toText(item)).filter((item): item is string => Boolean(item));
    }
    if (typeof value === "string") {
        return value
            .split(/[,;]/)
            .map((segment) => segment.trim())
            .filter((segment) => segment.length > 0);
    }
    return [];
};

/**
 * Reads a price from an integer or from text such as "₹699", "1,299" or "Rs. 2,499".
 */
export const parsePrice = (value: unknown): number | null => {
    if (typeof value === "number") {
        if (!Number.isFinite(value) || value < 0) return null;
        if (Number.isInteger(value)) return value;
    }

    const text = toText(value);
    if (!text) return null;

    const cleaned = text
        .replace(/₹/g, "")
        .replace(/\bRs\.?/gi, "")
        .replace(/\bINR\b/gi, "")
        .replace(/,/g, "");
    const match = cleaned.match(/\d+/);
    return match ? Number(match[0]) : null;
};

/**
 * Resolves every known field of a loosely keyed product object. Shared by the record
 * builder and by the comparison service for caller-supplied comparators.
 */
export const resolveProductFields = (raw: RawProductInput): ResolvedProductFields => ({
    id: probeText(raw, FIELD_ALIASES.id),
    name: probeText(raw, FIELD_ALIASES.name),
    concentration: toText(probe(raw, FIELD_ALIASES.concentration)),
    skinType: parseTagList(probe(raw, FIELD_ALIASES.skinType)),
    ingredients: parseTagList(probe(raw, FIELD_ALIASES.ingredients)),
    benefits: parseTagList(probe(raw, FIELD_ALIASES.benefits)),
    usage: toText(probe(raw, FIELD_ALIASES.usage)),
    sideEffects: toText(probe(raw, FIELD_ALIASES.sideEffects)),
    price: parsePrice(probe(raw, FIELD_ALIASES.price)),
});

@injectable()
export class ProductRecordBuilder {
    public build(input: unknown): CanonicalProductModel {
        if (!isPlainObject(input)) {
            throw new ValidationError("raw", "Product input must be a JSON object.");
        }

        const fields = resolveProductFields(input);
        if (!fields.name) {
            throw new ValidationError(
                "name",
                `Product name is required (accepted keys: ${FIELD_ALIASES.name.join(", ")}).`
            );
        }

        return new CanonicalProductModel(
            fields.id ?? DEFAULT_PRODUCT_ID,
            fields.name,
            fields.concentration,
            fields.skinType,
            fields.ingredients,
            fields.benefits,
            fields.usage,
            fields.sideEffects,
            fields.price,
            input
        );
    }
}
