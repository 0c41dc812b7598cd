import { injectable } from "tsyringe";
import { CanonicalProductModel } from "../models/CanonicalProductModel";
import {
    ComparatorMetadata,
    ComparatorProduct,
    ComparisonResult,
    ComparisonScore,
    PriceDifference,
    ProductSide,
    Recommendation,
    RecommendationRule,
    SidedList,
} from "../models/ComparisonModel";
import { isPlainObject, resolveProductFields } from "./ProductRecordBuilder";
import { normalizeList, toTitleCase } from "../../utils/text";
import { formatPrice, formatSignedPrice, roundTo } from "../../utils/numbers";
import { pickIndices, stableHash32 } from "../../utils/stableHash";

export const INGREDIENT_SWAPS = [
    ["glycerin", "niacinamide"],
    ["squalane", "glycerin"],
    ["panthenol", "glycerin"],
    ["betaine", "urea"],
] as const;

export const BENEFIT_VARIANTS = [
    ["hydration", "soothing"],
    ["anti-aging", "firming"],
    ["brightening", "even-tone"],
    ["hydration", "barrier-repair"],
] as const;

export const CONCENTRATION_OPTIONS = ["5% Vitamin C", "10% Vitamin C", "15% Vitamin C"] as const;

export const SKIN_TYPE_VARIANTS = [
    ["dry", "sensitive"],
    ["normal", "dry"],
    ["oily", "combination"],
    ["all skin types"],
] as const;

export const PRICE_MULTIPLIERS = [0.8, 1.1, 1.25, 1.5] as const;

// Carried over unchanged; awaiting product-owner confirmation, not derived from data.
export const VALUE_INDICATOR_THRESHOLD = 0.5;
export const PRICE_RULE_MIN_OVERALL = 0.6;
export const DEFAULT_TO_B_MAX_OVERALL = 0.5;

export const GENERATED_NOTE = "Product B was deterministically generated for comparison (not a real SKU).";
export const SCORE_EXPLANATION = "Scores range 0–1; higher = more similarity.";

const COMPARATOR_KEYS = ["product_b", "productB"] as const;

type ListDiff = {
    shared: string[];
    uniqueA: string[];
    uniqueB: string[];
    overlap: number;
};

/** Sorted set difference/intersection over already-normalized lists. */
const diffLists = (a: readonly string[], b: readonly string[]): Omit<ListDiff, "overlap"> => {
    const aSet = new Set(a);
    const bSet = new Set(b);
    return {
        shared: [...aSet].filter((item) => bSet.has(item)).sort(),
        uniqueA: [...aSet].filter((item) => !bSet.has(item)).sort(),
        uniqueB: [...bSet].filter((item) => !aSet.has(item)).sort(),
    };
};

/** Case-insensitive merge that keeps the first spelling seen. */
const mergeDistinct = (seed: readonly string[], additions: readonly string[]): string[] => {
    const seen = new Set(seed.map((item) => item.toLowerCase()));
    const merged = [...seed];
    for (const item of additions) {
        if (!seen.has(item.toLowerCase())) {
            seen.add(item.toLowerCase());
            merged.push(item);
        }
    }
    return merged;
};

@injectable()
export class ComparisonService {
    public compare(product: CanonicalProductModel): ComparisonResult {
        const supplied = this.findSuppliedComparator(product);
        const productB = this.backfill(supplied ?? this.synthesizeComparator(product), product);
        const generated = supplied === null;

        const ingredients = this.scoreLists(product.ingredients, productB.ingredients, "ingredient");
        const benefits = this.scoreLists(product.benefits, productB.benefits, "benefit");
        const overall = this.safeScore("overall", () => roundTo((ingredients.overlap + benefits.overlap) / 2, 3));
        const score: ComparisonScore = {
            ingredientOverlap: roundTo(ingredients.overlap, 3),
            benefitOverlap: roundTo(benefits.overlap, 3),
            overall,
        };

        const priceA = product.price;
        const priceB = productB.price;
        const priceDifference = this.priceDifference(priceA, priceB);
        const valueIndicator = this.valueIndicator(overall, priceA, priceB);

        const result: ComparisonResult = {
            productB,
            generated,
            generatedNote: generated ? GENERATED_NOTE : null,
            sharedIngredients: ingredients.shared.map(toTitleCase),
            uniqueToA: ingredients.uniqueA.map(toTitleCase),
            uniqueToB: ingredients.uniqueB.map(toTitleCase),
            sharedBenefits: benefits.shared.map(toTitleCase),
            uniqueBenefitsA: benefits.uniqueA.map(toTitleCase),
            uniqueBenefitsB: benefits.uniqueB.map(toTitleCase),
            priceA,
            priceB,
            priceDifference,
            score,
            summary: this.buildSummary(product.name, productB.name, ingredients, priceDifference),
            valueIndicator,
            valueLabel:
                valueIndicator >= VALUE_INDICATOR_THRESHOLD
                    ? "Product A offers better value"
                    : "Product B may offer better value",
            ...this.buildProsCons(ingredients, benefits, priceA, priceB),
            recommendation: this.buildRecommendation(product, productB, benefits, overall, priceA, priceB),
            scoreExplanation: SCORE_EXPLANATION,
        };

        console.log(
            `[ComparisonService] Compared ${product.id} with ${productB.id} (generated=${generated}, overall=${overall})`
        );
        return result;
    }

    /**
     * Builds the placeholder comparator for a product. A pure function of the product id
     * and fields: the same record always yields the same comparator.
     */
    public synthesizeComparator(product: CanonicalProductModel): ComparatorProduct {
        const hash = stableHash32(product.id);
        const [swapIdx, benefitIdx, concentrationIdx, skinIdx, priceIdx] = pickIndices(hash, [
            INGREDIENT_SWAPS.length,
            BENEFIT_VARIANTS.length,
            CONCENTRATION_OPTIONS.length,
            SKIN_TYPE_VARIANTS.length,
            PRICE_MULTIPLIERS.length,
        ]);

        const multiplier = PRICE_MULTIPLIERS[priceIdx];
        const metadata: ComparatorMetadata = {
            generated: true,
            variantReason: `swap_idx=${swapIdx},ben_idx=${benefitIdx},conc_idx=${concentrationIdx},skin_idx=${skinIdx},price_idx=${priceIdx}`,
            indices: {
                swap: swapIdx,
                benefit: benefitIdx,
                concentration: concentrationIdx,
                skinType: skinIdx,
                price: priceIdx,
            },
        };

        return {
            id: `generated_variant_${swapIdx}${benefitIdx}`,
            name: `${product.name} (Generated Comparator)`,
            concentration: CONCENTRATION_OPTIONS[concentrationIdx],
            skinType: [...SKIN_TYPE_VARIANTS[skinIdx]],
            ingredients: mergeDistinct(product.ingredients.slice(0, 1), INGREDIENT_SWAPS[swapIdx]),
            benefits: mergeDistinct(product.benefits.slice(0, 1), BENEFIT_VARIANTS[benefitIdx]),
            usage: product.usage,
            sideEffects: product.sideEffects,
            price: product.price === null ? null : Math.round(product.price * multiplier),
            metadata,
        };
    }

    private findSuppliedComparator(product: CanonicalProductModel): ComparatorProduct | null {
        const candidate = COMPARATOR_KEYS.map((key) => product.raw[key]).find(isPlainObject);
        if (!candidate) return null;

        const source = { ...candidate };
        const fields = resolveProductFields(source);

        return {
            id: fields.id ?? "product_b",
            name: fields.name ?? "Product B",
            concentration: fields.concentration,
            skinType: fields.skinType,
            ingredients: fields.ingredients,
            benefits: fields.benefits,
            usage: fields.usage,
            sideEffects: fields.sideEffects,
            price: fields.price,
            metadata: { generated: false },
            source,
        };
    }

    private backfill(productB: ComparatorProduct, product: CanonicalProductModel): ComparatorProduct {
        return {
            ...productB,
            concentration: productB.concentration ?? product.concentration,
            skinType: productB.skinType.length > 0 ? productB.skinType : [...product.skinType],
            usage: productB.usage ?? product.usage,
            sideEffects: productB.sideEffects ?? product.sideEffects,
        };
    }

    private scoreLists(a: readonly string[], b: readonly string[], label: string): ListDiff {
        const normalizedA = normalizeList(a);
        const normalizedB = normalizeList(b);
        const diff = diffLists(normalizedA, normalizedB);
        const overlap = this.safeScore(`${label} overlap`, () => {
            const union = new Set([...normalizedA, ...normalizedB]).size;
            return union === 0 ? 0 : diff.shared.length / union;
        });
        return { ...diff, overlap };
    }

    /**
     * Runs a score computation, degrading to 0 on a thrown error or a non-finite value.
     */
    private safeScore(label: string, compute: () => number): number {
        try {
            const value = compute();
            if (Number.isFinite(value)) return value;
            console.warn(`[ComparisonService] ${label} was not a finite number; using 0`);
        } catch (error) {
            console.warn(`[ComparisonService] ${label} failed; using 0`, error);
        }
        return 0;
    }

    private priceDifference(priceA: number | null, priceB: number | null): PriceDifference {
        if (priceA === null || priceB === null) {
            return { absolute: null, percent: null };
        }
        const absolute = priceB - priceA;
        return {
            absolute,
            percent: priceA !== 0 ? roundTo((absolute / priceA) * 100, 2) : null,
        };
    }

    /**
     * overall / (1 + |relative price delta|); with either price unknown the delta term is 0.
     */
    private valueIndicator(overall: number, priceA: number | null, priceB: number | null): number {
        return this.safeScore("value indicator", () => {
            const delta = priceA !== null && priceB !== null ? (priceB - priceA) / Math.max(1, priceA) : 0;
            return roundTo(overall / (1 + Math.abs(delta)), 3);
        });
    }

    private buildSummary(
        nameA: string,
        nameB: string,
        ingredients: ListDiff,
        priceDifference: PriceDifference
    ): string {
        const parts = [`Comparing ${nameA} and ${nameB}.`];
        if (ingredients.shared.length > 0) {
            parts.push(`Both share ingredients: ${ingredients.shared.map(toTitleCase).join(", ")}.`);
        }
        if (ingredients.uniqueA.length > 0) {
            parts.push(`Unique to A: ${ingredients.uniqueA.map(toTitleCase).join(", ")}.`);
        }
        if (ingredients.uniqueB.length > 0) {
            parts.push(`Unique to B: ${ingredients.uniqueB.map(toTitleCase).join(", ")}.`);
        }
        if (priceDifference.absolute !== null) {
            const percent = priceDifference.percent !== null ? ` (${priceDifference.percent}%)` : "";
            parts.push(`Price difference (B - A): ${formatSignedPrice(priceDifference.absolute)}${percent}.`);
        }
        return parts.join(" ");
    }

    private buildProsCons(
        ingredients: ListDiff,
        benefits: ListDiff,
        priceA: number | null,
        priceB: number | null
    ): { pros: SidedList; cons: SidedList } {
        const pros: SidedList = { productA: [], productB: [] };
        const cons: SidedList = { productA: [], productB: [] };

        if (priceA !== null && priceB !== null) {
            if (priceA < priceB) {
                pros.productA.push(`Lower price (${formatPrice(priceA)})`);
                cons.productB.push(`Higher price (${formatPrice(priceB)})`);
            } else if (priceB < priceA) {
                pros.productB.push(`Lower price (${formatPrice(priceB)})`);
                cons.productA.push(`Higher price (${formatPrice(priceA)})`);
            }
        }

        for (const ingredient of ingredients.shared.map(toTitleCase)) {
            pros.productA.push(`Provides ${ingredient}`);
            pros.productB.push(`Provides ${ingredient}`);
        }
        for (const ingredient of ingredients.uniqueA.map(toTitleCase)) {
            pros.productA.push(`Unique ingredient: ${ingredient}`);
            cons.productB.push(`Missing ${ingredient}`);
        }
        for (const ingredient of ingredients.uniqueB.map(toTitleCase)) {
            pros.productB.push(`Unique ingredient: ${ingredient}`);
            cons.productA.push(`Missing ${ingredient}`);
        }

        for (const benefit of benefits.shared.map(toTitleCase)) {
            pros.productA.push(`Provides ${benefit}`);
            pros.productB.push(`Provides ${benefit}`);
        }
        for (const benefit of benefits.uniqueA.map(toTitleCase)) {
            pros.productA.push(`Offers ${benefit}`);
        }
        for (const benefit of benefits.uniqueB.map(toTitleCase)) {
            pros.productB.push(`Offers ${benefit}`);
        }

        return { pros, cons };
    }

    private buildRecommendation(
        product: CanonicalProductModel,
        productB: ComparatorProduct,
        benefits: ListDiff,
        overall: number,
        priceA: number | null,
        priceB: number | null
    ): Recommendation {
        const rules: RecommendationRule[] = [];
        const benefitRule = (benefit: string, side: ProductSide, other: ProductSide): RecommendationRule => ({
            if: `you want ${benefit}`,
            choose: side,
            reason: `${side} lists ${benefit} while ${other} does not.`,
        });
        const skinRule = (skinType: string, side: ProductSide): RecommendationRule => ({
            if: `your skin is ${skinType}`,
            choose: side,
            reason: `${side} lists ${skinType} as suitable.`,
        });

        rules.push(...benefits.uniqueB.map(toTitleCase).map((b) => benefitRule(b, "Product B", "Product A")));
        rules.push(...benefits.uniqueA.map(toTitleCase).map((b) => benefitRule(b, "Product A", "Product B")));

        const skinTypes = diffLists(normalizeList(product.skinType), normalizeList(productB.skinType));
        rules.push(...skinTypes.uniqueB.map(toTitleCase).map((s) => skinRule(s, "Product B")));
        rules.push(...skinTypes.uniqueA.map(toTitleCase).map((s) => skinRule(s, "Product A")));

        if (overall >= PRICE_RULE_MIN_OVERALL && priceA !== null && priceB !== null) {
            const cheaper: ProductSide = priceA <= priceB ? "Product A" : "Product B";
            rules.push({
                if: "you prioritize price and products are similar",
                choose: cheaper,
                reason: `Products are similar (overall=${overall}). ${cheaper} is cheaper.`,
            });
        }

        const preferB = benefits.uniqueB.length > 0 && overall < DEFAULT_TO_B_MAX_OVERALL;
        return {
            decision: "Contextual",
            default: preferB ? "Consider Product B" : "Consider Product A",
            defaultReasons: preferB
                ? ["Product B offers distinct benefits not present in Product A."]
                : ["No strong preference matched; defaulting to Product A."],
            rules,
            decisionRationale:
                overall >= PRICE_RULE_MIN_OVERALL
                    ? [`Products are fairly similar (overall=${overall}). Consider price and specific preferences.`]
                    : [`Products differ (overall=${overall}). Follow contextual rules above.`],
        };
    }
}
