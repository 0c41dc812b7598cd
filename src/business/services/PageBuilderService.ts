import { injectable } from "tsyringe";
import { CanonicalProductModel } from "../models/CanonicalProductModel";
import { ComparisonResult } from "../models/ComparisonModel";
import { FaqItem } from "../models/FaqModel";
import { ComparisonPage, FaqPage, ProductPage } from "../models/PageModel";
import { formatPrice } from "../../utils/numbers";
import { joinList } from "../../utils/text";

export const HERO_BLURB_MAX_LENGTH = 160;
const MAX_HIGHLIGHTS = 3;

/** Drops control characters and swaps typographic bullets for a plain separator. */
export const sanitizeText = (value: string): string =>
    value
        .replace(/[•·]/g, " - ")
        .replace(/[\u0000-\u001f]/g, "");

export const truncateBlurb = (value: string): string =>
    value.length > HERO_BLURB_MAX_LENGTH ? `${value.slice(0, HERO_BLURB_MAX_LENGTH - 3).trimEnd()}...` : value;

export const splitUsageSteps = (usage: string): string[] =>
    usage
        .split(/[,;]/)
        .map((step) => step.trim())
        .filter((step) => step.length > 0);

@injectable()
export class PageBuilderService {
    public buildProductPage(product: CanonicalProductModel): ProductPage {
        const usage = product.usage ?? "";
        return {
            id: product.id,
            title: product.name,
            heroBlurb: this.buildHeroBlurb(product),
            highlights: this.buildHighlights(product),
            priceStatement: product.price !== null ? `Priced at ${formatPrice(product.price)}.` : "Price not specified.",
            concentration: product.concentration,
            skinType: [...product.skinType],
            ingredients: [...product.ingredients],
            benefits: {
                summary: joinList(product.benefits, " and "),
                items: product.benefits.map((benefit) => ({ title: benefit, explanation: `${benefit} effect.` })),
            },
            usage: { text: usage, steps: splitUsageSteps(usage) },
            sideEffects: product.sideEffects,
        };
    }

    public buildFaqPage(product: CanonicalProductModel, items: readonly FaqItem[]): FaqPage {
        return { productId: product.id, items: items.map((item) => ({ ...item })) };
    }

    public buildComparisonPage(product: CanonicalProductModel, comparison: ComparisonResult): ComparisonPage {
        return {
            productA: { id: product.id, name: product.name, price: product.price },
            productB: {
                id: comparison.productB.id,
                name: comparison.productB.name,
                price: comparison.productB.price,
                generated: comparison.generated,
            },
            comparison,
        };
    }

    private buildHeroBlurb(product: CanonicalProductModel): string {
        const parts: string[] = [];
        if (product.benefits.length > 0) parts.push(`Benefits: ${joinList(product.benefits)}`);
        if (product.concentration) parts.push(product.concentration);

        const blurb = parts.length > 0 ? `${product.name} - ${parts.join(" | ")}` : product.name;
        return truncateBlurb(sanitizeText(blurb));
    }

    private buildHighlights(product: CanonicalProductModel): string[] {
        const highlights: string[] = [];
        if (product.benefits.length > 0) highlights.push(`Primary benefits: ${joinList(product.benefits)}`);
        if (product.ingredients.length > 0) highlights.push(`Key ingredients: ${joinList(product.ingredients)}`);
        if (product.concentration) highlights.push(`Concentration: ${product.concentration}`);
        if (product.price !== null) highlights.push(`Price: ${formatPrice(product.price)}`);
        return highlights.slice(0, MAX_HIGHLIGHTS);
    }
}
