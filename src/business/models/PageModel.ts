import { ComparisonResult } from "./ComparisonModel";
import { FaqItem } from "./FaqModel";

export type BenefitItem = {
    title: string;
    explanation: string;
};

export type ProductPage = {
    id: string;
    title: string;
    heroBlurb: string;
    highlights: string[];
    priceStatement: string;
    concentration: string | null;
    skinType: string[];
    ingredients: string[];
    benefits: {
        summary: string;
        items: BenefitItem[];
    };
    usage: {
        text: string;
        steps: string[];
    };
    sideEffects: string | null;
};

export type FaqPage = {
    productId: string;
    items: FaqItem[];
};

export type ComparisonProductSummary = {
    id: string;
    name: string;
    price: number | null;
};

export type ComparisonPage = {
    productA: ComparisonProductSummary;
    productB: ComparisonProductSummary & { generated: boolean };
    comparison: ComparisonResult;
};

export type ContentPages = {
    productPage: ProductPage;
    faq: FaqPage;
    comparisonPage: ComparisonPage;
};
