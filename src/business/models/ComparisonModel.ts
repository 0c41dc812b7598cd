export type ProductSide = "Product A" | "Product B";

export type ComparatorMetadata = {
    generated: boolean;
    variantReason?: string;
    indices?: {
        swap: number;
        benefit: number;
        concentration: number;
        skinType: number;
        price: number;
    };
    [key: string]: unknown;
};

export type ComparatorProduct = {
    id: string;
    name: string;
    concentration: string | null;
    skinType: string[];
    ingredients: string[];
    benefits: string[];
    usage: string | null;
    sideEffects: string | null;
    price: number | null;
    metadata: ComparatorMetadata;
    /** Shallow copy of a caller-supplied comparator; absent for generated ones. */
    source?: Record<string, unknown>;
};

export type PriceDifference = {
    absolute: number | null;
    percent: number | null;
};

export type ComparisonScore = {
    ingredientOverlap: number;
    benefitOverlap: number;
    overall: number;
};

export type RecommendationRule = {
    if: string;
    choose: ProductSide;
    reason: string;
};

export type Recommendation = {
    decision: "Contextual";
    default: "Consider Product A" | "Consider Product B";
    defaultReasons: string[];
    rules: RecommendationRule[];
    decisionRationale: string[];
};

export type SidedList = {
    productA: string[];
    productB: string[];
};

export type ComparisonResult = {
    productB: ComparatorProduct;
    generated: boolean;
    generatedNote: string | null;
    sharedIngredients: string[];
    uniqueToA: string[];
    uniqueToB: string[];
    sharedBenefits: string[];
    uniqueBenefitsA: string[];
    uniqueBenefitsB: string[];
    priceA: number | null;
    priceB: number | null;
    priceDifference: PriceDifference;
    score: ComparisonScore;
    summary: string;
    valueIndicator: number;
    valueLabel: string;
    pros: SidedList;
    cons: SidedList;
    recommendation: Recommendation;
    scoreExplanation: string;
};
