import { inject, injectable } from "tsyringe";
import { CanonicalProductModel } from "../models/CanonicalProductModel";
import { FaqItem, Intent, Question } from "../models/FaqModel";
import { QuestionClassifier, SHELF_LIFE_KEYWORDS, STORAGE_KEYWORDS, COMPARISON_KEYWORDS } from "./QuestionClassifier";
import { asSentence, containsAnyKeyword, joinList, removePhrase } from "../../utils/text";
import { formatPrice } from "../../utils/numbers";

type AnswerRule = {
    name: string;
    applies: (question: string) => boolean;
    render: (product: CanonicalProductModel) => string;
};

export const FALLBACKS = {
    concentration: "Concentration information was not provided.",
    usage: "Usage information was not provided.",
    compatibility: "Compatibility with other active ingredients is not specified in the product details.",
    ingredients: "Key ingredients were not provided.",
    skinType: "Skin suitability information was not provided.",
    sideEffects: "No safety information was provided.",
    valueForMoney: "Value-for-money information was not provided.",
    price: "Price information was not provided.",
    purchase: "Purchase information was not provided.",
    storage: "Storage instructions were not provided.",
    shelfLife: "Shelf-life information was not provided.",
    comparison: "Comparison information was not provided in the product details; see the comparison page.",
    generic: "This information was not provided in the product details.",
} as const;

const always = (): boolean => true;
const mentions = (keywords: readonly string[]) => (question: string) => containsAnyKeyword(question, keywords);

const ACTIVE_KEYWORDS = ["retinol", "acid", "aha", "bha", "niacinamide", "vitamin"] as const;
const PAIRING_KEYWORDS = ["with", "combine", "mix", "together", "layer", "alongside"] as const;

const isCompatibilityQuestion = (question: string): boolean =>
    containsAnyKeyword(question, ACTIVE_KEYWORDS) && containsAnyKeyword(question, PAIRING_KEYWORDS);

const isSkinTypeQuestion = (question: string): boolean =>
    containsAnyKeyword(question, ["skin type", "suitab", "for my skin"]) ||
    /\b(oily|dry|combination|normal|sensitive|mature|acne-prone) skin\b/i.test(question);

const overviewRules: AnswerRule[] = [
    {
        name: "concentration",
        applies: mentions(["concentration", "mean", "strength"]),
        render: (p) =>
            p.concentration
                ? `The concentration "${p.concentration}" indicates the strength of the active ingredient in ${p.name}.`
                : FALLBACKS.concentration,
    },
    {
        name: "summary",
        applies: always,
        render: (p) => {
            const benefits = p.benefits.length > 0 ? joinList(p.benefits) : null;
            if (benefits && p.concentration) {
                return `${p.name} offers ${benefits} and is formulated with ${p.concentration}.`;
            }
            if (benefits) return `${p.name} offers ${benefits}.`;
            if (p.concentration) return `${p.name} is formulated with ${p.concentration}.`;
            return `${p.name}: further product details were not provided.`;
        },
    },
];

const usageRules: AnswerRule[] = [
    {
        name: "usage",
        applies: always,
        render: (p) => (p.usage ? `You can use it as follows: ${p.usage}` : FALLBACKS.usage),
    },
];

const ingredientRules: AnswerRule[] = [
    // compatibility claims are never derived, whatever the record says
    { name: "compatibility", applies: isCompatibilityQuestion, render: () => FALLBACKS.compatibility },
    {
        name: "ingredients",
        applies: always,
        render: (p) => (p.ingredients.length > 0 ? `Key ingredients: ${joinList(p.ingredients)}.` : FALLBACKS.ingredients),
    },
];

const safetyRules: AnswerRule[] = [
    {
        name: "skin-type",
        applies: isSkinTypeQuestion,
        render: (p) => (p.skinType.length > 0 ? `Suitable skin types: ${joinList(p.skinType)}.` : FALLBACKS.skinType),
    },
    {
        name: "side-effects",
        applies: always,
        render: (p) => (p.sideEffects ? `Possible side effects: ${asSentence(p.sideEffects)}` : FALLBACKS.sideEffects),
    },
];

const valueRules: AnswerRule[] = [
    {
        name: "value-for-money",
        applies: mentions(["value", "worth"]),
        render: (p) => {
            if (p.price !== null && p.benefits.length > 0) {
                return `At ${formatPrice(p.price)}, ${p.name} offers ${joinList(p.benefits)}.`;
            }
            if (p.price !== null) {
                return `${p.name} is priced at ${formatPrice(p.price)}; benefit details were not provided.`;
            }
            return FALLBACKS.valueForMoney;
        },
    },
    {
        name: "price",
        applies: mentions(["price", "cost", "how much"]),
        render: (p) => (p.price !== null ? `The price is ${formatPrice(p.price)}.` : FALLBACKS.price),
    },
    { name: "purchase", applies: always, render: () => FALLBACKS.purchase },
];

const otherRules: AnswerRule[] = [
    { name: "storage", applies: mentions(STORAGE_KEYWORDS), render: () => FALLBACKS.storage },
    { name: "shelf-life", applies: mentions(SHELF_LIFE_KEYWORDS), render: () => FALLBACKS.shelfLife },
    { name: "comparison", applies: mentions(COMPARISON_KEYWORDS), render: () => FALLBACKS.comparison },
    { name: "generic", applies: always, render: () => FALLBACKS.generic },
];

export const ANSWER_RULES: Readonly<Record<Intent, readonly AnswerRule[]>> = {
    overview: overviewRules,
    usage: usageRules,
    ingredients: ingredientRules,
    safety: safetyRules,
    value: valueRules,
    other: otherRules,
};

@injectable()
export class FaqAnswerService {
    constructor(@inject(QuestionClassifier) private readonly classifier: QuestionClassifier) {}

    /**
     * Template answer for one question. Only record fields and the fixed fallbacks
     * above ever reach the output.
     */
    public answer(intent: Intent, questionText: string, product: CanonicalProductModel): string {
        const question = questionText.trim().toLowerCase();
        const rule = ANSWER_RULES[intent].find((candidate) => candidate.applies(question));
        return rule ? rule.render(product) : FALLBACKS.generic;
    }

    /**
     * One item per question with non-blank text, in input order. The product name is
     * left out of classification so words such as "Retinol" or "Sensitive" in a name
     * do not pick the intent.
     */
    public answerAll(questions: readonly Question[], product: CanonicalProductModel): FaqItem[] {
        const items = questions
            .filter((question) => question.text.trim().length > 0)
            .map((question) => {
                const text = removePhrase(question.text, product.name);
                const category = this.classifier.classify(text);
                return {
                    id: question.id,
                    question: question.text,
                    category,
                    answer: this.answer(category, text, product),
                };
            });

        console.log(`[FaqAnswerService] Answered ${items.length} question(s) for product ${product.id}`);
        return items;
    }
}
