import { PageBuilderService, sanitizeText, splitUsageSteps, truncateBlurb } from "../src/business/services/PageBuilderService";
import { ProductRecordBuilder } from "../src/business/services/ProductRecordBuilder";
import { glowBoostInput } from "./fixtures/glowboost";

describe("PageBuilderService", () => {
    const builder = new ProductRecordBuilder();
    const pages = new PageBuilderService();

    it("builds the product page from record fields", () => {
        const page = pages.buildProductPage(builder.build(glowBoostInput));

        expect(page).toEqual({
            id: "product_001",
            title: "GlowBoost Vitamin C Serum",
            heroBlurb: "GlowBoost Vitamin C Serum - Benefits: Brightening, Fades dark spots | 10% Vitamin C",
            highlights: [
                "Primary benefits: Brightening, Fades dark spots",
                "Key ingredients: Vitamin C, Hyaluronic Acid",
                "Concentration: 10% Vitamin C",
            ],
            priceStatement: "Priced at ₹699.",
            concentration: "10% Vitamin C",
            skinType: ["Oily", "Combination"],
            ingredients: ["Vitamin C", "Hyaluronic Acid"],
            benefits: {
                summary: "Brightening and Fades dark spots",
                items: [
                    { title: "Brightening", explanation: "Brightening effect." },
                    { title: "Fades dark spots", explanation: "Fades dark spots effect." },
                ],
            },
            usage: {
                text: "Apply 2–3 drops in the morning before sunscreen",
                steps: ["Apply 2–3 drops in the morning before sunscreen"],
            },
            sideEffects: "Mild tingling for sensitive skin",
        });
    });

    it("adds the price highlight when fewer fields are known", () => {
        const page = pages.buildProductPage(builder.build({ name: "Toner", benefits: "Hydration", price: 450 }));

        expect(page.heroBlurb).toBe("Toner - Benefits: Hydration");
        expect(page.highlights).toEqual(["Primary benefits: Hydration", "Price: ₹450"]);
    });

    it("states a missing price", () => {
        const page = pages.buildProductPage(builder.build({ name: "Toner" }));

        expect(page.heroBlurb).toBe("Toner");
        expect(page.priceStatement).toBe("Price not specified.");
        expect(page.usage).toEqual({ text: "", steps: [] });
    });

    it("wraps FAQ items and the comparison", () => {
        const record = builder.build(glowBoostInput);
        const item = { id: "q1", question: "What is the price?", category: "value" as const, answer: "The price is ₹699." };

        expect(pages.buildFaqPage(record, [item])).toEqual({ productId: "product_001", items: [item] });
    });
});

describe("page text helpers", () => {
    it("replaces bullets and drops control characters", () => {
        expect(sanitizeText("Glow•Boost\u0007·Serum")).toBe("Glow - Boost - Serum");
    });

    it("truncates long blurbs to 160 characters", () => {
        const blurb = truncateBlurb("x".repeat(170));

        expect(blurb).toHaveLength(160);
        expect(blurb.endsWith("...")).toBe(true);
        expect(truncateBlurb("x".repeat(160))).toBe("x".repeat(160));
    });

    it("splits usage on commas and semicolons", () => {
        expect(splitUsageSteps("Cleanse; tone, apply 3 drops")).toEqual(["Cleanse", "tone", "apply 3 drops"]);
    });
});
