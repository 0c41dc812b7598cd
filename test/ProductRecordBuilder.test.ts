import { ProductRecordBuilder, parsePrice, parseTagList } from "../src/business/services/ProductRecordBuilder";
import { ValidationError } from "../src/business/errors/ValidationError";
import { glowBoostInput } from "./fixtures/glowboost";

describe("ProductRecordBuilder", () => {
    const builder = new ProductRecordBuilder();

    it("resolves every field of a title-cased listing", () => {
        const record = builder.build(glowBoostInput);

        expect(record.toJSON()).toEqual({
            id: "product_001",
            name: "GlowBoost Vitamin C Serum",
            concentration: "10% Vitamin C",
            skinType: ["Oily", "Combination"],
            ingredients: ["Vitamin C", "Hyaluronic Acid"],
            benefits: ["Brightening", "Fades dark spots"],
            usage: "Apply 2–3 drops in the morning before sunscreen",
            sideEffects: "Mild tingling for sensitive skin",
            price: 699,
        });
        expect(record.raw).toBe(glowBoostInput);
    });

    it("prefers aliases in priority order and skips blank names", () => {
        expect(builder.build({ product_name: "First", Name: "Second" }).name).toBe("First");
        expect(builder.build({ name: "   ", Name: "Fallback" }).name).toBe("Fallback");
    });

    it("stringifies numeric ids", () => {
        expect(builder.build({ id: 42, name: "Serum" }).id).toBe("42");
    });

    it("never returns null list fields", () => {
        const record = builder.build({ name: "Bare Serum" });

        expect(record.skinType).toEqual([]);
        expect(record.ingredients).toEqual([]);
        expect(record.benefits).toEqual([]);
        expect(record.concentration).toBeNull();
        expect(record.usage).toBeNull();
        expect(record.price).toBeNull();
    });

    it("throws a ValidationError when no name resolves", () => {
        expect.assertions(3);
        expect(() => builder.build({ Price: "₹699" })).toThrow(ValidationError);
        try {
            builder.build({ name: "" });
        } catch (error) {
            expect(error).toBeInstanceOf(ValidationError);
            expect(error).toMatchObject({ field: "name", statusCode: 422 });
        }
    });

    it("rejects input that is not an object", () => {
        expect(() => builder.build([glowBoostInput])).toThrow(/must be a JSON object/);
        expect(() => builder.build(null)).toThrow(ValidationError);
    });
});

describe("parsePrice", () => {
    it.each([
        ["₹699", 699],
        ["1,299", 1299],
        ["Rs. 2,499", 2499],
        ["INR 450", 450],
        [699, 699],
        [12.5, 12],
    ])("reads %p as %p", (input, expected) => {
        expect(parsePrice(input)).toBe(expected);
    });

    it("returns null for missing or unusable prices", () => {
        expect(parsePrice(undefined)).toBeNull();
        expect(parsePrice("")).toBeNull();
        expect(parsePrice("free")).toBeNull();
        expect(parsePrice(-5)).toBeNull();
    });
});

describe("parseTagList", () => {
    it("splits text on commas and semicolons", () => {
        expect(parseTagList("Vitamin C; Hyaluronic Acid, Ferulic Acid")).toEqual([
            "Vitamin C",
            "Hyaluronic Acid",
            "Ferulic Acid",
        ]);
    });

    it("keeps array entries and drops blanks", () => {
        expect(parseTagList(["Dry", " ", "Normal ", 3])).toEqual(["Dry", "Normal", "3"]);
    });
});
