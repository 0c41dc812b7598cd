import {
    checkFactualIntegrity,
    cleanRewrite,
    extractNumbers,
    extractPercentages,
} from "../src/utils/factualIntegrity";

describe("checkFactualIntegrity", () => {
    const facts = { price: 699, concentration: "10% Vitamin C" };

    it("accepts a faithful rewrite", () => {
        expect(checkFactualIntegrity("The price is ₹699.", "It costs ₹699.", facts)).toEqual({ ok: true });
    });

    it("rejects a different price", () => {
        expect(checkFactualIntegrity("The price is ₹699.", "It costs ₹799.", facts)).toEqual({
            ok: false,
            reason: "number 799 does not match the price",
        });
        expect(checkFactualIntegrity("The price is ₹699.", "It costs ₹1,299.", facts).ok).toBe(false);
    });

    it("rejects any other number even when the original answer has it", () => {
        const original = "Wait 30 seconds before sunscreen.";
        expect(checkFactualIntegrity(original, "Wait 30 seconds first.", facts)).toEqual({
            ok: false,
            reason: "number 30 does not match the price",
        });
    });

    it("reads Indian digit grouping as one number", () => {
        const lakhFacts = { price: 129999, concentration: null };

        expect(checkFactualIntegrity("The price is ₹129999.", "It costs ₹1,29,999.", lakhFacts)).toEqual({ ok: true });
        expect(checkFactualIntegrity("The price is ₹129999.", "It costs ₹1,39,999.", lakhFacts)).toEqual({
            ok: false,
            reason: "number 139999 does not match the price",
        });
    });

    it("rejects unverifiable claim words", () => {
        expect(checkFactualIntegrity("Brightens skin.", "Clinically proven to brighten skin.", facts)).toEqual({
            ok: false,
            reason: 'unverifiable claim "Clinically"',
        });
        expect(checkFactualIntegrity("Brightens skin.", "Recommended by the FDA.", facts).ok).toBe(false);
        expect(checkFactualIntegrity("Brightens skin.", "Results guaranteed.", facts).ok).toBe(false);
    });

    it("checks percentages against the concentration", () => {
        const original = "GlowBoost is formulated with 10% Vitamin C.";

        expect(checkFactualIntegrity(original, "It contains 10 % vitamin C.", facts)).toEqual({ ok: true });
        expect(checkFactualIntegrity(original, "It contains 15% vitamin C.", facts)).toEqual({
            ok: false,
            reason: "percentage 15% is not in the record",
        });
        expect(checkFactualIntegrity("Brightens skin.", "Brightens 5% faster.", { price: null, concentration: null }).ok).toBe(
            false
        );
    });

    it("rejects runaway length", () => {
        expect(checkFactualIntegrity("Short.", "a".repeat(401), facts)).toEqual({
            ok: false,
            reason: "rewrite longer than 400 characters",
        });
        expect(checkFactualIntegrity("Short.", "a".repeat(400), facts)).toEqual({ ok: true });
    });

    it("rejects empty or non-text rewrites", () => {
        expect(checkFactualIntegrity("Short.", "", facts).ok).toBe(false);
        expect(checkFactualIntegrity("Short.", "   ", facts).ok).toBe(false);
        expect(checkFactualIntegrity("Short.", 42, facts).ok).toBe(false);
    });
});

describe("text helpers", () => {
    it("normalizes percentages and strips thousands separators", () => {
        expect(extractPercentages("between 10 % and 12.5%")).toEqual(["10%", "12.5%"]);
        expect(extractNumbers("₹1,299 for 30 ml at 10%")).toEqual(["1299", "30"]);
        expect(extractNumbers("₹1,29,999")).toEqual(["129999"]);
    });

    it("unwraps quotes and code fences", () => {
        expect(cleanRewrite("```\nNew text\n```")).toBe("New text");
        expect(cleanRewrite('"Quoted answer."')).toBe("Quoted answer.");
        expect(cleanRewrite("  plain  ")).toBe("plain");
    });
});
