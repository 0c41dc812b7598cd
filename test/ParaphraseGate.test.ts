import { ParaphraseGate } from "../src/business/services/ParaphraseGate";
import { PassthroughParaphraser } from "../src/business/services/PassthroughParaphraser";
import { ProductRecordBuilder } from "../src/business/services/ProductRecordBuilder";
import { FaqItem } from "../src/business/models/FaqModel";
import { ITextGenerationClient } from "../src/clients/TextGenerationClient";
import { glowBoostInput } from "./fixtures/glowboost";

describe("ParaphraseGate", () => {
    const record = new ProductRecordBuilder().build(glowBoostInput);
    const items: FaqItem[] = [
        { id: "q1", question: "What is the price?", category: "value", answer: "The price is ₹699." },
        {
            id: "q2",
            question: "How do I use this product?",
            category: "usage",
            answer: "You can use it as follows: Apply 2–3 drops in the morning before sunscreen",
        },
    ];

    let generate: jest.Mock;
    let gate: ParaphraseGate;

    beforeEach(() => {
        jest.spyOn(console, "log").mockImplementation(() => undefined);
        jest.spyOn(console, "warn").mockImplementation(() => undefined);
        generate = jest.fn();
        const client: ITextGenerationClient = { name: "test", generate };
        gate = new ParaphraseGate(client, { temperature: 0.2, maxTokens: 256 });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it("replaces only the answer of an accepted rewrite", async () => {
        generate
            .mockResolvedValueOnce('"This serum costs ₹699."')
            .mockResolvedValueOnce("Use 2–3 drops each morning before sunscreen.");

        const result = await gate.paraphrase(items, record);

        expect(result).toEqual([
            { ...items[0], answer: "This serum costs ₹699." },
            { ...items[1], answer: "Use 2–3 drops each morning before sunscreen." },
        ]);
        expect(items[0].answer).toBe("The price is ₹699.");
    });

    it("sends the answer with the record's facts", async () => {
        generate.mockResolvedValue("The price is ₹699.");

        await gate.paraphrase(items.slice(0, 1), record);

        expect(generate).toHaveBeenCalledTimes(1);
        const request = generate.mock.calls[0][0];
        expect(request.temperature).toBe(0.2);
        expect(request.maxTokens).toBe(256);
        expect(request.messages[0].role).toBe("system");
        expect(request.messages[1].content).toContain("- Price: ₹699");
        expect(request.messages[1].content).toContain("Answer to rephrase: The price is ₹699.");
    });

    it("keeps the original when the rewrite changes the price", async () => {
        generate.mockResolvedValueOnce("It costs ₹799.").mockResolvedValueOnce("Clinically proven routine.");

        const result = await gate.paraphrase(items, record);

        expect(result.map((i) => i.answer)).toEqual(items.map((i) => i.answer));
    });

    it("keeps the original when the backend fails or returns nothing", async () => {
        generate.mockRejectedValueOnce(new Error("timeout of 30000ms exceeded")).mockResolvedValueOnce(undefined);

        const result = await gate.paraphrase(items, record);

        expect(result.map((i) => i.answer)).toEqual(items.map((i) => i.answer));
        expect(console.warn).toHaveBeenCalledTimes(2);
    });
});

describe("PassthroughParaphraser", () => {
    it("returns copies of the items unchanged", async () => {
        const record = new ProductRecordBuilder().build(glowBoostInput);
        const items: FaqItem[] = [{ id: "q1", question: "What is the price?", category: "value", answer: "The price is ₹699." }];

        const result = await new PassthroughParaphraser().paraphrase(items, record);

        expect(result).toEqual(items);
        expect(result[0]).not.toBe(items[0]);
    });
});
