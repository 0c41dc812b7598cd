import OpenAI from "openai";
import { OpenAITextGenerationClient } from "../src/clients/OpenAITextGenerationClient";
import { ParaphraseBackendError } from "../src/business/errors/ParaphraseBackendError";

const mockCreate = jest.fn();

jest.mock("openai", () => ({
    __esModule: true,
    default: jest.fn().mockImplementation(() => ({
        chat: { completions: { create: mockCreate } },
    })),
}));

describe("OpenAITextGenerationClient", () => {
    const messages = [{ role: "user" as const, content: "Answer to rephrase: The price is ₹699." }];

    afterEach(() => {
        mockCreate.mockReset();
    });

    it("creates the SDK client without retries and with the timeout", () => {
        new OpenAITextGenerationClient({ apiKey: "test-key", model: "gpt-4o-mini", timeoutMs: 5000 });

        expect(jest.mocked(OpenAI)).toHaveBeenCalledWith({ apiKey: "test-key", timeout: 5000, maxRetries: 0 });
    });

    it("returns the first completion's text", async () => {
        mockCreate.mockResolvedValueOnce({ choices: [{ message: { content: "It costs ₹699." } }] });
        const client = new OpenAITextGenerationClient({ apiKey: "test-key", model: "gpt-4o-mini", timeoutMs: 5000 });

        await expect(client.generate({ messages, temperature: 0.2, maxTokens: 256 })).resolves.toBe("It costs ₹699.");
        expect(mockCreate).toHaveBeenCalledWith({
            model: "gpt-4o-mini",
            messages,
            temperature: 0.2,
            max_tokens: 256,
        });
    });

    it("throws when the completion is empty", async () => {
        mockCreate.mockResolvedValueOnce({ choices: [{ message: { content: null } }] });
        const client = new OpenAITextGenerationClient({ apiKey: "test-key", model: "gpt-4o-mini", timeoutMs: 5000 });

        await expect(client.generate({ messages, temperature: 0.2, maxTokens: 256 })).rejects.toBeInstanceOf(
            ParaphraseBackendError
        );
    });
});
