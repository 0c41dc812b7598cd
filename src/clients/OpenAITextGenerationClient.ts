// src/clients/OpenAITextGenerationClient.ts
import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat";
import { ITextGenerationClient, TextGenerationRequest } from "./TextGenerationClient";
import { ParaphraseBackendError } from "../business/errors/ParaphraseBackendError";

export type OpenAITextGenerationOptions = {
    apiKey: string;
    model: string;
    timeoutMs: number;
};

export class OpenAITextGenerationClient implements ITextGenerationClient {
    public readonly name = "openai";
    private readonly openai: OpenAI;

    constructor(private readonly options: OpenAITextGenerationOptions) {
        // one attempt per item; a failed call falls back to the original answer
        this.openai = new OpenAI({
            apiKey: options.apiKey,
            timeout: options.timeoutMs,
            maxRetries: 0,
        });
    }

    async generate(request: TextGenerationRequest): Promise<string> {
        const messages: ChatCompletionMessageParam[] = request.messages.map((m) =>
            m.role === "system" ? { role: "system", content: m.content } : { role: "user", content: m.content }
        );

        const completion = await this.openai.chat.completions.create({
            model: request.model ?? this.options.model,
            messages,
            temperature: request.temperature,
            max_tokens: request.maxTokens,
        });

        const content = completion.choices[0]?.message?.content;
        if (typeof content !== "string" || !content.trim()) {
            throw new ParaphraseBackendError(this.name);
        }
        return content;
    }
}
