// src/clients/OllamaTextGenerationClient.ts
import axios from "axios";
import { ITextGenerationClient, TextGenerationMessage, TextGenerationRequest } from "./TextGenerationClient";
import { ParaphraseBackendError } from "../business/errors/ParaphraseBackendError";

export type OllamaTextGenerationOptions = {
    baseUrl: string;
    model: string;
    timeoutMs: number;
};

// Older servers and proxies answer under one of these instead of `response`.
const TEXT_FIELDS = ["response", "content", "text", "output"] as const;

const toPrompt = (messages: TextGenerationMessage[]): string =>
    messages.map((m) => (m.role === "system" ? m.content : `User: ${m.content}`)).join("\n\n");

export class OllamaTextGenerationClient implements ITextGenerationClient {
    public readonly name = "ollama";

    constructor(private readonly options: OllamaTextGenerationOptions) {}

    async generate(request: TextGenerationRequest): Promise<string> {
        const url = `${this.options.baseUrl.replace(/\/$/, "")}/api/generate`;
        const { data } = await axios.post<unknown>(
            url,
            {
                model: request.model ?? this.options.model,
                prompt: toPrompt(request.messages),
                stream: false,
                options: {
                    temperature: request.temperature,
                    num_predict: request.maxTokens,
                },
            },
            {
                headers: { "Content-Type": "application/json" },
                timeout: this.options.timeoutMs,
            }
        );

        if (typeof data !== "object" || data === null) {
            throw new ParaphraseBackendError(this.name, "Response body was not a JSON object.");
        }
        for (const field of TEXT_FIELDS) {
            const value: unknown = Reflect.get(data, field);
            if (typeof value === "string" && value.trim()) {
                return value;
            }
        }
        throw new ParaphraseBackendError(this.name);
    }
}
