// src/config/config.ts

import dotenv from "dotenv";
dotenv.config();

export type ParaphraseProvider = "none" | "openai" | "ollama";

interface Config {
    nodeEnv: string;

    // Paraphrase backend
    paraphraseProvider: ParaphraseProvider;
    paraphraseTimeoutMs: number;
    paraphraseTemperature: number;
    paraphraseMaxTokens: number;

    // OpenAI (hosted)
    openaiApiKey?: string;
    openaiModel: string;

    // Ollama (local)
    ollamaBaseUrl: string;
    ollamaModel: string;

    // Pipeline I/O
    inputPath: string;
    outputDir: string;
}

const PROVIDERS: ParaphraseProvider[] = ["none", "openai", "ollama"];

const isTruthy = (value: string | undefined): boolean =>
    ["1", "true", "yes"].includes((value || "").trim().toLowerCase());

const toNumber = (value: string | undefined, fallback: number): number => {
    const parsed = Number(value);
    return value !== undefined && value.trim() !== "" && Number.isFinite(parsed) ? parsed : fallback;
};

const resolveProvider = (): ParaphraseProvider => {
    const explicit = (process.env.PARAPHRASE_PROVIDER || "").trim().toLowerCase();
    if (!explicit) {
        // older setups only had the USE_OLLAMA toggle
        return isTruthy(process.env.USE_OLLAMA) ? "ollama" : "none";
    }
    const match = PROVIDERS.find((p) => p === explicit);
    if (!match) {
        throw new Error(`❌ Unknown PARAPHRASE_PROVIDER "${explicit}" in .env (expected none, openai or ollama)`);
    }
    return match;
};

const resolveTimeoutMs = (): number => {
    if (process.env.PARAPHRASE_TIMEOUT_MS) {
        return toNumber(process.env.PARAPHRASE_TIMEOUT_MS, 30000);
    }
    // OLLAMA_TIMEOUT is expressed in seconds
    return toNumber(process.env.OLLAMA_TIMEOUT, 30) * 1000;
};

const config: Config = {
    nodeEnv: process.env.NODE_ENV || "development",

    paraphraseProvider: resolveProvider(),
    paraphraseTimeoutMs: resolveTimeoutMs(),
    paraphraseTemperature: toNumber(process.env.PARAPHRASE_TEMPERATURE, 0.2),
    paraphraseMaxTokens: toNumber(process.env.PARAPHRASE_MAX_TOKENS, 256),

    openaiApiKey: process.env.OPENAI_API_KEY,
    openaiModel: process.env.OPENAI_MODEL || "gpt-4o-mini",

    ollamaBaseUrl: (process.env.OLLAMA_BASE || "http://localhost:11434").replace(/\/+$/, ""),
    ollamaModel: process.env.OLLAMA_MODEL || "llama3:8b",

    inputPath: process.env.CONTENT_INPUT || "inputs/product_input.json",
    outputDir: process.env.CONTENT_OUTPUT_DIR || "outputs",
};

export default config;
