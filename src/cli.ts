#!/usr/bin/env node
import "reflect-metadata";
import { readFile } from "fs/promises";
import { container } from "tsyringe";
import "./container";
import config from "./config/config";
import { ContentPipelineService } from "./business/services/ContentPipelineService";
import { ArtifactWriter } from "./business/services/ArtifactWriter";
import { parseQuestionBatch } from "./business/services/QuestionGeneratorService";
import { Question } from "./business/models/FaqModel";

export type CliOptions = {
    input: string;
    questions: string | null;
    outDir: string;
};

const USAGE = "Usage: product-content [--input|-i <product.json>] [--questions|-q <questions.json>] [--outdir|-o <dir>]";

const FLAGS: Record<string, keyof CliOptions> = {
    "--input": "input",
    "-i": "input",
    "--questions": "questions",
    "-q": "questions",
    "--outdir": "outDir",
    "-o": "outDir",
};

export const parseArgs = (argv: readonly string[]): CliOptions => {
    const options: CliOptions = { input: config.inputPath, questions: null, outDir: config.outputDir };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const eq = arg.indexOf("=");
        const flag = eq === -1 ? arg : arg.slice(0, eq);
        const inline = eq === -1 ? undefined : arg.slice(eq + 1);
        const key = FLAGS[flag];
        if (!key) {
            throw new Error(`Unknown argument "${arg}". ${USAGE}`);
        }
        const value = inline ?? argv[++i];
        if (value === undefined || value === "") {
            throw new Error(`Missing value for ${flag}. ${USAGE}`);
        }
        options[key] = value;
    }
    return options;
};

const readJson = async (filePath: string): Promise<unknown> => {
    const content = await readFile(filePath, "utf-8");
    try {
        return JSON.parse(content);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new Error(`${filePath} is not valid JSON: ${reason}`);
    }
};

export const main = async (argv: readonly string[]): Promise<void> => {
    const options = parseArgs(argv);
    const raw = await readJson(options.input);
    const questions: Question[] | undefined = options.questions
        ? parseQuestionBatch(await readJson(options.questions))
        : undefined;

    const pipeline = container.resolve(ContentPipelineService);
    const result = await pipeline.run(raw, questions);
    const paths = await container.resolve(ArtifactWriter).write(result.pages, options.outDir);

    for (const written of Object.values(paths)) {
        console.log(`[cli] ${written}`);
    }
};

if (require.main === module) {
    main(process.argv.slice(2)).catch((error: unknown) => {
        console.error("[cli] Pipeline failed:", error instanceof Error ? error.message : error);
        process.exit(1);
    });
}
