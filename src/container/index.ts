import { container } from "tsyringe";
import config from "../config/config";
import { ProductRecordBuilder } from "../business/services/ProductRecordBuilder";
import { QuestionClassifier } from "../business/services/QuestionClassifier";
import { FaqAnswerService } from "../business/services/FaqAnswerService";
import { ComparisonService } from "../business/services/ComparisonService";
import { QuestionGeneratorService } from "../business/services/QuestionGeneratorService";
import { PageBuilderService } from "../business/services/PageBuilderService";
import { ContentPipelineService } from "../business/services/ContentPipelineService";
import { ArtifactWriter } from "../business/services/ArtifactWriter";
import { ParaphraseGate } from "../business/services/ParaphraseGate";
import { PassthroughParaphraser } from "../business/services/PassthroughParaphraser";
import { IParaphraser } from "../business/interfaces/IParaphraser";
import { ITextGenerationClient } from "../clients/TextGenerationClient";
import { OpenAITextGenerationClient } from "../clients/OpenAITextGenerationClient";
import { OllamaTextGenerationClient } from "../clients/OllamaTextGenerationClient";

// Register business services
container.registerSingleton(QuestionClassifier, QuestionClassifier);
container.register(ProductRecordBuilder, { useClass: ProductRecordBuilder });
container.register(FaqAnswerService, { useClass: FaqAnswerService });
container.register(ComparisonService, { useClass: ComparisonService });
container.register(QuestionGeneratorService, { useClass: QuestionGeneratorService });
container.register(PageBuilderService, { useClass: PageBuilderService });
container.register(ContentPipelineService, { useClass: ContentPipelineService });
container.register(ArtifactWriter, { useClass: ArtifactWriter });

// Text generation backend selection
const createTextGenerationClient = (): ITextGenerationClient | null => {
    switch (config.paraphraseProvider) {
        case "openai":
            if (!config.openaiApiKey) {
                throw new Error("❌ PARAPHRASE_PROVIDER=openai requires OPENAI_API_KEY in .env");
            }
            return new OpenAITextGenerationClient({
                apiKey: config.openaiApiKey,
                model: config.openaiModel,
                timeoutMs: config.paraphraseTimeoutMs,
            });
        case "ollama":
            return new OllamaTextGenerationClient({
                baseUrl: config.ollamaBaseUrl,
                model: config.ollamaModel,
                timeoutMs: config.paraphraseTimeoutMs,
            });
        case "none":
            return null;
    }
};

container.register<IParaphraser>("IParaphraser", {
    useFactory: () => {
        const client = createTextGenerationClient();
        if (!client) return new PassthroughParaphraser();
        console.log(`[container] Paraphrasing through ${client.name}`);
        return new ParaphraseGate(client, {
            temperature: config.paraphraseTemperature,
            maxTokens: config.paraphraseMaxTokens,
        });
    },
});
