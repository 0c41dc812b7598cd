import { IParaphraser } from "../interfaces/IParaphraser";
import { CanonicalProductModel } from "../models/CanonicalProductModel";
import { FaqItem } from "../models/FaqModel";
import { ITextGenerationClient, TextGenerationMessage } from "../../clients/TextGenerationClient";
import { checkFactualIntegrity, cleanRewrite } from "../../utils/factualIntegrity";
import { formatPrice } from "../../utils/numbers";
import { joinList } from "../../utils/text";

export type ParaphraseGateOptions = {
    temperature: number;
    maxTokens: number;
};

const SYSTEM_PROMPT = [
    "You rephrase answers for a product FAQ page.",
    "Rephrase only. Never add, remove or change facts, numbers, prices or percentages.",
    "Do not mention studies, experts, certifications or guarantees.",
    "Reply with the rewritten answer and nothing else.",
].join(" ");

/**
 * Sends each answer to a text-generation backend and keeps the rewrite only when it
 * passes the factual-integrity check. Any failure keeps the original answer.
 */
export class ParaphraseGate implements IParaphraser {
    constructor(
        private readonly client: ITextGenerationClient,
        private readonly options: ParaphraseGateOptions
    ) {}

    async paraphrase(items: readonly FaqItem[], product: CanonicalProductModel): Promise<FaqItem[]> {
        const results: FaqItem[] = [];
        let accepted = 0;

        // one request in flight per backend
        for (const item of items) {
            const answer = await this.paraphraseOne(item, product);
            if (answer !== item.answer) accepted++;
            results.push({ ...item, answer });
        }

        console.log(
            `[ParaphraseGate] ${accepted}/${items.length} answer(s) rephrased via ${this.client.name} for product ${product.id}`
        );
        return results;
    }

    private async paraphraseOne(item: FaqItem, product: CanonicalProductModel): Promise<string> {
        let reply: string;
        try {
            reply = await this.client.generate({
                messages: this.buildMessages(item, product),
                temperature: this.options.temperature,
                maxTokens: this.options.maxTokens,
            });
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            console.warn(`[ParaphraseGate] ${this.client.name} call failed for ${item.id ?? item.question}; keeping original: ${reason}`);
            return item.answer;
        }

        const rewrite = typeof reply === "string" ? cleanRewrite(reply) : reply;
        const verdict = checkFactualIntegrity(item.answer, rewrite, {
            price: product.price,
            concentration: product.concentration,
        });
        if (!verdict.ok) {
            console.warn(`[ParaphraseGate] Rejected rewrite for ${item.id ?? item.question}: ${verdict.reason}`);
            return item.answer;
        }
        return rewrite;
    }

    private buildMessages(item: FaqItem, product: CanonicalProductModel): TextGenerationMessage[] {
        const facts = [`- Name: ${product.name}`];
        if (product.concentration) facts.push(`- Concentration: ${product.concentration}`);
        if (product.price !== null) facts.push(`- Price: ${formatPrice(product.price)}`);
        if (product.ingredients.length > 0) facts.push(`- Key ingredients: ${joinList(product.ingredients)}`);
        if (product.benefits.length > 0) facts.push(`- Benefits: ${joinList(product.benefits)}`);

        return [
            { role: "system", content: SYSTEM_PROMPT },
            {
                role: "user",
                content: `Product facts:\n${facts.join("\n")}\n\nQuestion: ${item.question}\nAnswer to rephrase: ${item.answer}`,
            },
        ];
    }
}
