import { injectable } from "tsyringe";
import { z } from "zod";
import { CanonicalProductModel } from "../models/CanonicalProductModel";
import { Question } from "../models/FaqModel";
import { ValidationError } from "../errors/ValidationError";

export const QUESTION_LABELS = [
    "Informational",
    "Usage",
    "Safety",
    "Ingredients",
    "Purchase",
    "Comparison",
    "Storage",
] as const;

export type QuestionLabel = (typeof QUESTION_LABELS)[number];

type QuestionTemplate = {
    category: QuestionLabel;
    text: (name: string) => string;
};

const QUESTION_TEMPLATES: readonly QuestionTemplate[] = [
    { category: "Informational", text: (name) => `What is ${name} used for?` },
    { category: "Informational", text: (name) => `What does the concentration in ${name} mean?` },
    { category: "Informational", text: (name) => `What are the main benefits of ${name}?` },
    { category: "Usage", text: () => "How do I use this product?" },
    { category: "Usage", text: () => "How often should I apply it?" },
    { category: "Usage", text: () => "Can I add it to my morning routine?" },
    { category: "Safety", text: () => "Are there any side effects?" },
    { category: "Safety", text: () => "Is it suitable for sensitive skin?" },
    { category: "Ingredients", text: () => "What are the key ingredients?" },
    { category: "Ingredients", text: () => "Can I combine it with retinol?" },
    { category: "Purchase", text: (name) => `What is the price of ${name}?` },
    { category: "Purchase", text: () => "Is it worth the price?" },
    { category: "Comparison", text: () => "How does it compare to other serums?" },
    { category: "Storage", text: () => "How should I store it?" },
    { category: "Storage", text: () => "What is the shelf life after opening?" },
];

const questionSchema = z.object({
    id: z.union([z.string(), z.number()]).optional().nullable(),
    category: z.string().optional().nullable(),
    text: z.string(),
});

const questionBatchSchema = z.union([
    z.array(questionSchema),
    z.object({ questions: z.array(questionSchema) }),
]);

/**
 * Validates an externally supplied question batch: either an array of
 * `{ text, category?, id? }` or an object wrapping one under `questions`.
 * Blank questions are dropped and missing ids become `q<n>` by position.
 */
export const parseQuestionBatch = (value: unknown): Question[] => {
    const parsed = questionBatchSchema.safeParse(value);
    if (!parsed.success) {
        throw new ValidationError("questions", "Question batch is invalid: " + parsed.error.message);
    }

    const entries = Array.isArray(parsed.data) ? parsed.data : parsed.data.questions;
    return entries
        .filter((entry) => entry.text.trim().length > 0)
        .map((entry, index) => {
            const question: Question = {
                id: entry.id !== undefined && entry.id !== null && String(entry.id).trim() ? String(entry.id).trim() : `q${index + 1}`,
                text: entry.text.trim(),
            };
            if (entry.category) question.category = entry.category;
            return question;
        });
};

@injectable()
export class QuestionGeneratorService {
    public generate(product: CanonicalProductModel): Question[] {
        return QUESTION_TEMPLATES.map((template, index) => ({
            id: `q${index + 1}`,
            category: template.category,
            text: template.text(product.name),
        }));
    }
}
