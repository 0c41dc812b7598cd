export const INTENTS = ["usage", "ingredients", "safety", "value", "overview", "other"] as const;

export type Intent = (typeof INTENTS)[number];

export type Question = {
    id: string;
    /** Label assigned by whoever produced the question. Not used for classification. */
    category?: string;
    text: string;
};

export type FaqItem = {
    id?: string;
    question: string;
    category: Intent;
    answer: string;
};
