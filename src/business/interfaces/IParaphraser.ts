import { CanonicalProductModel } from "../models/CanonicalProductModel";
import { FaqItem } from "../models/FaqModel";

export interface IParaphraser {
    /** Resolves to one item per input item, in order. Never rejects. */
    paraphrase(items: readonly FaqItem[], product: CanonicalProductModel): Promise<FaqItem[]>;
}
