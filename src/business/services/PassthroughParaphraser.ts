import { IParaphraser } from "../interfaces/IParaphraser";
import { CanonicalProductModel } from "../models/CanonicalProductModel";
import { FaqItem } from "../models/FaqModel";

export class PassthroughParaphraser implements IParaphraser {
    async paraphrase(items: readonly FaqItem[], _product: CanonicalProductModel): Promise<FaqItem[]> {
        return items.map((item) => ({ ...item }));
    }
}
