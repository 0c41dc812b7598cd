export type RawProductInput = Readonly<Record<string, unknown>>;

export class CanonicalProductModel {
    constructor(
        public readonly id: string,
        public readonly name: string,
        public readonly concentration: string | null,
        public readonly skinType: readonly string[],
        public readonly ingredients: readonly string[],
        public readonly benefits: readonly string[],
        public readonly usage: string | null,
        public readonly sideEffects: string | null,
        public readonly price: number | null,
        public readonly raw: RawProductInput
    ) {}

    toJSON() {
        return {
            id: this.id,
            name: this.name,
            concentration: this.concentration,
            skinType: [...this.skinType],
            ingredients: [...this.ingredients],
            benefits: [...this.benefits],
            usage: this.usage,
            sideEffects: this.sideEffects,
            price: this.price,
        };
    }
}
