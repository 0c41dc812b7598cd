export class ParaphraseBackendError extends Error {
    constructor(
        public readonly backend: string,
        message = "Text generation backend returned no usable text."
    ) {
        super(`[${backend}] ${message}`);
        this.name = "ParaphraseBackendError";
    }
}
