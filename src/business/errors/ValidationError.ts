export class ValidationError extends Error {
    public readonly field: string;
    public readonly statusCode: number;

    constructor(field: string, message: string, statusCode = 422) {
        super(message);
        this.name = "ValidationError";
        this.field = field;
        this.statusCode = statusCode;
    }
}

export default ValidationError;
