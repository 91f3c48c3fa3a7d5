export class AppError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number = 500,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}
