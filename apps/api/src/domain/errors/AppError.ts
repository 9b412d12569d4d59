export class AppError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number = 500,
        public readonly code: string = 'APP_ERROR'
    ) {
        super(message);
        this.name = new.target.name;
    }
}
