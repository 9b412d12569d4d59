import { AppError } from './AppError';

/**
 * A Page record is missing a required field or carries an invalid one.
 * Recoverable: only the offending page is skipped.
 */
export class ParseInputError extends AppError {
    constructor(message: string, public readonly sourceId?: string) {
        super(message, 422, 'PARSE_INPUT');
    }
}

/** The embedding or answer-generation service is unreachable or erroring. */
export class ModelUnavailableError extends AppError {
    constructor(message: string, public readonly reason?: unknown) {
        super(message, 503, 'MODEL_UNAVAILABLE');
    }
}

export class DimensionMismatchError extends AppError {
    constructor(
        public readonly expected: number,
        public readonly actual: number,
        context: string
    ) {
        super(`Dimension mismatch in ${context}: expected ${expected}, got ${actual}`, 500, 'DIMENSION_MISMATCH');
    }
}

/** The persisted vector/metadata pair is inconsistent and must be rebuilt. */
export class CorruptStoreError extends AppError {
    constructor(message: string) {
        super(message, 500, 'CORRUPT_STORE');
    }
}

export class ConfigError extends AppError {
    constructor(message: string) {
        super(message, 500, 'CONFIG');
    }
}
