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

/**
 * A user input, retrieved context or generated answer failed a policy check.
 * Always surfaced to the caller, never retried.
 */
export class GuardrailViolation extends AppError {
    constructor(public readonly reason: string) {
        super(reason, 400);
    }
}

export class ValidationError extends AppError {
    constructor(message: string) {
        super(message, 400);
    }
}

export class RetrievalError extends AppError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 500, options);
    }
}

export class RerankError extends AppError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 500, options);
    }
}

export class GenerationError extends AppError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 500, options);
    }
}

export class SnapshotError extends AppError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 500, options);
    }
}

export class PipelineTimeoutError extends AppError {
    constructor(public readonly stage: string, budgetMs: number) {
        super(`Request exceeded its ${budgetMs}ms budget before stage "${stage}"`, 504);
    }
}
