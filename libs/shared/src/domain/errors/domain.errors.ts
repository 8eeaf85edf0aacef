export type DomainErrorCode =
    | 'INVALID_ARGUMENT'
    | 'NULL_ARGUMENT'
    | 'OUT_OF_RANGE'
    | 'INVALID_VALUE'
    | 'NOT_FOUND'
    | 'CONFLICT';

export class DomainError extends Error {
    constructor(message: string, public readonly code: DomainErrorCode) {
        super(message);
        this.name = 'DomainError';
    }
}

/** Malformed input independent of numeric range, e.g. an empty name. */
export class InvalidArgumentError extends DomainError {
    constructor(message: string, public readonly argument?: string, code: DomainErrorCode = 'INVALID_ARGUMENT') {
        super(message, code);
        this.name = 'InvalidArgumentError';
    }
}

export class NullArgumentError extends InvalidArgumentError {
    constructor(argument: string) {
        super(`${argument} is required`, argument, 'NULL_ARGUMENT');
        this.name = 'NullArgumentError';
    }
}

/** A numeric value outside its documented bounds. */
export class OutOfRangeError extends DomainError {
    constructor(
        message: string,
        public readonly argument?: string,
        public readonly value?: number,
        code: DomainErrorCode = 'OUT_OF_RANGE'
    ) {
        super(message, code);
        this.name = 'OutOfRangeError';
    }
}

/** NaN or an infinity where a finite number is required. */
export class InvalidValueError extends OutOfRangeError {
    constructor(argument: string, value: number) {
        super(`${argument} must be a finite number`, argument, value, 'INVALID_VALUE');
        this.name = 'InvalidValueError';
    }
}

export class NotFoundError extends DomainError {
    constructor(resource: string, id: string) {
        super(`${resource} with id ${id} not found`, 'NOT_FOUND');
        this.name = 'NotFoundError';
    }
}

export class ConflictError extends DomainError {
    constructor(resource: string, id: string) {
        super(`${resource} with id ${id} already exists`, 'CONFLICT');
        this.name = 'ConflictError';
    }
}
