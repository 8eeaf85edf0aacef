import { HttpException, HttpStatus } from '@nestjs/common';
import { DomainError, DomainErrorCode } from '@hotel-search/shared';

const STATUS_BY_CODE: Record<DomainErrorCode, HttpStatus> = {
    INVALID_ARGUMENT: HttpStatus.BAD_REQUEST,
    NULL_ARGUMENT: HttpStatus.BAD_REQUEST,
    OUT_OF_RANGE: HttpStatus.BAD_REQUEST,
    INVALID_VALUE: HttpStatus.BAD_REQUEST,
    NOT_FOUND: HttpStatus.NOT_FOUND,
    CONFLICT: HttpStatus.CONFLICT
};

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

export function isClientError(error: unknown): boolean {
    if (error instanceof DomainError) return true;
    return error instanceof HttpException && error.getStatus() < HttpStatus.INTERNAL_SERVER_ERROR;
}

export function toHttpException(error: unknown): HttpException {
    if (error instanceof HttpException) {
        return error;
    }

    if (error instanceof DomainError) {
        const status = STATUS_BY_CODE[error.code];
        return new HttpException(
            { statusCode: status, error: error.code, message: error.message },
            status
        );
    }

    return new HttpException('Internal server error', HttpStatus.INTERNAL_SERVER_ERROR);
}
