import { CustomError } from './CustomError';

export class TransportError extends CustomError {
    public readonly cause?: unknown;
    public readonly httpStatus?: number;

    public constructor(str: string, cause?: unknown, httpStatus?: number) {
        super(str, cause instanceof Error ? cause.stack ?? cause.message : '');
        this.cause = cause;
        this.httpStatus = httpStatus;
    }
}
