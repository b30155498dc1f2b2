import { CustomError } from './CustomError';

/**
 * The reply does not match the envelope we expect.
 * The raw body is kept as private message for diagnosis.
 */
export class ParseError extends CustomError {
    public constructor(str: string, readonly raw: string) {
        super(str, raw);
    }
}
