import { CustomError } from './CustomError';

export class MissingFieldError extends CustomError {
    public constructor(readonly field: string, readonly entityType: string) {
        super(`missing value for field "${field}" of ${entityType}`);
    }
}
