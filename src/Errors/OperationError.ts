import { ErrorWithCode } from './ErrorWithCode';

export class OperationError extends ErrorWithCode {
    public constructor(code: string, readonly statusMessage: string, readonly entityType = '') {
        super(statusMessage, code, `${entityType || 'Response'} status ${code} : ${statusMessage}`);
    }
}
