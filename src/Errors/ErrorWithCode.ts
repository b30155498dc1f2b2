import { CustomError } from './CustomError';

/**
 * Error carrying a status code reported by the appliance.
 * The code is kept as the appliance sent it ("200", "510", ...).
 */
export class ErrorWithCode extends CustomError {
    public readonly code: string;

    public constructor(str: string, code: string, privateMessage = '') {
        super(str, privateMessage);
        this.code = code;
    }
}
