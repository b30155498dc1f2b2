import { CustomError } from './CustomError';

export class AuthenticationError extends CustomError {
    public constructor(readonly status: string) {
        super(`Authentication refused : ${status}`);
    }
}
