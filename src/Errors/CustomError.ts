export class CustomError extends Error {
    public readonly privateMessage: string;

    public constructor(str: string, privateMessage = '') {
        super(str);
        this.name = new.target.name;
        this.privateMessage = privateMessage || str;
    }
}
