import type { Operation } from './interfaces';
import type { XmlNode } from './XmlNode';

/**
 * One request for the appliance. The command owns its document: it is
 * never handed out, only copies of it are.
 */
export class Command {
    constructor(
        readonly operation: Operation,
        readonly entityType: string,
        private readonly document: XmlNode
    ) {}

    public getDocument(): XmlNode {
        return this.document.clone();
    }

    public toXml(): string {
        return this.document.serialize();
    }

    public toString(): string {
        return `${this.operation} ${this.entityType}`;
    }
}
