import { XMLBuilder } from 'fast-xml-parser';
import { ValidationError } from './Errors/ValidationError';

const ATTRIBUTE_PREFIX = '@_';
const TEXT_NODE = '#text';

// element and attribute names are written unescaped
const XML_NAME = /^[A-Za-z_][\w.-]*$/;

function checkName(name: string, what: string): void {
    if (!XML_NAME.test(name)) {
        throw new ValidationError(`invalid ${what} name "${name}"`);
    }
}

// ordered form understood by XMLBuilder with preserveOrder
type OrderedEntry = { [tag: string]: Array<OrderedEntry> | string | Record<string, string> };

const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    textNodeName: TEXT_NODE,
    suppressEmptyNode: false,
    format: false
});

/**
 * Ordered XML element: children and attributes are rendered in insertion order.
 */
export class XmlNode {
    private readonly attributes: Array<[string, string]> = [];
    private readonly children: Array<XmlNode> = [];

    constructor(
        readonly tag: string,
        private text?: string
    ) {
        checkName(tag, 'element');
    }

    public getText(): string | undefined {
        return this.text;
    }

    public setText(text: string): this {
        this.text = text;
        return this;
    }

    public getChildren(): ReadonlyArray<XmlNode> {
        return this.children;
    }

    public getAttributes(): ReadonlyArray<readonly [string, string]> {
        return this.attributes;
    }

    /**
     * Creates `tag` under this node and returns the new child.
     */
    public appendChild(tag: string, text?: string): XmlNode {
        const child = new XmlNode(tag, text);
        this.children.push(child);
        return child;
    }

    public setAttribute(name: string, value: string): this {
        checkName(name, 'attribute');
        const existing = this.attributes.find(([attrName]) => attrName === name);
        if (existing) {
            existing[1] = value;
        } else {
            this.attributes.push([name, value]);
        }
        return this;
    }

    public clone(): XmlNode {
        const copy = new XmlNode(this.tag, this.text);
        this.attributes.forEach(([name, value]) => copy.attributes.push([name, value]));
        this.children.forEach((child) => copy.children.push(child.clone()));
        return copy;
    }

    public serialize(): string {
        return builder.build([this.toOrdered()]);
    }

    private toOrdered(): OrderedEntry {
        const content: Array<OrderedEntry> = [];
        if (this.text) {
            content.push({ [TEXT_NODE]: this.text });
        }
        this.children.forEach((child) => content.push(child.toOrdered()));

        const entry: OrderedEntry = { [this.tag]: content };
        if (this.attributes.length) {
            entry[':@'] = Object.fromEntries(this.attributes.map(([name, value]) => [`${ATTRIBUTE_PREFIX}${name}`, value]));
        }
        return entry;
    }
}

export function newElement(tag: string): XmlNode {
    return new XmlNode(tag);
}
