import type {
    FieldMapping,
    FieldSpec,
    FieldValue,
    FieldValues,
    IConditionalGroupField,
    INestedGroupField,
    IRepeatedListField,
    IScalarField
} from './interfaces';
import { XmlNode } from './XmlNode';
import { MissingFieldError } from './Errors/MissingFieldError';
import { ValidationError } from './Errors/ValidationError';

function isList(value: FieldValue): value is ReadonlyArray<string> {
    return Array.isArray(value);
}

function isMapping(value: FieldValue): value is FieldMapping {
    return typeof value === 'object' && !Array.isArray(value);
}

function mappingEntries(value: FieldMapping): Array<[string, unknown]> {
    if (value instanceof Map) {
        return Array.from(value.entries());
    }
    return Object.entries(value);
}

/**
 * Renders the fields of one entity body.
 *
 * One serializer is used per body: it remembers the scalar values already
 * written (defaults included) so conditional groups can select their branch
 * from them.
 */
export class FieldSerializer {
    private readonly resolved: Record<string, string> = {};

    constructor(
        readonly entityType: string,
        private readonly values: FieldValues
    ) {}

    public serializeFields(parent: XmlNode, fields: ReadonlyArray<FieldSpec>): void {
        fields.forEach((field) => this.serializeField(parent, field));
    }

    public serializeField(parent: XmlNode, field: FieldSpec): void {
        switch (field.kind) {
            case 'scalar':
                this.serializeScalar(parent, field);
                break;
            case 'repeatedList':
                this.serializeList(parent, field);
                break;
            case 'nestedGroup':
                this.serializeMapping(parent, field);
                break;
            case 'conditionalGroup':
                this.serializeConditional(parent, field);
                break;
            case 'section':
                this.serializeFields(parent.appendChild(field.tag), field.fields);
                break;
        }
    }

    private serializeScalar(parent: XmlNode, field: IScalarField): void {
        const raw = this.values[field.key];
        if (raw !== undefined && typeof raw !== 'string') {
            throw new ValidationError(`field "${field.key}" of ${this.entityType} expects a string`);
        }

        const value = raw ?? field.default;
        if (value === undefined) {
            if (field.required) {
                throw new MissingFieldError(field.key, this.entityType);
            }
            return;
        }

        this.resolved[field.key] = value;
        parent.appendChild(field.tag, value);
    }

    private serializeList(parent: XmlNode, field: IRepeatedListField): void {
        const raw = this.values[field.key];
        if (raw === undefined && field.required) {
            throw new MissingFieldError(field.key, this.entityType);
        }
        if (raw !== undefined && !isList(raw)) {
            throw new ValidationError(`field "${field.key}" of ${this.entityType} expects a list`);
        }

        const items: ReadonlyArray<string> = raw ?? [];
        const wrapper = parent.appendChild(field.tag);
        items.forEach((item) => {
            if (typeof item !== 'string') {
                throw new ValidationError(`field "${field.key}" of ${this.entityType} expects a list of strings`);
            }
            wrapper.appendChild(field.itemTag, item);
        });
    }

    private serializeMapping(parent: XmlNode, field: INestedGroupField): void {
        const raw = this.values[field.key];
        if (raw === undefined && field.required) {
            throw new MissingFieldError(field.key, this.entityType);
        }
        if (raw !== undefined && !isMapping(raw)) {
            throw new ValidationError(`field "${field.key}" of ${this.entityType} expects a mapping`);
        }

        const wrapper = parent.appendChild(field.tag);
        if (!raw) {
            return;
        }

        mappingEntries(raw).forEach(([key, value]) => {
            if (typeof value !== 'string') {
                throw new ValidationError(`field "${field.key}" of ${this.entityType} expects string values, got ${typeof value} for "${key}"`);
            }
            const entry = wrapper.appendChild(field.entryTag);
            entry.appendChild(field.keyTag, key);
            entry.appendChild(field.valueTag, value);
        });
    }

    private serializeConditional(parent: XmlNode, field: IConditionalGroupField): void {
        const branchName = field.select({ ...this.values, ...this.resolved });
        if (branchName === undefined) {
            return;
        }

        if (!Object.hasOwn(field.branches, branchName)) {
            throw new ValidationError(`unsupported ${field.name} "${branchName}" for ${this.entityType}`);
        }
        this.serializeFields(parent, field.branches[branchName]);
    }
}
