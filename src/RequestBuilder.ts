import { Command } from './Command';
import { FieldSerializer } from './FieldSerializer';
import { FieldValues, IEntitySchema, IMutateOptions, IScalarField, Operation } from './interfaces';
import type { XmlNode } from './XmlNode';

/**
 * Source of the `<Request><Login>...</Login></Request>` envelope.
 * Every call must return a fresh tree.
 */
export interface IEnvelopeSource {
    createEnvelope(): XmlNode;
}

export class RequestBuilder {
    constructor(readonly envelopeSource: IEnvelopeSource) {}

    public buildQuery(entityType: string): Command {
        return this.build(Operation.Query, entityType, [], {});
    }

    public buildMutate(schema: IEntitySchema, values: FieldValues, options: IMutateOptions = {}): Command {
        const attributes: Array<[string, string]> = options.operation ? [['operation', options.operation]] : [];
        return this.build(Operation.Mutate, schema.entityType, schema.fields, values, attributes);
    }

    public buildDelete(schema: IEntitySchema, key: string): Command {
        const keyField: IScalarField = { ...schema.keyField, required: true };
        return this.build(Operation.Delete, schema.entityType, [keyField], { [keyField.key]: key });
    }

    /**
     * Envelope first, then `<operation><entityType>` with the fields in
     * declared order.
     */
    public build(
        operation: Operation,
        entityType: string,
        fields: IEntitySchema['fields'],
        values: FieldValues,
        operationAttributes: ReadonlyArray<readonly [string, string]> = []
    ): Command {
        const document = this.envelopeSource.createEnvelope();

        const operationNode = document.appendChild(operation);
        operationAttributes.forEach(([name, value]) => operationNode.setAttribute(name, value));

        const entityNode = operationNode.appendChild(entityType);
        new FieldSerializer(entityType, values).serializeFields(entityNode, fields);

        return new Command(operation, entityType, document);
    }
}
