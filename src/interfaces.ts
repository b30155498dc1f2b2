export enum Operation {
    Query = 'Get',
    Mutate = 'Set',
    Delete = 'Remove'
}

export type MutateMode = 'add' | 'update';

export type FieldMapping = Readonly<Record<string, string>> | ReadonlyMap<string, string>;

export type FieldValue = string | ReadonlyArray<string> | FieldMapping;

export type FieldValues = Readonly<Record<string, FieldValue | undefined>>;

export interface IScalarField {
    kind: 'scalar';
    tag: string;
    key: string;
    default?: string;
    required?: boolean;
}

/** Wrapper element holding one `itemTag` element per value, in caller order. */
export interface IRepeatedListField {
    kind: 'repeatedList';
    tag: string;
    itemTag: string;
    key: string;
    required?: boolean;
}

/** Wrapper element holding one `entryTag` element per mapping pair. */
export interface INestedGroupField {
    kind: 'nestedGroup';
    tag: string;
    entryTag: string;
    keyTag: string;
    valueTag: string;
    key: string;
    required?: boolean;
}

/**
 * Selects one branch from the sibling values. `undefined` from `select`
 * means no branch at all, any other result must be a declared branch.
 */
export interface IConditionalGroupField {
    kind: 'conditionalGroup';
    name: string;
    select: (values: FieldValues) => string | undefined;
    branches: Readonly<Record<string, ReadonlyArray<FieldSpec>>>;
}

/** Fixed sub-element holding further fields. */
export interface ISectionField {
    kind: 'section';
    tag: string;
    fields: ReadonlyArray<FieldSpec>;
}

export type FieldSpec = IScalarField | IRepeatedListField | INestedGroupField | IConditionalGroupField | ISectionField;

export interface IEntitySchema {
    entityType: string;
    keyField: IScalarField;
    fields: ReadonlyArray<FieldSpec>;
}

export interface IOperationStatus {
    code: string;
    message: string;
}

export type XmlValue = string | IXmlRecord | Array<XmlValue>;

export interface IXmlRecord {
    [key: string]: XmlValue;
}

export interface ITransport {
    send(url: string, skipTLSVerification: boolean): Promise<string>;
}

export interface ISessionOptions {
    username: string;
    password: string;
    address?: string;
    port?: string | number;
    strictSSL?: boolean;
    timeout?: number;
    transport?: ITransport;
}

export interface IMutateOptions {
    operation?: MutateMode;
}
