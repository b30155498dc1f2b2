import type {
    FieldSpec,
    FieldValues,
    IConditionalGroupField,
    INestedGroupField,
    IRepeatedListField,
    IScalarField,
    ISectionField
} from '../interfaces';

export function required(tag: string, key: string): IScalarField {
    return { kind: 'scalar', tag, key, required: true };
}

export function optional(tag: string, key: string, defaultValue?: string): IScalarField {
    return defaultValue === undefined ? { kind: 'scalar', tag, key } : { kind: 'scalar', tag, key, default: defaultValue };
}

export function list(tag: string, itemTag: string, key: string, isRequired = false): IRepeatedListField {
    return { kind: 'repeatedList', tag, itemTag, key, required: isRequired };
}

export function pairs(
    tag: string,
    entryTag: string,
    [keyTag, valueTag]: readonly [string, string],
    key: string,
    isRequired = false
): INestedGroupField {
    return { kind: 'nestedGroup', tag, entryTag, keyTag, valueTag, key, required: isRequired };
}

export function section(tag: string, fields: ReadonlyArray<FieldSpec>): ISectionField {
    return { kind: 'section', tag, fields };
}

/**
 * Branch chosen by the value of the `discriminator` scalar, which must be
 * serialized (or defaulted) before the group.
 */
export function switchOn(
    discriminator: string,
    branches: IConditionalGroupField['branches']
): IConditionalGroupField {
    return {
        kind: 'conditionalGroup',
        name: discriminator,
        select: (values: FieldValues) => {
            const value = values[discriminator];
            return typeof value === 'string' ? value : undefined;
        },
        branches
    };
}

/** Branch "present" when every key holds a non empty string, "absent" otherwise. */
export function whenAllPresent(
    name: string,
    keys: ReadonlyArray<string>,
    present: ReadonlyArray<FieldSpec>
): IConditionalGroupField {
    return {
        kind: 'conditionalGroup',
        name,
        select: (values: FieldValues) => (keys.every((key) => typeof values[key] === 'string' && values[key] !== '') ? 'present' : 'absent'),
        branches: { present, absent: [] }
    };
}
