import type { IEntitySchema } from '../interfaces';
import { optional, required } from './fields';

export const IPSPolicySchema: IEntitySchema = {
    entityType: 'IPSPolicy',
    keyField: required('Name', 'name'),
    fields: [required('Name', 'name'), required('Template', 'template'), optional('Description', 'description', '')]
};
