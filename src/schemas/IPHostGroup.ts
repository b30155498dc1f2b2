import type { IEntitySchema } from '../interfaces';
import { list, optional, required } from './fields';

export const IPHostGroupSchema: IEntitySchema = {
    entityType: 'IPHostGroup',
    keyField: required('Name', 'name'),
    fields: [
        required('Name', 'name'),
        optional('IPFamily', 'ipFamily', 'IPv4'),
        optional('Description', 'description', ''),
        list('HostList', 'Host', 'hosts', true)
    ]
};
