import type { IEntitySchema } from '../interfaces';
import { optional, required } from './fields';

export const VLANSchema: IEntitySchema = {
    entityType: 'VLAN',
    keyField: required('Hardware', 'hardware'),
    fields: [
        required('Name', 'name'),
        required('Hardware', 'hardware'),
        required('Interface', 'interface'),
        required('Zone', 'zone'),
        required('VLANID', 'vlanId'),
        optional('IPv4Configuration', 'ipv4Configuration', 'Enable'),
        optional('IPv4Assignment', 'ipv4Assignment', 'Static'),
        required('IPAddress', 'ipAddress'),
        required('Netmask', 'netmask')
    ]
};
