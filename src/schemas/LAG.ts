import type { IEntitySchema } from '../interfaces';
import { list, optional, required, switchOn } from './fields';

export const LACP_MODE = '802.3ad(LACP)';

export const LAGSchema: IEntitySchema = {
    entityType: 'LAG',
    keyField: required('Hardware', 'hardware'),
    fields: [
        required('Name', 'name'),
        required('Hardware', 'hardware'),
        list('MemberInterface', 'Interface', 'interfaces', true),
        optional('Mode', 'mode', LACP_MODE),
        required('NetworkZone', 'zone'),
        optional('IPv4Configuration', 'ipv4Configuration', 'Enable'),
        optional('IPAssignment', 'ipAssignment', 'Static'),
        required('IPv4Address', 'ipAddress'),
        required('Netmask', 'netmask'),
        optional('MTU', 'mtu', '1500'),
        optional('MACAddress', 'mac', 'Default'),
        // hashing only applies to LACP
        switchOn('mode', {
            [LACP_MODE]: [optional('XmitHashPolicy', 'xmitHashPolicy', 'Layer2')],
            ActiveBackup: []
        })
    ]
};
