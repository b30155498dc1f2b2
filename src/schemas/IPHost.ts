import type { IEntitySchema } from '../interfaces';
import { optional, required, switchOn } from './fields';

export const HOST_TYPES = ['IP', 'Network', 'IPRange', 'IPList'] as const;

/**
 * SYSTEM > Hosts and services > IP host.
 * `ipAddress` and `subnet` change meaning with `hostType`: for IPRange they
 * are the first and last address of the range.
 */
export const IPHostSchema: IEntitySchema = {
    entityType: 'IPHost',
    keyField: required('Name', 'name'),
    fields: [
        required('Name', 'name'),
        optional('IPFamily', 'ipFamily', 'IPv4'),
        optional('HostType', 'hostType', 'IP'),
        switchOn('hostType', {
            IP: [required('IPAddress', 'ipAddress')],
            Network: [required('IPAddress', 'ipAddress'), required('Subnet', 'subnet')],
            IPRange: [required('StartIPAddress', 'ipAddress'), required('EndIPAddress', 'subnet')],
            IPList: [required('ListOfIPAddresses', 'ipAddress')]
        })
    ]
};
