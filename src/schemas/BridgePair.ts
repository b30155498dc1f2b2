import type { IEntitySchema } from '../interfaces';
import { optional, pairs, required, section, whenAllPresent } from './fields';

export const BridgePairSchema: IEntitySchema = {
    entityType: 'BridgePair',
    keyField: required('Hardware', 'hardware'),
    fields: [
        required('Name', 'name'),
        required('Hardware', 'hardware'),
        optional('Description', 'description', ''),
        optional('RoutingOnBridgePair', 'routingOnBridge', 'Disable'),
        pairs('BridgeMembers', 'Member', ['Interface', 'Zone'], 'members', true),
        whenAllPresent('static address', ['ipAddress', 'netmask', 'gateway'], [
            optional('IPv4Configuration', 'ipv4Configuration', 'Enable'),
            optional('IPv4Assignment', 'ipv4Assignment', 'Static'),
            required('IPAddress', 'ipAddress'),
            required('Netmask', 'netmask'),
            section('Gateway', [required('GatewayName', 'gatewayName'), required('GatewayIPAddress', 'gateway')])
        ]),
        optional('MTU', 'mtu', '1500')
    ]
};
