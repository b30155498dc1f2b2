import type { IEntitySchema } from '../interfaces';
import { optional, required, section } from './fields';

const service = (tag: string, key: string) => optional(tag, key, 'Disable');

// sub-blocks of ApplianceAccess are read in this order by the appliance
export const ZoneSchema: IEntitySchema = {
    entityType: 'Zone',
    keyField: required('Name', 'name'),
    fields: [
        required('Name', 'name'),
        optional('Type', 'type', 'LAN'),
        optional('Description', 'description', ''),
        section('ApplianceAccess', [
            section('AdminServices', [service('HTTPS', 'https'), service('SSH', 'ssh')]),
            section('AuthenticationServices', [
                service('ClientAuthentication', 'clientAuthentication'),
                service('CaptivePortal', 'captivePortal'),
                service('NTLM', 'ntlm'),
                service('RadiusSSO', 'radiusSso')
            ]),
            section('NetworkServices', [service('DNS', 'dns'), service('Ping', 'ping')]),
            section('OtherServices', [
                service('WebProxy', 'webProxy'),
                service('SSLVPN', 'sslVpn'),
                service('UserPortal', 'userPortal'),
                service('DynamicRouting', 'dynamicRouting'),
                service('SMTPRelay', 'smtpRelay'),
                service('SNMP', 'snmp')
            ])
        ])
    ]
};
