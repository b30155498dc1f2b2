import type { FieldSpec, IEntitySchema } from '../interfaces';
import { list, optional, required, section, switchOn } from './fields';

const matching: ReadonlyArray<FieldSpec> = [
    required('Action', 'action'),
    optional('LogTraffic', 'logTraffic', 'Enable'),
    optional('SkipLocalDestined', 'skipLocalDestined', 'Disable'),
    list('SourceZones', 'Zone', 'sourceZones'),
    list('SourceNetworks', 'Network', 'sourceNetworks'),
    list('Services', 'Service', 'services'),
    optional('Schedule', 'schedule', 'All The Time'),
    list('DestinationZones', 'Zone', 'destinationZones'),
    list('DestinationNetworks', 'Network', 'destinationNetworks')
];

const identity: ReadonlyArray<FieldSpec> = [
    required('MatchIdentity', 'matchIdentity'),
    optional('ShowCaptivePortal', 'showCaptivePortal', 'Enable'),
    list('Identity', 'Member', 'members'),
    optional('DataAccounting', 'dataAccounting', 'Disable')
];

const profiles: ReadonlyArray<FieldSpec> = [
    optional('WebFilter', 'webFilter', 'None'),
    optional('WebCategoryBaseQoSPolicy', 'webQoS', 'Revoke'),
    optional('BlockQuickQuic', 'blockQuic', 'Disable'),
    optional('ScanVirus', 'scanVirus', 'Enable'),
    optional('Sandstorm', 'sandstorm', 'Enable'),
    optional('ScanFTP', 'scanFtp', 'Disable'),
    optional('ProxyMode', 'proxyMode', 'Disable'),
    optional('DecryptHTTPS', 'decryptHttps', 'Disable'),
    optional('SourceSecurityHeartbeat', 'sourceHeartbeat', 'Disable'),
    optional('DestSecurityHeartbeat', 'destinationHeartbeat', 'Disable'),
    optional('ApplicationControl', 'applicationControl', 'None'),
    optional('ApplicationBaseQoSPolicy', 'applicationQoS', 'Revoke'),
    optional('IntrusionPrevention', 'intrusionPrevention', 'None'),
    optional('TrafficShapingPolicy', 'trafficShaping', 'None'),
    optional('ScanSMTP', 'scanSmtp', 'Disable'),
    optional('ScanSMTPS', 'scanSmtps', 'Disable'),
    optional('ScanIMAP', 'scanImap', 'Disable'),
    optional('ScanIMAPS', 'scanImaps', 'Disable'),
    optional('ScanPOP3', 'scanPop3', 'Disable'),
    optional('ScanPOP3S', 'scanPop3s', 'Disable')
];

export const FirewallRuleSchema: IEntitySchema = {
    entityType: 'FirewallRule',
    keyField: required('Name', 'name'),
    fields: [
        required('Name', 'name'),
        optional('Description', 'description', ''),
        optional('Status', 'status', 'Enable'),
        optional('IPFamily', 'ipFamily', 'IPv4'),
        optional('Position', 'position', 'top'),
        optional('PolicyType', 'policyType', 'Network'),
        switchOn('policyType', {
            Network: [section('NetworkPolicy', [...matching, ...profiles])],
            User: [section('UserPolicy', [...matching, ...identity, ...profiles])]
        })
    ]
};
