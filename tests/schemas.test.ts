import { FieldSerializer } from '../src/FieldSerializer';
import type { FieldValues, IEntitySchema } from '../src/interfaces';
import { XmlNode } from '../src/XmlNode';
import { BridgePairSchema, findSchema, FirewallRuleSchema, LAGSchema, ZoneSchema } from '../src/schemas';

function body(schema: IEntitySchema, values: FieldValues): XmlNode {
    const node = new XmlNode(schema.entityType);
    new FieldSerializer(schema.entityType, values).serializeFields(node, schema.fields);
    return node;
}

function tags(node: XmlNode): Array<string> {
    return node.getChildren().map((child) => child.tag);
}

function child(node: XmlNode, tag: string): XmlNode {
    const found = node.getChildren().find((c) => c.tag === tag);
    if (!found) {
        throw new Error(`no ${tag} under ${node.tag}`);
    }
    return found;
}

describe('entity schemas', () => {
    it('should find schemas by entity type', () => {
        expect(findSchema('Zone')).toBe(ZoneSchema);
        expect(findSchema('Unknown')).toBeUndefined();
    });

    describe('Zone', () => {
        it('should keep the appliance access blocks in their fixed order', () => {
            const zone = body(ZoneSchema, { name: 'SYNCORP', description: 'Lab zone', ping: 'Enable' });

            expect(tags(zone)).toEqual(['Name', 'Type', 'Description', 'ApplianceAccess']);
            const access = child(zone, 'ApplianceAccess');
            expect(tags(access)).toEqual(['AdminServices', 'AuthenticationServices', 'NetworkServices', 'OtherServices']);
            expect(child(access, 'NetworkServices').serialize()).toBe('<NetworkServices><DNS>Disable</DNS><Ping>Enable</Ping></NetworkServices>');
            expect(tags(child(access, 'OtherServices'))).toEqual(['WebProxy', 'SSLVPN', 'UserPortal', 'DynamicRouting', 'SMTPRelay', 'SNMP']);
        });
    });

    describe('LAG', () => {
        const lag = { name: 'LAG1', hardware: 'LAG1', interfaces: ['PortF', 'PortG', 'PortH'], zone: 'LAN', ipAddress: '2.1.1.10', netmask: '255.255.255.255' };
        const commonTags = ['Name', 'Hardware', 'MemberInterface', 'Mode', 'NetworkZone', 'IPv4Configuration', 'IPAssignment', 'IPv4Address', 'Netmask', 'MTU', 'MACAddress'];

        it('should add the hash policy in LACP mode', () => {
            const node = body(LAGSchema, lag);

            expect(tags(node)).toEqual([...commonTags, 'XmitHashPolicy']);
            expect(child(node, 'XmitHashPolicy').getText()).toBe('Layer2');
            expect(tags(child(node, 'MemberInterface'))).toEqual(['Interface', 'Interface', 'Interface']);
        });

        it('should leave the hash policy out in active backup mode', () => {
            expect(tags(body(LAGSchema, { ...lag, mode: 'ActiveBackup', xmitHashPolicy: 'Layer3+4' }))).toEqual(commonTags);
        });
    });

    describe('BridgePair', () => {
        const bridge = { name: 'Bridge100', hardware: 'Bridge100', members: { PortG: 'LAN', PortH: 'WAN' } };

        it('should configure the address only when address, netmask and gateway are given', () => {
            const node = body(BridgePairSchema, {
                ...bridge,
                ipAddress: '3.3.3.3',
                netmask: '255.255.255.0',
                gateway: '3.3.3.1',
                gatewayName: 'GW for Bridge100'
            });

            expect(tags(node)).toEqual([
                'Name',
                'Hardware',
                'Description',
                'RoutingOnBridgePair',
                'BridgeMembers',
                'IPv4Configuration',
                'IPv4Assignment',
                'IPAddress',
                'Netmask',
                'Gateway',
                'MTU'
            ]);
            expect(child(node, 'Gateway').serialize()).toBe(
                '<Gateway><GatewayName>GW for Bridge100</GatewayName><GatewayIPAddress>3.3.3.1</GatewayIPAddress></Gateway>'
            );
        });

        it('should skip the address block on a partial address', () => {
            const node = body(BridgePairSchema, { ...bridge, ipAddress: '3.3.3.3', netmask: '255.255.255.0' });

            expect(tags(node)).toEqual(['Name', 'Hardware', 'Description', 'RoutingOnBridgePair', 'BridgeMembers', 'MTU']);
        });
    });

    describe('FirewallRule', () => {
        it('should write a network policy by default', () => {
            const node = body(FirewallRuleSchema, { name: 'R1', action: 'Accept', sourceZones: ['LAN'], destinationZones: ['WAN'] });

            expect(tags(node)).toEqual(['Name', 'Description', 'Status', 'IPFamily', 'Position', 'PolicyType', 'NetworkPolicy']);
            const policy = child(node, 'NetworkPolicy');
            expect(tags(policy).slice(0, 9)).toEqual([
                'Action',
                'LogTraffic',
                'SkipLocalDestined',
                'SourceZones',
                'SourceNetworks',
                'Services',
                'Schedule',
                'DestinationZones',
                'DestinationNetworks'
            ]);
            expect(tags(policy)[9]).toBe('WebFilter');
            expect(tags(policy)).not.toContain('MatchIdentity');
            expect(child(policy, 'SourceZones').serialize()).toBe('<SourceZones><Zone>LAN</Zone></SourceZones>');
        });

        it('should place identity fields between matching and profiles in a user policy', () => {
            const node = body(FirewallRuleSchema, {
                name: 'R2',
                action: 'Drop',
                policyType: 'User',
                matchIdentity: 'Enable',
                members: ['Open Group']
            });

            expect(child(node, 'PolicyType').getText()).toBe('User');
            const policy = child(node, 'UserPolicy');
            expect(tags(policy).slice(8, 14)).toEqual([
                'DestinationNetworks',
                'MatchIdentity',
                'ShowCaptivePortal',
                'Identity',
                'DataAccounting',
                'WebFilter'
            ]);
            expect(tags(policy)).toHaveLength(33);
            expect(child(policy, 'Identity').serialize()).toBe('<Identity><Member>Open Group</Member></Identity>');
        });
    });
});
