import { Address4, Address6, AddressError } from 'ip-address';
import type { FieldMapping, FieldValues } from './interfaces';
import { LACP_MODE } from './schemas';
import { ValidationError } from './Errors/ValidationError';

export type IPFamily = 'IPv4' | 'IPv6';
export type Toggle = 'Enable' | 'Disable';

interface IHostBase {
    name: string;
    ipFamily?: IPFamily;
}

export interface ISingleHost extends IHostBase {
    hostType: 'IP';
    ipAddress: string;
}

export interface INetworkHost extends IHostBase {
    hostType: 'Network';
    ipAddress: string;
    subnet: string;
}

export interface IRangeHost extends IHostBase {
    hostType: 'IPRange';
    startIPAddress: string;
    endIPAddress: string;
}

export interface IListHost extends IHostBase {
    hostType: 'IPList';
    ipAddresses: ReadonlyArray<string>;
}

export type IPHost = ISingleHost | INetworkHost | IRangeHost | IListHost;

export interface IIPHostGroup {
    name: string;
    hosts: ReadonlyArray<string>;
    description?: string;
    ipFamily?: IPFamily;
}

export interface IVLAN {
    interface: string;
    vlanId: string;
    zone: string;
    ipAddress: string;
    netmask: string;
    ipv4Configuration?: Toggle;
    ipv4Assignment?: 'Static' | 'PPPoE' | 'DHCP';
}

export interface ILAG {
    name: string;
    interfaces: ReadonlyArray<string>;
    zone: string;
    ipAddress: string;
    netmask: string;
    mode?: typeof LACP_MODE | 'ActiveBackup';
    ipAssignment?: 'Static' | 'DHCP';
    ipv4Configuration?: Toggle;
    xmitHashPolicy?: 'Layer2' | 'Layer2+3' | 'Layer3+4';
    mtu?: string;
    mac?: string;
}

export interface IBridgePair {
    name: string;
    /** interface => zone, at least two of them */
    members: FieldMapping;
    ipAddress?: string;
    netmask?: string;
    gateway?: string;
    routingOnBridge?: Toggle;
    ipv4Assignment?: 'Static' | 'DHCP';
    ipv4Configuration?: Toggle;
    mtu?: string;
}

export type ZoneService =
    | 'https'
    | 'ssh'
    | 'clientAuthentication'
    | 'captivePortal'
    | 'ntlm'
    | 'radiusSso'
    | 'dns'
    | 'ping'
    | 'webProxy'
    | 'sslVpn'
    | 'userPortal'
    | 'dynamicRouting'
    | 'smtpRelay'
    | 'snmp';

export interface IZone {
    name: string;
    description?: string;
    type?: 'LAN' | 'WAN' | 'DMZ' | 'LOCAL' | 'VPN' | 'Discover';
    services?: Partial<Record<ZoneService, Toggle>>;
}

export interface IIPSPolicy {
    name: string;
    template: string;
    description?: string;
}

export type FirewallRuleProfile =
    | 'webFilter'
    | 'webQoS'
    | 'blockQuic'
    | 'scanVirus'
    | 'sandstorm'
    | 'scanFtp'
    | 'proxyMode'
    | 'decryptHttps'
    | 'sourceHeartbeat'
    | 'destinationHeartbeat'
    | 'applicationControl'
    | 'applicationQoS'
    | 'intrusionPrevention'
    | 'trafficShaping'
    | 'scanSmtp'
    | 'scanSmtps'
    | 'scanImap'
    | 'scanImaps'
    | 'scanPop3'
    | 'scanPop3s';

export interface IFirewallRuleIdentity {
    members: ReadonlyArray<string>;
    matchIdentity?: Toggle;
    showCaptivePortal?: Toggle;
    dataAccounting?: Toggle;
}

export interface IFirewallRule {
    name: string;
    action: 'Accept' | 'Reject' | 'Drop';
    description?: string;
    status?: Toggle;
    ipFamily?: IPFamily;
    position?: 'top' | 'bottom';
    logTraffic?: Toggle;
    skipLocalDestined?: Toggle;
    sourceZones?: ReadonlyArray<string>;
    sourceNetworks?: ReadonlyArray<string>;
    services?: ReadonlyArray<string>;
    schedule?: string;
    destinationZones?: ReadonlyArray<string>;
    destinationNetworks?: ReadonlyArray<string>;
    /** turns the rule into a user rule */
    identity?: IFirewallRuleIdentity;
    profiles?: Partial<Record<FirewallRuleProfile, string>>;
}

function checkAddress(ip: string, family: IPFamily, hostName: string): void {
    // ip-address takes a "/prefix" suffix, hosts carry their mask apart
    if (ip.includes('/')) {
        throw new ValidationError(`invalid ${family} address "${ip}" for IP host ${hostName}`);
    }

    try {
        if (family === 'IPv6') {
            new Address6(ip);
        } else {
            new Address4(ip);
        }
    } catch (e) {
        if (e instanceof AddressError) {
            throw new ValidationError(`invalid ${family} address "${ip}" for IP host ${hostName}`);
        }
        throw e;
    }
}

function checkSubnet(subnet: string, family: IPFamily, hostName: string): void {
    if (family === 'IPv4') {
        checkAddress(subnet, family, hostName);
        return;
    }

    const prefix = Number(subnet);
    if (!/^\d+$/.test(subnet) || prefix > 128) {
        throw new ValidationError(`invalid IPv6 prefix "${subnet}" for IP host ${hostName}`);
    }
}

/**
 * Checks the addresses of the host variant and flattens it to the IPHost
 * schema fields.
 */
export function ipHostValues(host: IPHost): FieldValues {
    const ipFamily = host.ipFamily ?? 'IPv4';
    const base = { name: host.name, ipFamily, hostType: host.hostType };

    switch (host.hostType) {
        case 'IP':
            checkAddress(host.ipAddress, ipFamily, host.name);
            return { ...base, ipAddress: host.ipAddress };
        case 'Network':
            checkAddress(host.ipAddress, ipFamily, host.name);
            checkSubnet(host.subnet, ipFamily, host.name);
            return { ...base, ipAddress: host.ipAddress, subnet: host.subnet };
        case 'IPRange':
            checkAddress(host.startIPAddress, ipFamily, host.name);
            checkAddress(host.endIPAddress, ipFamily, host.name);
            return { ...base, ipAddress: host.startIPAddress, subnet: host.endIPAddress };
        case 'IPList':
            if (!host.ipAddresses.length) {
                throw new ValidationError(`IP host ${host.name} needs at least one address`);
            }
            host.ipAddresses.forEach((ip) => checkAddress(ip, ipFamily, host.name));
            // the appliance wants one comma separated string, without spaces
            return { ...base, ipAddress: host.ipAddresses.join(',') };
    }
}

export function vlanValues(vlan: IVLAN): FieldValues {
    const hardware = `${vlan.interface}.${vlan.vlanId}`;
    return { ...vlan, name: hardware, hardware };
}

export function lagValues(lag: ILAG): FieldValues {
    return { ...lag, hardware: lag.name };
}

export function bridgePairValues(bridge: IBridgePair): FieldValues {
    const count = bridge.members instanceof Map ? bridge.members.size : Object.keys(bridge.members).length;
    if (count < 2) {
        throw new ValidationError(`bridge ${bridge.name} needs at least two members`);
    }

    return {
        ...bridge,
        hardware: bridge.name,
        description: `${count} Bridges`,
        gatewayName: `GW for ${bridge.name}`
    };
}

export function zoneValues(zone: IZone): FieldValues {
    const { services, ...rest } = zone;
    return { ...rest, ...services };
}

export function firewallRuleValues(rule: IFirewallRule): FieldValues {
    const { identity, profiles, ...rest } = rule;
    if (!identity) {
        return { ...rest, ...profiles, policyType: 'Network' };
    }

    return {
        ...rest,
        ...profiles,
        policyType: 'User',
        matchIdentity: identity.matchIdentity ?? 'Enable',
        members: identity.members,
        showCaptivePortal: identity.showCaptivePortal,
        dataAccounting: identity.dataAccounting
    };
}
