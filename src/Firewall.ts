import { Session } from './Session';
import type { IMutateOptions, IOperationStatus, ITransport, IXmlRecord, XmlValue } from './interfaces';
import { toRecords } from './ResponseInterpreter';
import {
    BridgePairSchema,
    FirewallRuleSchema,
    IPHostGroupSchema,
    IPHostSchema,
    IPSPolicySchema,
    LAGSchema,
    QueryOnlyEntity,
    VLANSchema,
    ZoneSchema
} from './schemas';
import {
    bridgePairValues,
    firewallRuleValues,
    IBridgePair,
    IFirewallRule,
    IIPHostGroup,
    IIPSPolicy,
    ILAG,
    IPHost,
    ipHostValues,
    IVLAN,
    IZone,
    lagValues,
    vlanValues,
    zoneValues
} from './firewallObjects';

/**
 * Typed access to the objects of one appliance. Every method is a single
 * request through the session.
 */
export class Firewall {
    static fromEnv(env: NodeJS.ProcessEnv = process.env, transport?: ITransport): Firewall {
        return new Firewall(Session.fromEnv(env, transport));
    }

    constructor(readonly session: Session) {}

    public async get(entityType: QueryOnlyEntity): Promise<Array<IXmlRecord>> {
        return toRecords(await this.session.query(entityType));
    }

    /** Any entity tag, the payload is returned as the appliance sent it. */
    public async getCustom(entityType: string): Promise<XmlValue | undefined> {
        return this.session.query(entityType);
    }

    // IP hosts

    public async getIPHosts(): Promise<Array<IXmlRecord>> {
        return toRecords(await this.session.query(IPHostSchema.entityType));
    }

    public async setIPHost(host: IPHost, options?: IMutateOptions): Promise<IOperationStatus> {
        return this.session.mutate(IPHostSchema, ipHostValues(host), options);
    }

    public async removeIPHost(name: string): Promise<IOperationStatus> {
        return this.session.delete(IPHostSchema, name);
    }

    public async getIPHostGroups(): Promise<Array<IXmlRecord>> {
        return toRecords(await this.session.query(IPHostGroupSchema.entityType));
    }

    public async setIPHostGroup(group: IIPHostGroup, options?: IMutateOptions): Promise<IOperationStatus> {
        return this.session.mutate(IPHostGroupSchema, { ...group }, options);
    }

    public async removeIPHostGroup(name: string): Promise<IOperationStatus> {
        return this.session.delete(IPHostGroupSchema, name);
    }

    // interfaces

    public async getVLANs(): Promise<Array<IXmlRecord>> {
        return toRecords(await this.session.query(VLANSchema.entityType));
    }

    public async setVLAN(vlan: IVLAN, options?: IMutateOptions): Promise<IOperationStatus> {
        return this.session.mutate(VLANSchema, vlanValues(vlan), options);
    }

    /** @param hardware - `<interface>.<vlanId>` */
    public async removeVLAN(hardware: string): Promise<IOperationStatus> {
        return this.session.delete(VLANSchema, hardware);
    }

    public async getLAGs(): Promise<Array<IXmlRecord>> {
        return toRecords(await this.session.query(LAGSchema.entityType));
    }

    public async setLAG(lag: ILAG, options?: IMutateOptions): Promise<IOperationStatus> {
        return this.session.mutate(LAGSchema, lagValues(lag), options);
    }

    public async removeLAG(hardware: string): Promise<IOperationStatus> {
        return this.session.delete(LAGSchema, hardware);
    }

    public async getBridgePairs(): Promise<Array<IXmlRecord>> {
        return toRecords(await this.session.query(BridgePairSchema.entityType));
    }

    public async setBridgePair(bridge: IBridgePair, options?: IMutateOptions): Promise<IOperationStatus> {
        return this.session.mutate(BridgePairSchema, bridgePairValues(bridge), options);
    }

    public async removeBridgePair(hardware: string): Promise<IOperationStatus> {
        return this.session.delete(BridgePairSchema, hardware);
    }

    public async getZones(): Promise<Array<IXmlRecord>> {
        return toRecords(await this.session.query(ZoneSchema.entityType));
    }

    public async setZone(zone: IZone, options?: IMutateOptions): Promise<IOperationStatus> {
        return this.session.mutate(ZoneSchema, zoneValues(zone), options);
    }

    public async removeZone(name: string): Promise<IOperationStatus> {
        return this.session.delete(ZoneSchema, name);
    }

    // policies

    public async getIPSPolicies(): Promise<Array<IXmlRecord>> {
        return toRecords(await this.session.query(IPSPolicySchema.entityType));
    }

    public async setIPSPolicy(policy: IIPSPolicy, options?: IMutateOptions): Promise<IOperationStatus> {
        return this.session.mutate(IPSPolicySchema, { ...policy }, options);
    }

    public async removeIPSPolicy(name: string): Promise<IOperationStatus> {
        return this.session.delete(IPSPolicySchema, name);
    }

    public async getFirewallRules(): Promise<Array<IXmlRecord>> {
        return toRecords(await this.session.query(FirewallRuleSchema.entityType));
    }

    public async setFirewallRule(rule: IFirewallRule, options?: IMutateOptions): Promise<IOperationStatus> {
        return this.session.mutate(FirewallRuleSchema, firewallRuleValues(rule), options);
    }

    public async removeFirewallRule(name: string): Promise<IOperationStatus> {
        return this.session.delete(FirewallRuleSchema, name);
    }
}
