import type { IEntitySchema } from '../interfaces';
import { BridgePairSchema } from './BridgePair';
import { FirewallRuleSchema } from './FirewallRule';
import { IPHostSchema } from './IPHost';
import { IPHostGroupSchema } from './IPHostGroup';
import { IPSPolicySchema } from './IPSPolicy';
import { LAGSchema } from './LAG';
import { VLANSchema } from './VLAN';
import { ZoneSchema } from './Zone';

export { BridgePairSchema, FirewallRuleSchema, IPHostSchema, IPHostGroupSchema, IPSPolicySchema, LAGSchema, VLANSchema, ZoneSchema };
export { HOST_TYPES } from './IPHost';
export { LACP_MODE } from './LAG';

export const schemas: ReadonlyArray<IEntitySchema> = [
    IPHostSchema,
    IPHostGroupSchema,
    VLANSchema,
    LAGSchema,
    BridgePairSchema,
    ZoneSchema,
    IPSPolicySchema,
    FirewallRuleSchema
];

/** Entities the appliance only reads through this client. */
export const QUERY_ONLY_ENTITIES = [
    'LocalServiceACL',
    'AdminSettings',
    'Services',
    'Interface',
    'UnicastRoute',
    'SystemServices',
    'CentralManagement',
    'Notification',
    'SyslogServers'
] as const;

export type QueryOnlyEntity = (typeof QUERY_ONLY_ENTITIES)[number];

export function findSchema(entityType: string): IEntitySchema | undefined {
    return schemas.find((schema) => schema.entityType === entityType);
}
