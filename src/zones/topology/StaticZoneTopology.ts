import {
  LocalZoneConfig,
  LocalZoneGroup,
  ZoneDescriptor,
  ZoneGroup,
  ZoneTopologyService
} from '../types';

export interface StaticZoneTopologyConfig {
  localZoneId: string;
  localZoneGroupId: string;
  zoneGroups: ZoneGroup[];
  local: LocalZoneConfig;
  dataNotifyZoneIds?: string[];
}

/**
 * Topology service over a fixed set of zone groups. Foreign zones of the
 * local group are the zones of every other group.
 */
export class StaticZoneTopology implements ZoneTopologyService {
  private readonly groupsByZone = new Map<string, ZoneGroup>();
  private readonly zoneIdsByName = new Map<string, string>();
  private readonly localGroup: LocalZoneGroup;

  constructor(private readonly config: StaticZoneTopologyConfig) {
    for (const group of config.zoneGroups) {
      for (const zone of group.zones) {
        if (this.groupsByZone.has(zone.id)) {
          throw new Error(`Zone ${zone.id} is a member of more than one zone group`);
        }
        this.groupsByZone.set(zone.id, group);
        this.zoneIdsByName.set(zone.name, zone.id);
      }
    }

    const local = config.zoneGroups.find(group => group.id === config.localZoneGroupId);
    if (!local) {
      throw new Error(`Unknown local zone group ${config.localZoneGroupId}`);
    }

    const foreignZones: ZoneDescriptor[] = config.zoneGroups
      .filter(group => group.id !== local.id)
      .flatMap(group => group.zones);

    this.localGroup = {
      id: local.id,
      apiName: local.apiName,
      memberZones: local.zones,
      foreignZones,
      dataNotifyZoneIds: new Set(config.dataNotifyZoneIds ?? [])
    };
  }

  localZoneId(): string {
    return this.config.localZoneId;
  }

  localZoneGroup(): LocalZoneGroup {
    return this.localGroup;
  }

  zoneGroupOf(zoneId: string): ZoneGroup | undefined {
    return this.groupsByZone.get(zoneId);
  }

  findZoneIdByName(name: string): string | undefined {
    return this.zoneIdsByName.get(name);
  }

  localZoneConfig(): LocalZoneConfig {
    return this.config.local;
  }
}
