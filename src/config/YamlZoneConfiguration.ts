import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import { EventEmitter } from 'events';
import { toCredentialReference } from '../zones/credentials/CredentialResolver';
import { InMemoryCredentialStore } from '../zones/credentials/InMemoryCredentialStore';
import { StaticZoneTopology } from '../zones/topology/StaticZoneTopology';
import { ChannelConfig, ZoneDescriptor, ZoneGroup } from '../zones/types';

/**
 * YAML zone topology schema
 */
export interface YamlChannelConfig {
  endpoints?: string[];
  access_key?: string;
  secret?: string;
  uid?: string;
}

export interface YamlZoneConfig {
  id: string;
  name: string;
  endpoints: string[];

  /** Receives data-change notifications from the local zone */
  data_notify?: boolean;

  data_access?: YamlChannelConfig;
  sip?: YamlChannelConfig;
}

export interface YamlLocalConfig {
  zone_id: string;
  zonegroup_id: string;
  system_key: { id: string; secret: string };
  redirect_zone?: string;
}

export interface YamlZoneTopologyConfig {
  local: YamlLocalConfig;

  zonegroups: Array<{
    id: string;
    name: string;
    api_name?: string;
    zones: YamlZoneConfig[];
  }>;

  users?: Array<{
    uid: string;
    keys: Array<{ id: string; secret: string }>;
  }>;

  /** Environment-specific overrides of the local zone settings */
  environments?: {
    [env: string]: { local?: Partial<YamlLocalConfig> };
  };
}

type YamlRecord = Record<string, unknown>;

function isRecord(value: unknown): value is YamlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(record: YamlRecord, key: string, path: string): string {
  const value = record[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${path}.${key} is required`);
  }
  return value;
}

function optionalString(record: YamlRecord, key: string, path: string): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new Error(`${path}.${key} must be a string`);
  }
  return value;
}

function stringArray(value: unknown, path: string): string[] {
  if (!Array.isArray(value)) {
    throw new Error(`${path} must be an array`);
  }
  return value.map((entry, index) => {
    if (typeof entry !== 'string') {
      throw new Error(`${path}[${index}] must be a string`);
    }
    return entry;
  });
}

function requireRecord(value: unknown, path: string): YamlRecord {
  if (!isRecord(value)) {
    throw new Error(`${path} is required`);
  }
  return value;
}

/**
 * Loader for zone topology documents. Produces the topology service and
 * credential store the zone connection directory is bound to.
 */
export class YamlZoneConfiguration extends EventEmitter {
  private baseConfig: YamlZoneTopologyConfig | null = null;
  private config: YamlZoneTopologyConfig | null = null;
  private currentEnvironment: string;

  constructor(environment: string = 'development') {
    super();
    this.currentEnvironment = environment;
  }

  /**
   * Load configuration from YAML file
   */
  async loadFromFile(filePath: string): Promise<void> {
    try {
      const yamlContent = await fs.readFile(filePath, 'utf8');
      this.load(this.parseFromYaml(yamlContent));
      this.emit('config-loaded', { filePath, config: this.config });
    } catch (error) {
      this.emit('config-error', { filePath, error });
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load zone topology from ${filePath}: ${errorMessage}`);
    }
  }

  /**
   * Load an already parsed configuration
   */
  load(config: YamlZoneTopologyConfig): void {
    this.baseConfig = config;
    this.config = this.applyEnvironmentOverrides(config);
  }

  /**
   * Parse YAML content into configuration object
   */
  parseFromYaml(yamlContent: string): YamlZoneTopologyConfig {
    try {
      return this.validateConfiguration(yaml.load(yamlContent));
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse zone topology: ${errorMessage}`);
    }
  }

  toTopology(): StaticZoneTopology {
    const config = this.requireConfig();

    const zoneGroups: ZoneGroup[] = config.zonegroups.map(group => ({
      id: group.id,
      name: group.name,
      apiName: group.api_name,
      zones: group.zones.map(zone => this.toZoneDescriptor(zone))
    }));

    const dataNotifyZoneIds = config.zonegroups
      .filter(group => group.id === config.local.zonegroup_id)
      .flatMap(group => group.zones)
      .filter(zone => zone.data_notify === true)
      .map(zone => zone.id);

    return new StaticZoneTopology({
      localZoneId: config.local.zone_id,
      localZoneGroupId: config.local.zonegroup_id,
      zoneGroups,
      local: {
        systemKey: { ...config.local.system_key },
        redirectZoneId: config.local.redirect_zone
      },
      dataNotifyZoneIds
    });
  }

  toCredentialStore(): InMemoryCredentialStore {
    const config = this.requireConfig();
    const store = new InMemoryCredentialStore();

    for (const user of config.users ?? []) {
      store.addUser(user.uid, user.keys);
    }

    return store;
  }

  /**
   * Save configuration to YAML file
   */
  async saveToFile(filePath: string): Promise<void> {
    if (!this.baseConfig) {
      throw new Error('No configuration to save');
    }

    try {
      const yamlContent = yaml.dump(this.baseConfig, {
        indent: 2,
        lineWidth: 100,
        quotingType: '"',
        forceQuotes: false,
        skipInvalid: true
      });

      await fs.writeFile(filePath, yamlContent, 'utf8');
      this.emit('config-saved', { filePath });
    } catch (error) {
      this.emit('config-error', { filePath, error });
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to save zone topology to ${filePath}: ${errorMessage}`);
    }
  }

  /**
   * Get current configuration, with environment overrides applied
   */
  getConfig(): YamlZoneTopologyConfig | null {
    return this.config;
  }

  /**
   * Set environment for configuration overrides
   */
  setEnvironment(environment: string): void {
    this.currentEnvironment = environment;
    if (this.baseConfig) {
      this.config = this.applyEnvironmentOverrides(this.baseConfig);
    }
  }

  private requireConfig(): YamlZoneTopologyConfig {
    if (!this.config) {
      throw new Error('No configuration loaded');
    }
    return this.config;
  }

  private toZoneDescriptor(zone: YamlZoneConfig): ZoneDescriptor {
    return {
      id: zone.id,
      name: zone.name,
      endpoints: [...zone.endpoints],
      dataAccess: zone.data_access ? this.toChannelConfig(zone.data_access) : undefined,
      sip: zone.sip ? this.toChannelConfig(zone.sip) : undefined
    };
  }

  private toChannelConfig(channel: YamlChannelConfig): ChannelConfig {
    return {
      endpoints: channel.endpoints ? [...channel.endpoints] : undefined,
      credentials: toCredentialReference({
        uid: channel.uid,
        accessKey: channel.access_key,
        secret: channel.secret
      })
    };
  }

  /**
   * Validate configuration structure
   */
  private validateConfiguration(raw: unknown): YamlZoneTopologyConfig {
    const root = requireRecord(raw, 'configuration');
    const localRecord = requireRecord(root.local, 'local');
    const local = this.validateLocal(localRecord, 'local');

    if (!Array.isArray(root.zonegroups) || root.zonegroups.length === 0) {
      throw new Error('zonegroups array is required and must not be empty');
    }

    const zonegroups = root.zonegroups.map((entry: unknown, index: number) => {
      const path = `zonegroups[${index}]`;
      const group = requireRecord(entry, path);
      const zones = group.zones === undefined ? [] : group.zones;
      if (!Array.isArray(zones)) {
        throw new Error(`${path}.zones must be an array`);
      }
      return {
        id: requireString(group, 'id', path),
        name: requireString(group, 'name', path),
        api_name: optionalString(group, 'api_name', path),
        zones: zones.map((zone: unknown, zoneIndex: number) => this.validateZone(zone, `${path}.zones[${zoneIndex}]`))
      };
    });

    if (!zonegroups.some(group => group.id === local.zonegroup_id)) {
      throw new Error(`local.zonegroup_id ${local.zonegroup_id} does not name a zone group`);
    }

    const users = root.users === undefined ? [] : root.users;
    if (!Array.isArray(users)) {
      throw new Error('users must be an array');
    }

    const config: YamlZoneTopologyConfig = {
      local,
      zonegroups,
      users: users.map((entry: unknown, index: number) => {
        const path = `users[${index}]`;
        const user = requireRecord(entry, path);
        const keys = user.keys === undefined ? [] : user.keys;
        if (!Array.isArray(keys)) {
          throw new Error(`${path}.keys must be an array`);
        }
        return {
          uid: requireString(user, 'uid', path),
          keys: keys.map((key: unknown, keyIndex: number) => this.validateKey(key, `${path}.keys[${keyIndex}]`))
        };
      })
    };

    if (root.environments !== undefined) {
      const environments = requireRecord(root.environments, 'environments');
      config.environments = {};
      for (const [env, override] of Object.entries(environments)) {
        const path = `environments.${env}`;
        const overrideRecord = requireRecord(override, path);
        config.environments[env] = overrideRecord.local === undefined
          ? {}
          : { local: this.validateLocalOverride(requireRecord(overrideRecord.local, `${path}.local`), `${path}.local`) };
      }
    }

    return config;
  }

  private validateLocal(record: YamlRecord, path: string): YamlLocalConfig {
    return {
      zone_id: requireString(record, 'zone_id', path),
      zonegroup_id: requireString(record, 'zonegroup_id', path),
      system_key: this.validateKey(requireRecord(record.system_key, `${path}.system_key`), `${path}.system_key`),
      redirect_zone: optionalString(record, 'redirect_zone', path)
    };
  }

  private validateLocalOverride(record: YamlRecord, path: string): Partial<YamlLocalConfig> {
    const override: Partial<YamlLocalConfig> = {};
    const zoneId = optionalString(record, 'zone_id', path);
    const zonegroupId = optionalString(record, 'zonegroup_id', path);
    const redirectZone = optionalString(record, 'redirect_zone', path);

    if (zoneId !== undefined) override.zone_id = zoneId;
    if (zonegroupId !== undefined) override.zonegroup_id = zonegroupId;
    if (redirectZone !== undefined) override.redirect_zone = redirectZone;
    if (record.system_key !== undefined) {
      override.system_key = this.validateKey(record.system_key, `${path}.system_key`);
    }
    return override;
  }

  private validateZone(raw: unknown, path: string): YamlZoneConfig {
    const record = requireRecord(raw, path);
    const zone: YamlZoneConfig = {
      id: requireString(record, 'id', path),
      name: requireString(record, 'name', path),
      endpoints: record.endpoints === undefined ? [] : stringArray(record.endpoints, `${path}.endpoints`)
    };

    if (record.data_notify !== undefined) {
      if (typeof record.data_notify !== 'boolean') {
        throw new Error(`${path}.data_notify must be a boolean`);
      }
      zone.data_notify = record.data_notify;
    }
    if (record.data_access !== undefined) {
      zone.data_access = this.validateChannel(record.data_access, `${path}.data_access`);
    }
    if (record.sip !== undefined) {
      zone.sip = this.validateChannel(record.sip, `${path}.sip`);
    }
    return zone;
  }

  private validateChannel(raw: unknown, path: string): YamlChannelConfig {
    // An empty mapping (`sip: {}`) still configures a distinct channel
    const record: YamlRecord = raw === null ? {} : requireRecord(raw, path);
    return {
      endpoints: record.endpoints === undefined ? undefined : stringArray(record.endpoints, `${path}.endpoints`),
      access_key: optionalString(record, 'access_key', path),
      secret: optionalString(record, 'secret', path),
      uid: optionalString(record, 'uid', path)
    };
  }

  private validateKey(raw: unknown, path: string): { id: string; secret: string } {
    const record = requireRecord(raw, path);
    return {
      id: requireString(record, 'id', path),
      secret: requireString(record, 'secret', path)
    };
  }

  /**
   * Apply environment-specific configuration overrides
   */
  private applyEnvironmentOverrides(config: YamlZoneTopologyConfig): YamlZoneTopologyConfig {
    const envOverrides = config.environments?.[this.currentEnvironment];
    if (!envOverrides?.local) {
      return config;
    }

    return {
      ...config,
      local: { ...config.local, ...envOverrides.local }
    };
  }
}
