import { RemoteZoneConnection } from '../../src/zones/connections/RemoteZoneConnection';
import { StaticZoneTopology } from '../../src/zones/topology/StaticZoneTopology';
import {
  AccessKey,
  ConnectionImplementation,
  ConnectionParams,
  CredentialStore,
  UserRecord,
  ZoneDescriptor
} from '../../src/zones/types';

export const SYSTEM_KEY: AccessKey = { id: 'SYSTEM-KEY', secret: 'test-secret' };

export const LOCAL_ZONE_GROUP = 'zg-local';

/**
 * Zone descriptor with the given endpoints and optional channel overrides
 */
export function zoneFixture(
  id: string,
  endpoints: string[],
  overrides: Partial<Omit<ZoneDescriptor, 'id' | 'endpoints'>> = {}
): ZoneDescriptor {
  return {
    id,
    name: `zone-${id}`,
    endpoints,
    ...overrides
  };
}

export interface TopologyFixtureOptions {
  localZoneId?: string;
  members: ZoneDescriptor[];
  foreign?: ZoneDescriptor[];
  dataNotify?: string[];
  redirectZoneId?: string;
}

export function topologyFixture(options: TopologyFixtureOptions): StaticZoneTopology {
  const zoneGroups = [
    { id: LOCAL_ZONE_GROUP, name: 'local', apiName: 'local-api', zones: options.members }
  ];
  if (options.foreign && options.foreign.length > 0) {
    zoneGroups.push({ id: 'zg-foreign', name: 'foreign', apiName: 'foreign-api', zones: options.foreign });
  }

  return new StaticZoneTopology({
    localZoneId: options.localZoneId ?? 'a',
    localZoneGroupId: LOCAL_ZONE_GROUP,
    zoneGroups,
    local: { systemKey: SYSTEM_KEY, redirectZoneId: options.redirectZoneId },
    dataNotifyZoneIds: options.dataNotify
  });
}

/**
 * Credential store that records every lookup
 */
export class RecordingCredentialStore implements CredentialStore {
  readonly accessKeyLookups: string[] = [];
  readonly identityLookups: string[] = [];
  private users = new Map<string, UserRecord>();
  private failure?: Error;

  addUser(uid: string, keys: AccessKey[]): this {
    this.users.set(uid, { uid, accessKeys: new Map(keys.map((key): [string, AccessKey] => [key.id, key])) });
    return this;
  }

  failWith(error: Error): this {
    this.failure = error;
    return this;
  }

  async userByAccessKeyId(accessKeyId: string): Promise<UserRecord | undefined> {
    this.accessKeyLookups.push(accessKeyId);
    if (this.failure) throw this.failure;
    for (const user of this.users.values()) {
      if (user.accessKeys.has(accessKeyId)) return user;
    }
    return undefined;
  }

  async userByIdentity(uid: string): Promise<UserRecord | undefined> {
    this.identityLookups.push(uid);
    if (this.failure) throw this.failure;
    return this.users.get(uid);
  }

  lookupCount(): number {
    return this.accessKeyLookups.length + this.identityLookups.length;
  }
}

/**
 * Connection implementation that keeps every connection it builds
 */
export class RecordingConnections implements ConnectionImplementation {
  readonly constructed: RemoteZoneConnection[] = [];

  construct(params: ConnectionParams): RemoteZoneConnection {
    const conn = new RemoteZoneConnection(params);
    this.constructed.push(conn);
    return conn;
  }

  forPeer(peerId: string): RemoteZoneConnection[] {
    return this.constructed.filter(conn => conn.peerId === peerId);
  }
}
