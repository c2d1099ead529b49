export interface AccessKey {
  id: string;
  secret: string;
}

/**
 * How a peer channel authenticates. Exactly one form is configured;
 * resolution order is key-pair, then access-key, then user.
 */
export type CredentialReference =
  | { kind: 'key-pair'; accessKeyId: string; secret: string }
  | { kind: 'access-key'; accessKeyId: string }
  | { kind: 'user'; uid: string };

/** Raw credential fields as they appear in zone configuration */
export interface CredentialFields {
  uid?: string;
  accessKey?: string;
  secret?: string;
}

export interface ChannelConfig {
  endpoints?: string[];
  credentials?: CredentialReference;
}

export interface ZoneDescriptor {
  id: string;
  name: string;
  endpoints: string[];
  dataAccess?: ChannelConfig;
  sip?: ChannelConfig;
}

export interface ZoneGroup {
  id: string;
  name: string;
  apiName?: string;
  zones: ZoneDescriptor[];
}

export interface LocalZoneGroup {
  id: string;
  apiName?: string;
  memberZones: ZoneDescriptor[];
  foreignZones: ZoneDescriptor[];
  dataNotifyZoneIds: ReadonlySet<string>;
}

export interface LocalZoneConfig {
  systemKey: AccessKey;
  redirectZoneId?: string;
}

export interface ZoneTopologyService {
  localZoneId(): string;
  localZoneGroup(): LocalZoneGroup;
  zoneGroupOf(zoneId: string): ZoneGroup | undefined;
  findZoneIdByName(name: string): string | undefined;
  localZoneConfig(): LocalZoneConfig;
}

export interface UserRecord {
  uid: string;
  accessKeys: ReadonlyMap<string, AccessKey>;
}

export interface CredentialStore {
  userByAccessKeyId(accessKeyId: string): Promise<UserRecord | undefined>;
  userByIdentity(uid: string): Promise<UserRecord | undefined>;
}

export interface ConnectionParams {
  peerId: string;
  endpoints: string[];
  accessKey: AccessKey;
  zoneGroupId: string;
  apiName?: string;
}

export interface ConnectionHandle {
  readonly peerId: string;
  /** Throws when no endpoint can be reported */
  reachableEndpoint(): string;
  close(): void;
}

export interface ConnectionImplementation {
  construct(params: ConnectionParams): ConnectionHandle;
}

export interface ConnectionPair {
  readonly data: ConnectionHandle;
  readonly sip: ConnectionHandle;
}

export type ChannelKind = 'data' | 'sip';

export type DirectoryStatus = 'created' | 'ready' | 'closed';

export interface ZoneSkippedEvent {
  zoneId: string;
  zoneName: string;
  reason: string;
}

export interface ConnectionCreatedEvent {
  zoneId: string;
  zoneName: string;
  channel: ChannelKind;
  peerId: string;
}
