import { EventEmitter } from 'events';
import { Logger, defaultLogger } from '../common/logger';
import { ConnectionFactory } from './connections/ConnectionFactory';
import { CredentialResolver } from './credentials/CredentialResolver';
import { RedirectResolver } from './RedirectResolver';
import {
  AccessKey,
  ChannelKind,
  ConnectionCreatedEvent,
  ConnectionHandle,
  ConnectionImplementation,
  ConnectionPair,
  CredentialStore,
  DirectoryStatus,
  ZoneDescriptor,
  ZoneSkippedEvent,
  ZoneTopologyService
} from './types';

export interface ZoneConnectionDirectoryOptions {
  topology: ZoneTopologyService;
  credentialStore: CredentialStore;
  connections: ConnectionImplementation;
  logger?: Logger;
}

interface DirectorySnapshot {
  readonly conns: ReadonlyMap<string, ConnectionPair>;
  readonly metaNotify: ReadonlyMap<string, ConnectionHandle>;
  readonly dataNotify: ReadonlyMap<string, ConnectionHandle>;
}

interface BuildState {
  conns: Map<string, ConnectionPair>;
  metaNotify: Map<string, ConnectionHandle>;
  dataNotify: Map<string, ConnectionHandle>;
  owned: Set<ConnectionHandle>;
}

const EMPTY_SNAPSHOT: DirectorySnapshot = {
  conns: new Map(),
  metaNotify: new Map(),
  dataNotify: new Map()
};

/**
 * Connections to every peer zone, one pair (data, sip) per zone.
 *
 * Built once by init() and published as a single snapshot; readers only
 * ever see the empty or the complete directory. Pairs are never replaced.
 * shutdown() closes every owned handle once, including handles aliased
 * across both channels.
 */
export class ZoneConnectionDirectory extends EventEmitter {
  private readonly topology: ZoneTopologyService;
  private readonly factory: ConnectionFactory;
  private readonly redirects: RedirectResolver;
  private readonly logger: Logger;

  private snapshot: DirectorySnapshot = EMPTY_SNAPSHOT;
  private owned = new Set<ConnectionHandle>();
  private status: DirectoryStatus = 'created';
  private initPromise?: Promise<void>;

  constructor(options: ZoneConnectionDirectoryOptions) {
    super();
    this.topology = options.topology;
    this.logger = options.logger ?? defaultLogger;
    const resolver = new CredentialResolver(options.credentialStore, this.logger);
    this.factory = new ConnectionFactory(this.topology, resolver, options.connections, this.logger);
    this.redirects = new RedirectResolver(this.topology, this, this.logger);
  }

  init(): Promise<void> {
    if (this.status === 'closed') {
      return Promise.reject(new Error('Zone connection directory has been shut down'));
    }
    if (!this.initPromise) {
      this.initPromise = this.build();
    }
    return this.initPromise;
  }

  connectionsFor(zoneId: string): ConnectionPair | undefined {
    return this.snapshot.conns.get(zoneId);
  }

  connectionsForZoneName(name: string): ConnectionPair | undefined {
    const zoneId = this.topology.findZoneIdByName(name);
    if (zoneId === undefined) {
      return undefined;
    }
    return this.connectionsFor(zoneId);
  }

  redirectEndpoint(): string | undefined {
    return this.redirects.redirectEndpoint();
  }

  /**
   * Build a connection outside the zone map. The caller owns the handle.
   */
  createConnection(remoteId: string, endpoints: string[], accessKey: AccessKey, apiName?: string): ConnectionHandle {
    return this.factory.fromParameters(remoteId, endpoints, accessKey, apiName);
  }

  zoneIds(): string[] {
    return Array.from(this.snapshot.conns.keys());
  }

  metadataNotifyTargets(): ReadonlyMap<string, ConnectionHandle> {
    return this.snapshot.metaNotify;
  }

  dataNotifyTargets(): ReadonlyMap<string, ConnectionHandle> {
    return this.snapshot.dataNotify;
  }

  getStatus(): DirectoryStatus {
    return this.status;
  }

  shutdown(): void {
    if (this.status === 'closed') return;

    this.status = 'closed';
    const released = this.releaseAll(this.owned);
    this.owned = new Set();
    this.snapshot = EMPTY_SNAPSHOT;

    this.emit('shutdown', { released });
  }

  private async build(): Promise<void> {
    const zoneGroup = this.topology.localZoneGroup();
    const state: BuildState = {
      conns: new Map(),
      metaNotify: new Map(),
      dataNotify: new Map(),
      owned: new Set()
    };

    try {
      for (const zone of zoneGroup.memberZones) {
        await this.buildConnection(state, zone, true);
      }
      for (const zone of zoneGroup.foreignZones) {
        await this.buildConnection(state, zone, false);
      }
    } catch (error) {
      this.releaseAll(state.owned);
      throw error;
    }

    if (this.status === 'closed') {
      // shutdown() ran while credentials were being resolved
      this.releaseAll(state.owned);
      throw new Error('Zone connection directory has been shut down');
    }

    this.owned = state.owned;
    this.snapshot = {
      conns: state.conns,
      metaNotify: state.metaNotify,
      dataNotify: state.dataNotify
    };
    this.status = 'ready';

    this.logger.info(`zone connection directory ready with ${state.conns.size} zone(s)`);
    this.emit('initialized', { zones: Array.from(state.conns.keys()) });
  }

  private async buildConnection(state: BuildState, zone: ZoneDescriptor, needsNotify: boolean): Promise<void> {
    if (zone.id === this.topology.localZoneId()) {
      return;
    }
    if (state.conns.has(zone.id)) {
      this.logger.debug(`connection for zone ${zone.name} id ${zone.id} already exists`);
      return;
    }

    const defaultEndpoints = this.factory.defaultEndpoints(zone);
    if (defaultEndpoints.length === 0) {
      this.skip({ zoneId: zone.id, zoneName: zone.name, reason: 'no data endpoints defined' });
      return;
    }

    const apiName = this.topology.zoneGroupOf(zone.id)?.apiName;
    this.logger.debug(`generating connection object for zone ${zone.name} id ${zone.id}`);

    let data: ConnectionHandle | undefined;
    if (zone.dataAccess) {
      data = await this.factory.fromChannel(zone, zone.dataAccess, defaultEndpoints, apiName);
    } else {
      data = this.factory.fromParameters(zone.id, zone.endpoints, this.factory.systemKey(), apiName);
    }
    if (!data) {
      this.skip({ zoneId: zone.id, zoneName: zone.name, reason: 'no data channel endpoints' });
      return;
    }
    this.adopt(state, zone, 'data', data);

    let sip: ConnectionHandle | undefined = data;
    if (zone.sip) {
      sip = await this.factory.fromChannel(zone, zone.sip, defaultEndpoints, apiName);
      if (!sip) {
        state.owned.delete(data);
        this.releaseAll(new Set([data]));
        this.skip({ zoneId: zone.id, zoneName: zone.name, reason: 'no sip channel endpoints' });
        return;
      }
      this.adopt(state, zone, 'sip', sip);
    }

    state.conns.set(zone.id, { data, sip });

    if (!needsNotify) {
      return;
    }

    state.metaNotify.set(zone.id, data);
    if (this.topology.localZoneGroup().dataNotifyZoneIds.has(zone.id)) {
      state.dataNotify.set(zone.id, data);
    }
  }

  private adopt(state: BuildState, zone: ZoneDescriptor, channel: ChannelKind, handle: ConnectionHandle): void {
    state.owned.add(handle);
    const event: ConnectionCreatedEvent = { zoneId: zone.id, zoneName: zone.name, channel, peerId: handle.peerId };
    this.emit('connection-created', event);
  }

  private skip(event: ZoneSkippedEvent): void {
    this.logger.warn(`can't generate connection for zone ${event.zoneId} (${event.zoneName}): ${event.reason}`);
    this.emit('zone-skipped', event);
  }

  private releaseAll(handles: Set<ConnectionHandle>): number {
    let released = 0;
    for (const handle of handles) {
      try {
        handle.close();
        released++;
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        this.logger.error(`failed to close connection to ${handle.peerId}: ${errorMessage}`);
      }
    }
    handles.clear();
    return released;
  }
}
