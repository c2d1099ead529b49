import { Logger, defaultLogger } from '../../common/logger';
import { CredentialResolver } from '../credentials/CredentialResolver';
import {
  AccessKey,
  ChannelConfig,
  ConnectionHandle,
  ConnectionImplementation,
  ZoneDescriptor,
  ZoneTopologyService
} from '../types';

/**
 * Builds connection handles for peer zones. Does no caching; the
 * directory decides which handles are kept.
 */
export class ConnectionFactory {
  constructor(
    private readonly topology: ZoneTopologyService,
    private readonly credentials: CredentialResolver,
    private readonly implementation: ConnectionImplementation,
    private readonly logger: Logger = defaultLogger
  ) {}

  /**
   * Endpoints a zone is reached through when a channel override names none.
   * Falls back to the data-access override's list when the zone itself has no endpoints.
   */
  defaultEndpoints(zone: ZoneDescriptor): string[] {
    if (zone.endpoints.length === 0 && zone.dataAccess?.endpoints && zone.dataAccess.endpoints.length > 0) {
      return [...zone.dataAccess.endpoints];
    }
    return [...zone.endpoints];
  }

  /**
   * Build a handle for one channel override of a zone.
   * Returns undefined when no endpoint is left after fallback.
   */
  async fromChannel(
    zone: ZoneDescriptor,
    channel: ChannelConfig,
    defaultEndpoints: string[],
    apiName?: string
  ): Promise<ConnectionHandle | undefined> {
    const endpoints = channel.endpoints && channel.endpoints.length > 0 ? channel.endpoints : defaultEndpoints;
    if (endpoints.length === 0) {
      this.logger.warn(`can't generate connection for zone ${zone.id} (${zone.name}): no endpoints defined`);
      return undefined;
    }

    let accessKey = await this.credentials.resolve(zone.name, channel.credentials);
    if (!accessKey) {
      this.logger.info(`using default access key for connection to zone ${zone.name}`);
      accessKey = this.systemKey();
    }

    this.logger.debug(`remote connection for zone=${zone.name}: using access_key=${accessKey.id}`);
    return this.fromParameters(zone.id, endpoints, accessKey, apiName);
  }

  /**
   * Build a handle from explicit parameters, for peers that are not zone records
   */
  fromParameters(remoteId: string, endpoints: string[], accessKey: AccessKey, apiName?: string): ConnectionHandle {
    return this.implementation.construct({
      peerId: remoteId,
      endpoints: [...endpoints],
      accessKey: { ...accessKey },
      zoneGroupId: this.topology.localZoneGroup().id,
      apiName
    });
  }

  systemKey(): AccessKey {
    return { ...this.topology.localZoneConfig().systemKey };
  }
}
