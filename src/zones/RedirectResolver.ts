import { Logger, defaultLogger } from '../common/logger';
import { ConnectionPair, ZoneTopologyService } from './types';

export interface ZoneConnectionLookup {
  connectionsFor(zoneId: string): ConnectionPair | undefined;
}

export class RedirectResolver {
  constructor(
    private readonly topology: ZoneTopologyService,
    private readonly connections: ZoneConnectionLookup,
    private readonly logger: Logger = defaultLogger
  ) {}

  /**
   * Endpoint of the configured redirect zone, or undefined when requests
   * should not be redirected.
   */
  redirectEndpoint(): string | undefined {
    const { redirectZoneId } = this.topology.localZoneConfig();
    if (!redirectZoneId) {
      return undefined;
    }

    const conns = this.connections.connectionsFor(redirectZoneId);
    if (!conns) {
      this.logger.error(`cannot find entry for redirect zone: ${redirectZoneId}`);
      return undefined;
    }

    try {
      return conns.data.reachableEndpoint();
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(`redirect zone ${redirectZoneId} has no reachable endpoint: ${errorMessage}`);
      return undefined;
    }
  }
}
