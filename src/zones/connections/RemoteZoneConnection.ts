import { EventEmitter } from 'events';
import {
  AccessKey,
  ConnectionHandle,
  ConnectionImplementation,
  ConnectionParams
} from '../types';

export type RemoteConnectionStatus = 'open' | 'closed';

/**
 * Connection metadata for one peer zone channel. Holds no socket: the
 * transport layer reads the endpoint and key from here when it issues requests.
 */
export class RemoteZoneConnection extends EventEmitter implements ConnectionHandle {
  readonly peerId: string;
  readonly endpoints: readonly string[];
  readonly accessKey: Readonly<AccessKey>;
  readonly zoneGroupId: string;
  readonly apiName?: string;

  private status: RemoteConnectionStatus = 'open';
  private counter = 0;

  constructor(params: ConnectionParams) {
    super();
    this.peerId = params.peerId;
    this.endpoints = [...params.endpoints];
    this.accessKey = { ...params.accessKey };
    this.zoneGroupId = params.zoneGroupId;
    this.apiName = params.apiName;
  }

  /**
   * Next endpoint in round-robin order
   */
  reachableEndpoint(): string {
    if (this.status === 'closed') {
      throw new Error(`Connection to ${this.peerId} is closed`);
    }
    if (this.endpoints.length === 0) {
      throw new Error(`No endpoints configured for ${this.peerId}`);
    }

    const endpoint = this.endpoints[this.counter % this.endpoints.length];
    this.counter++;
    return endpoint;
  }

  getStatus(): RemoteConnectionStatus {
    return this.status;
  }

  isOpen(): boolean {
    return this.status === 'open';
  }

  close(): void {
    if (this.status === 'closed') return;

    this.status = 'closed';
    this.emit('closed', this.peerId);
    this.removeAllListeners();
  }
}

export const remoteZoneConnections: ConnectionImplementation = {
  construct: (params: ConnectionParams) => new RemoteZoneConnection(params)
};
