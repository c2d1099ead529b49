import { RemoteZoneConnection, remoteZoneConnections } from '../RemoteZoneConnection';

describe('RemoteZoneConnection', () => {
  const params = {
    peerId: 'zone-b-id',
    endpoints: ['http://b1:8000', 'http://b2:8000'],
    accessKey: { id: 'K1', secret: 'test-secret' },
    zoneGroupId: 'zg1',
    apiName: 'default'
  };

  it('should keep the connection metadata', () => {
    const conn = new RemoteZoneConnection(params);

    expect(conn.peerId).toBe('zone-b-id');
    expect(conn.endpoints).toEqual(['http://b1:8000', 'http://b2:8000']);
    expect(conn.accessKey).toEqual({ id: 'K1', secret: 'test-secret' });
    expect(conn.zoneGroupId).toBe('zg1');
    expect(conn.apiName).toBe('default');
    expect(conn.isOpen()).toBe(true);
  });

  it('should rotate through endpoints', () => {
    const conn = new RemoteZoneConnection(params);

    expect(conn.reachableEndpoint()).toBe('http://b1:8000');
    expect(conn.reachableEndpoint()).toBe('http://b2:8000');
    expect(conn.reachableEndpoint()).toBe('http://b1:8000');
  });

  it('should fail to report an endpoint when none are configured', () => {
    const conn = new RemoteZoneConnection({ ...params, endpoints: [] });

    expect(() => conn.reachableEndpoint()).toThrow('No endpoints configured for zone-b-id');
  });

  it('should close once', () => {
    const conn = new RemoteZoneConnection(params);
    const onClosed = jest.fn();
    conn.on('closed', onClosed);

    conn.close();
    conn.close();

    expect(onClosed).toHaveBeenCalledTimes(1);
    expect(onClosed).toHaveBeenCalledWith('zone-b-id');
    expect(conn.getStatus()).toBe('closed');
    expect(() => conn.reachableEndpoint()).toThrow('Connection to zone-b-id is closed');
  });

  it('should construct through the default implementation', () => {
    const conn = remoteZoneConnections.construct(params);

    expect(conn).toBeInstanceOf(RemoteZoneConnection);
    expect(conn.peerId).toBe('zone-b-id');
  });
});
