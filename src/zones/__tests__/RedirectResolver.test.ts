import { RedirectResolver } from '../RedirectResolver';
import { RemoteZoneConnection } from '../connections/RemoteZoneConnection';
import { ConnectionPair } from '../types';
import { SYSTEM_KEY, topologyFixture, zoneFixture } from '../../../test/fixtures/zones';
import { SpyLogger } from '../../../test/helpers/spyLogger';

function pairFor(zoneId: string, endpoints: string[]): ConnectionPair {
  const data = new RemoteZoneConnection({ peerId: zoneId, endpoints, accessKey: SYSTEM_KEY, zoneGroupId: 'zg1' });
  return { data, sip: data };
}

describe('RedirectResolver', () => {
  let logger: SpyLogger;
  let pairs: Map<string, ConnectionPair>;
  const lookup = { connectionsFor: (zoneId: string) => pairs.get(zoneId) };

  beforeEach(() => {
    logger = new SpyLogger();
    pairs = new Map();
  });

  function resolverFor(redirectZoneId?: string): RedirectResolver {
    const topology = topologyFixture({
      members: [zoneFixture('a', ['http://a:8000']), zoneFixture('b', ['http://b:8000'])],
      redirectZoneId
    });
    return new RedirectResolver(topology, lookup, logger);
  }

  it('should return nothing when no redirect zone is configured', () => {
    pairs.set('b', pairFor('b', ['http://b:8000']));

    expect(resolverFor().redirectEndpoint()).toBeUndefined();
    expect(logger.getLogs()).toHaveLength(0);
  });

  it('should return nothing when the redirect zone has no connection', () => {
    expect(resolverFor('b').redirectEndpoint()).toBeUndefined();
    expect(logger.messages('error')).toEqual(['cannot find entry for redirect zone: b']);
  });

  it('should return nothing when the connection cannot report an endpoint', () => {
    pairs.set('b', pairFor('b', []));

    expect(resolverFor('b').redirectEndpoint()).toBeUndefined();
    expect(logger.messages('error')).toEqual([
      'redirect zone b has no reachable endpoint: No endpoints configured for b'
    ]);
  });

  it('should return the data channel endpoint of the redirect zone', () => {
    pairs.set('b', pairFor('b', ['http://b1:8000', 'http://b2:8000']));
    const resolver = resolverFor('b');

    expect(resolver.redirectEndpoint()).toBe('http://b1:8000');
    expect(resolver.redirectEndpoint()).toBe('http://b2:8000');
  });
});
