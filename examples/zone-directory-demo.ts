import * as path from 'path';
import { YamlZoneConfiguration } from '../src/config/YamlZoneConfiguration';
import { ZoneConnectionDirectory } from '../src/zones/ZoneConnectionDirectory';
import { remoteZoneConnections } from '../src/zones/connections/RemoteZoneConnection';
import { createLogger } from '../src/common/logger';
import { ZoneSkippedEvent } from '../src/zones/types';

/**
 * Demonstration of building the zone connection directory from a YAML
 * topology and querying it the way the sync layer does.
 */
async function demonstrateZoneDirectory() {
  console.log('=== Zone Connection Directory Demonstration ===\n');

  const config = new YamlZoneConfiguration('staging');
  await config.loadFromFile(path.join(__dirname, '../test/fixtures/config/zones.yaml'));

  const directory = new ZoneConnectionDirectory({
    topology: config.toTopology(),
    credentialStore: config.toCredentialStore(),
    connections: remoteZoneConnections,
    logger: createLogger({ component: 'zone-directory', enableTestMode: false })
  });

  directory.on('zone-skipped', (event: ZoneSkippedEvent) => {
    console.log(`   ! skipped ${event.zoneName}: ${event.reason}`);
  });

  console.log('1. Building connections...');
  await directory.init();
  console.log(`   ✓ ${directory.zoneIds().length} peer zone(s) connected\n`);

  console.log('2. Channels per zone:');
  for (const zoneId of directory.zoneIds()) {
    const pair = directory.connectionsFor(zoneId);
    if (!pair) continue;
    const shared = pair.sip === pair.data ? 'shared' : 'separate';
    console.log(`   → ${zoneId}: data=${pair.data.reachableEndpoint()} sip=${shared}`);
  }

  console.log('\n3. Notification routing:');
  console.log(`   → metadata: ${Array.from(directory.metadataNotifyTargets().keys()).join(', ')}`);
  console.log(`   → data:     ${Array.from(directory.dataNotifyTargets().keys()).join(', ')}`);

  console.log(`\n4. Redirect endpoint: ${directory.redirectEndpoint() ?? '(none)'}`);

  directory.shutdown();
  console.log('\n=== Demonstration Complete ===');
}

demonstrateZoneDirectory().catch((error: unknown) => {
  console.error('Demo failed:', error);
  process.exitCode = 1;
});
