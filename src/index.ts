// Main entry point for zone-connect

// Types
export * from './zones/types';

// Zone connection directory
export * from './zones/ZoneConnectionDirectory';
export * from './zones/RedirectResolver';

// Credentials
export * from './zones/credentials/CredentialResolver';
export * from './zones/credentials/InMemoryCredentialStore';

// Connections
export * from './zones/connections/ConnectionFactory';
export * from './zones/connections/RemoteZoneConnection';

// Topology and configuration
export * from './zones/topology/StaticZoneTopology';
export * from './config/YamlZoneConfiguration';

// Logging
export * from './common/logger';
