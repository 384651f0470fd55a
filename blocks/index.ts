export * from './agents/nav-agent';
export * from './agents/nav-agents';
export * from './agents/nav-driver';
export * from './logger';
export * from './registry/nav-mesh-registry';
export * from './search/flood-fill-nav-mesh';
