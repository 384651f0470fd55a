export * from './bv-tree';
export * from './find-path';
export * from './find-portal-midpoint-path';
export * from './find-straight-path';
export * from './nav-mesh';
export * from './nav-mesh-api';
export * from './nav-mesh-search';
export * from './path-following';
export * from './query-filter';
