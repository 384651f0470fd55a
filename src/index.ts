/**
 * @module navtri
 */

export type { Vec2, Vec3 } from 'mathcat';
export * as geometry from './geometry';
export * from './query';
