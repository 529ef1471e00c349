/**
 * Structural steps for composing pipelines
 */

export { GroupStep, childrenSchema } from './group.js';
export { Sequential } from './sequential.js';
export { Parallel } from './parallel.js';
export { Shaper, shaperIndexSchema } from './shaper.js';
export type { ShaperIndex } from './shaper.js';
