/**
 * Types barrel export
 */

export * from './result';
export * from './cluster';
export type { ServingConfig } from '../schemas/config.schema';
