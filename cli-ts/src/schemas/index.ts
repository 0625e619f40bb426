/**
 * Schema validation exports
 */

export * from './config.schema';
export * from './manifest.schema';
export * from './validation';
