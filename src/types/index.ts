/**
 * Types barrel export
 */

export * from './base';
export * from './database';
export * from './logging';
export * from './query';
