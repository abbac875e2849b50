export * from './types';
export * from './utils/error';
export { logger } from './utils/logger';
export { ConfigManager } from './config/app';
export { default as configManager } from './config/app';
export { ConnectionPoolCache, createPgPool, defaultPoolCache } from './config/database';
export { BaseDocument, PRIMARY_FIELD, deserialize } from './core/BaseDocument';
export type { DocumentClass } from './core/BaseDocument';
export { translate } from './core/QueryTranslator';
export { SchemaBootstrapper, indexName, isAlreadyExistsError } from './core/SchemaBootstrapper';
export { EntityStore } from './core/EntityStore';
export type { EntityStoreConfig, EntityStoreOptions } from './core/EntityStore';
export { fingerprint } from './utils/fingerprint';
export { decodeDocument, encodeDocument } from './utils/json';
