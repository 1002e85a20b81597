export { SequelizeRegistryStore } from './SequelizeRegistryStore.js';
export type { SequelizeStoreOptions } from './SequelizeRegistryStore.js';
export { SequelizeCheckpointStore } from './SequelizeCheckpointStore.js';
