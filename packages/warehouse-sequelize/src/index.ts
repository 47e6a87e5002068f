export { SequelizeWarehouse } from './SequelizeWarehouse.js';
export type { SequelizeWarehouseOptions } from './SequelizeWarehouse.js';
export { SequelizeLeaseStore } from './SequelizeLeaseStore.js';
export type { SequelizeLeaseStoreOptions } from './SequelizeLeaseStore.js';
export { SequelizeRunLogSink } from './SequelizeRunLogSink.js';
export { createSequelize } from './createSequelize.js';
export { tableLocationOf } from './models/DestinationModel.js';
export type { TableLocation } from './models/DestinationModel.js';
