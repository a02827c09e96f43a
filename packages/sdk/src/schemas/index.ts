export * from './common.js';
export * from './simulation.schema.js';
export * from './vnet.schema.js';
export * from './rpc.schema.js';
export * from './contract.schema.js';
export * from './network.schema.js';
export * from './alert.schema.js';
export * from './action.schema.js';
export * from './delivery-channel.schema.js';
