export { SimulationsApi } from './simulations.js';
export { VNetsApi, rpcUrls, type VNetRpcUrls } from './vnets.js';
export { AdminRpc } from './admin-rpc.js';
export { ContractsApi } from './contracts.js';
export { WalletsApi } from './wallets.js';
export { NetworksApi } from './networks.js';
export { AlertsApi } from './alerts.js';
export { ActionsApi } from './actions.js';
export { DeliveryChannelsApi } from './delivery-channels.js';
