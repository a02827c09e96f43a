export { SimulationRequestBuilder, BundleSimulationRequestBuilder } from './simulation.js';
export {
  CreateVNetRequestBuilder,
  UpdateVNetRequestBuilder,
  ForkVNetRequestBuilder,
  VNetTransactionRequestBuilder,
} from './vnet.js';
export { AlertRequestBuilder } from './alert.js';
export { ActionRequestBuilder } from './action.js';
export { webhookChannel, emailChannel, slackChannel } from './delivery-channel.js';
