/**
 * Key-management service barrel export.
 */

export { JsonRpcKeyService } from './json-rpc-service.js'
export type { JsonRpcKeyServiceOptions } from './json-rpc-service.js'
export { ServiceRegistry } from './registry.js'
export { decodeInventory, decodeKeyRecord } from './wire.js'
export type {
  CreateKeyRequest,
  KeyManagementService,
  ServiceFactory,
  ServiceResult,
} from './types.js'
