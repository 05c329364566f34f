/**
 * zsk-roller: DNSSEC zone signing key rollover with pre-published keys.
 *
 * @packageDocumentation
 */

export {
  ZskRollerError,
  ConfigError,
  TransportError,
  ValidationError,
  OperationError,
} from './errors.js'

export type { Result, Credentials, ConnectionSettings, RollerConfig } from './types.js'

export {
  classify,
  evaluate,
  apply,
  rolloverThreshold,
  DEFAULT_POLICY,
  DEFAULT_SAFETY_FACTOR,
  activate,
  createKey,
  deactivate,
  deleteKey,
  describeAction,
} from './keys/index.js'
export type {
  ClassifyResult,
  ApplyOptions,
  ApplyResult,
  KeyRecord,
  ActiveKey,
  PrePublishedKey,
  DeactivatedKey,
  ZskSet,
  ValidationReason,
  NewKeyTemplate,
  RolloverPolicy,
  Action,
  ActivateAction,
  CreateKeyAction,
  DeactivateAction,
  DeleteAction,
  AppliedAction,
} from './keys/index.js'

export { JsonRpcKeyService, ServiceRegistry, decodeInventory, decodeKeyRecord } from './service/index.js'
export type {
  JsonRpcKeyServiceOptions,
  CreateKeyRequest,
  KeyManagementService,
  ServiceFactory,
  ServiceResult,
} from './service/index.js'

export { createLogger, silentLogger } from './logger.js'
export type { CreateLoggerOptions } from './logger.js'

export { ZskRoller } from './roller.js'
export type { ZskRollerOptions, RunOptions, RolloverPlan, RolloverReport } from './roller.js'

export {
  loadConfig,
  validateConfig,
  validateEndpoint,
  defaultConfig,
  getDefaultConfigDir,
  parseSafetyFactor,
  policyFromConfig,
  resolveConnection,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_TRANSPORT,
} from './config.js'
