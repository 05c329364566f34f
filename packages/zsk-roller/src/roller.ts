/**
 * ZskRoller main class. Runs one rollover check against an installation.
 */

import type { Logger } from 'pino'
import { loadConfig, getDefaultConfigDir, policyFromConfig, resolveConnection } from './config.js'
import { TransportError } from './errors.js'
import { apply } from './keys/executor.js'
import { classify } from './keys/classifier.js'
import { evaluate, rolloverThreshold } from './keys/policy.js'
import { describeAction } from './keys/actions.js'
import type { Action, AppliedAction, RolloverPolicy, ZskSet } from './keys/types.js'
import { silentLogger } from './logger.js'
import { ServiceRegistry } from './service/registry.js'
import type { KeyManagementService } from './service/types.js'
import type { RollerConfig } from './types.js'

/** Options for initializing ZskRoller. */
export interface ZskRollerOptions {
  /** Override the config directory. */
  configDir?: string | undefined
  /** Supply config directly, skipping file load. */
  config?: RollerConfig | undefined
  /** Service endpoint; takes precedence over the configured one. */
  endpoint?: string | undefined
  /**
   * Use this service instead of building one from the config. Endpoint and
   * credentials are then not required.
   */
  service?: KeyManagementService | undefined
  /** Logger for progress output. Defaults to a silent logger. */
  logger?: Logger | undefined
}

/** Options for {@link ZskRoller.run}. */
export interface RunOptions {
  /** Compute the plan without applying it. */
  dryRun?: boolean | undefined
}

/** The classified set and the actions due for it. */
export interface RolloverPlan {
  set: ZskSet
  /** Safety window in seconds. */
  threshold: number
  actions: Action[]
}

/** Outcome of a completed run. */
export interface RolloverReport extends RolloverPlan {
  /** Actions the service accepted; empty on a dry run. */
  applied: AppliedAction[]
  dryRun: boolean
}

/**
 * Main entry point for zsk-roller. Fetches the key inventory, classifies it,
 * decides which transitions are due and applies them.
 *
 * @remarks
 * No state is kept between runs: every call re-reads the inventory from the
 * service. Two runs against the same installation at the same time are not
 * coordinated and must be prevented by the caller (e.g. a scheduling lock).
 */
export class ZskRoller {
  readonly #service: KeyManagementService
  readonly #policy: RolloverPolicy
  readonly #logger: Logger

  private constructor(service: KeyManagementService, policy: RolloverPolicy, logger: Logger) {
    this.#service = service
    this.#policy = policy
    this.#logger = logger
  }

  /**
   * Initialize a new ZskRoller instance.
   * Loads config and builds the key-management service for its transport.
   *
   * @throws {@link ConfigError} if the endpoint, credentials or transport
   *   are missing or invalid
   */
  static async init(options?: ZskRollerOptions): Promise<ZskRoller> {
    const configDir = options?.configDir ?? getDefaultConfigDir()
    const config = options?.config ?? (await loadConfig(configDir))
    const logger = options?.logger ?? silentLogger()

    let service = options?.service
    if (service === undefined) {
      const settings = await resolveConnection(config, options?.endpoint)
      service = ServiceRegistry.create(config.transport, settings)
      logger.debug({ endpoint: settings.endpoint, transport: config.transport }, 'service ready')
    }

    return new ZskRoller(service, policyFromConfig(config), logger)
  }

  /** The policy this roller evaluates against. */
  get policy(): RolloverPolicy {
    return this.#policy
  }

  /**
   * Fetch and classify the current key inventory.
   *
   * @throws {@link TransportError} if the inventory cannot be retrieved
   * @throws {@link ValidationError} if the inventory violates the set invariant
   */
  async inspect(): Promise<ZskSet> {
    const inventory = await this.#service.getZskInfo()
    if (!inventory.ok) {
      throw new TransportError(`Failed to fetch ZSK inventory: ${inventory.reason}`)
    }
    this.#logger.debug({ keys: inventory.value.length }, 'inventory fetched')

    const classified = classify(inventory.value)
    if (!classified.ok) {
      throw classified.error
    }
    return classified.value
  }

  /**
   * Compute the actions due without applying them.
   */
  async plan(): Promise<RolloverPlan> {
    const set = await this.inspect()
    const threshold = rolloverThreshold(set, this.#policy)
    const actions = evaluate(set, this.#policy)
    this.#logger.debug(
      {
        threshold,
        prepublishedAge: set.prepublished.createdAgoSeconds,
        plan: actions.map(describeAction),
      },
      'plan computed',
    )
    return { set, threshold, actions }
  }

  /**
   * Run one rollover check: plan, then apply the plan in order.
   *
   * @throws {@link OperationError} if the service rejects an action; the
   *   remaining actions are not attempted
   */
  async run(options?: RunOptions): Promise<RolloverReport> {
    const dryRun = options?.dryRun === true
    const { set, threshold, actions } = await this.plan()

    if (actions.length === 0) {
      this.#logger.info('no rollover actions due')
      return { set, threshold, actions, applied: [], dryRun }
    }
    if (dryRun) {
      return { set, threshold, actions, applied: [], dryRun }
    }

    const result = await apply(actions, this.#service, { logger: this.#logger })
    if (!result.ok) {
      throw result.error
    }
    return { set, threshold, actions, applied: result.value, dryRun }
  }

  /**
   * Release the service's connections.
   */
  async close(): Promise<void> {
    await this.#service.close?.()
  }
}
