import postgres from 'postgres'
import type {
  FlagConfig,
  DriverConfig,
  EvaluateRequest,
  EvaluationContext,
  EvaluationResult,
  Feature,
  FeatureOverride,
} from './types.ts'
import type { FeatureStore } from './feature_store.ts'
import type { FeatureInput, FeatureChanges } from './validation.ts'
import { DatabaseDriver } from './drivers/database_driver.ts'
import { ArrayDriver } from './drivers/array_driver.ts'
import { ConfigurationError, FeatureNotFoundError } from './errors.ts'
import { Evaluator } from './evaluator.ts'
import PendingContext from './pending_context.ts'
import { silentLogger, type Logger } from './logger.ts'

export interface FlagManagerOptions {
  /** Connection handed to the database driver. Takes precedence over the driver's `url`. */
  sql?: postgres.Sql
  logger?: Logger
}

export interface OverrideRequest {
  targetType: string
  targetIdentifier: string
  enabled: boolean
}

export default class FlagManager {
  private stores = new Map<string, FeatureStore>()
  private extensions = new Map<string, (config: DriverConfig) => FeatureStore>()
  private evaluators = new Map<string, Evaluator>()
  private ownedConnections: postgres.Sql[] = []
  private logger: Logger

  constructor(
    readonly config: FlagConfig,
    private options: FlagManagerOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger()
  }

  // ── Evaluation ─────────────────────────────────────────────────────

  evaluator(store?: string): Evaluator {
    const key = store ?? this.config.default
    let evaluator = this.evaluators.get(key)
    if (!evaluator) {
      evaluator = new Evaluator(this.store(key), { logger: this.logger })
      this.evaluators.set(key, evaluator)
    }
    return evaluator
  }

  evaluate(request: EvaluateRequest): Promise<EvaluationResult> {
    return this.evaluator().evaluate(request)
  }

  enabled(featureKey: string, context: EvaluationContext): Promise<boolean> {
    return this.evaluator().enabled({ featureKey, ...context })
  }

  async disabled(featureKey: string, context: EvaluationContext): Promise<boolean> {
    return !(await this.enabled(featureKey, context))
  }

  for(context: EvaluationContext): PendingContext {
    return new PendingContext(this.evaluator(), context)
  }

  // ── Features ───────────────────────────────────────────────────────

  features(): Promise<Feature[]> {
    return this.store().features()
  }

  feature(key: string): Promise<Feature | undefined> {
    return this.store().findFeature(key)
  }

  async createFeature(input: FeatureInput): Promise<Feature> {
    const feature = await this.store().createFeature(input)
    this.logger.info({ feature: feature.key, defaultEnabled: feature.defaultEnabled }, 'feature created')
    return feature
  }

  async updateFeature(key: string, changes: FeatureChanges): Promise<Feature> {
    const feature = await this.store().updateFeature(key, changes)
    this.logger.info({ feature: feature.key, defaultEnabled: feature.defaultEnabled }, 'feature updated')
    return feature
  }

  async deleteFeature(key: string): Promise<void> {
    await this.store().deleteFeature(key)
    this.logger.info({ feature: key }, 'feature deleted')
  }

  // ── Overrides ──────────────────────────────────────────────────────

  async overrides(featureKey: string): Promise<FeatureOverride[]> {
    const feature = await this.requireFeature(featureKey)
    return this.store().overridesFor(feature.id)
  }

  async addOverride(featureKey: string, request: OverrideRequest): Promise<FeatureOverride> {
    const feature = await this.requireFeature(featureKey)
    const override = await this.store().createOverride({ featureId: feature.id, ...request })
    this.logger.info(
      { feature: featureKey, overrideId: override.id, targetType: override.targetType, enabled: override.enabled },
      'override created'
    )
    return override
  }

  async updateOverride(id: number, enabled: boolean): Promise<FeatureOverride> {
    const override = await this.store().updateOverride(id, enabled)
    this.logger.info({ overrideId: id, enabled }, 'override updated')
    return override
  }

  async removeOverride(id: number): Promise<void> {
    await this.store().deleteOverride(id)
    this.logger.info({ overrideId: id }, 'override removed')
  }

  // ── Driver management ──────────────────────────────────────────────

  store(name?: string): FeatureStore {
    const key = name ?? this.config.default

    let store = this.stores.get(key)
    if (store) return store

    const driverConfig = this.config.drivers[key]
    if (!driverConfig) {
      throw new ConfigurationError(`Flag driver "${key}" is not configured.`)
    }

    store = this.createStore(key, driverConfig)
    this.stores.set(key, store)
    return store
  }

  extend(name: string, factory: (config: DriverConfig) => FeatureStore): void {
    this.extensions.set(name, factory)
  }

  // ── Table setup ────────────────────────────────────────────────────

  async ensureTables(): Promise<void> {
    const store = this.store()
    if (store instanceof DatabaseDriver) {
      await store.ensureTable()
    }
  }

  // ── Shutdown ───────────────────────────────────────────────────────

  /** End the connections this manager opened. Injected connections are left to their owner. */
  async close(): Promise<void> {
    const connections = this.ownedConnections
    this.ownedConnections = []
    this.stores.clear()
    this.evaluators.clear()
    await Promise.all(connections.map(sql => sql.end()))
  }

  // ── Private helpers ────────────────────────────────────────────────

  private async requireFeature(key: string): Promise<Feature> {
    const feature = await this.store().findFeature(key)
    if (!feature) throw new FeatureNotFoundError(key)
    return feature
  }

  private createStore(name: string, config: DriverConfig): FeatureStore {
    const driverName = config.driver ?? name

    const extension = this.extensions.get(driverName)
    if (extension) return extension(config)

    switch (driverName) {
      case 'database':
        return new DatabaseDriver(this.connect(name, config))
      case 'array':
        return new ArrayDriver()
      default:
        throw new ConfigurationError(
          `Unknown flag driver "${driverName}". Register it with FlagManager.extend().`
        )
    }
  }

  private connect(name: string, config: DriverConfig): postgres.Sql {
    if (this.options.sql) return this.options.sql

    if (typeof config.url !== 'string' || config.url === '') {
      throw new ConfigurationError(
        `Flag driver "${name}" needs a connection: pass \`sql\` to FlagManager or set DATABASE_URL.`
      )
    }

    const sql = postgres(config.url, { onnotice: () => {} })
    this.ownedConnections.push(sql)
    return sql
  }
}
