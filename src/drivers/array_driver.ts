import type { FeatureStore } from '../feature_store.ts'
import type { Feature, FeatureOverride, TargetType } from '../types.ts'
import { ConflictError, FeatureNotFoundError, OverrideNotFoundError } from '../errors.ts'
import { unwrap } from '../result.ts'
import {
  validateFeatureInput,
  validateFeatureChanges,
  validateOverrideInput,
  type FeatureInput,
  type FeatureChanges,
  type OverrideDraft,
} from '../validation.ts'

export interface ArrayDriverOptions {
  /** Clock used for `createdAt`/`updatedAt`. Defaults to `new Date()`. */
  now?: () => Date
}

/** In-memory flag store for testing. */
export class ArrayDriver implements FeatureStore {
  readonly name = 'array'
  private featuresByKey = new Map<string, Feature>()
  private overrides = new Map<number, FeatureOverride>()
  private nextFeatureId = 1
  private nextOverrideId = 1
  private now: () => Date

  constructor(options: ArrayDriverOptions = {}) {
    this.now = options.now ?? (() => new Date())
  }

  private targetKey(featureId: number, targetType: TargetType, identifier: string): string {
    return `${featureId}\0${targetType}\0${identifier}`
  }

  async findFeature(key: string): Promise<Feature | undefined> {
    const feature = this.featuresByKey.get(key)
    return feature && { ...feature }
  }

  async findOverride(
    featureId: number,
    targetType: TargetType,
    targetIdentifier: string
  ): Promise<FeatureOverride | undefined> {
    const override = this.locate(featureId, targetType, targetIdentifier)
    return override && { ...override }
  }

  async findLatestOverride(
    featureId: number,
    targetType: TargetType,
    identifiers: readonly string[]
  ): Promise<FeatureOverride | undefined> {
    if (identifiers.length === 0) return undefined
    const wanted = new Set(identifiers)

    let latest: FeatureOverride | undefined
    for (const override of this.overrides.values()) {
      if (override.featureId !== featureId || override.targetType !== targetType) continue
      if (!wanted.has(override.targetIdentifier)) continue
      if (!latest || compareRecency(override, latest) > 0) latest = override
    }
    return latest && { ...latest }
  }

  async features(): Promise<Feature[]> {
    return [...this.featuresByKey.values()]
      .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
      .map(feature => ({ ...feature }))
  }

  async createFeature(input: FeatureInput): Promise<Feature> {
    const data = unwrap(validateFeatureInput(input))
    if (this.featuresByKey.has(data.key)) throw ConflictError.forFeatureKey(data.key)

    const now = this.now()
    const feature: Feature = {
      id: this.nextFeatureId++,
      key: data.key,
      defaultEnabled: data.defaultEnabled,
      description: data.description,
      createdAt: now,
      updatedAt: now,
    }
    this.featuresByKey.set(feature.key, feature)
    return { ...feature }
  }

  async updateFeature(key: string, changes: FeatureChanges): Promise<Feature> {
    const data = unwrap(validateFeatureChanges(changes))
    const existing = this.featuresByKey.get(key)
    if (!existing) throw new FeatureNotFoundError(key)

    const updated: Feature = {
      ...existing,
      defaultEnabled: data.defaultEnabled ?? existing.defaultEnabled,
      description: data.description !== undefined ? data.description : existing.description,
      updatedAt: this.now(),
    }
    this.featuresByKey.set(key, updated)
    return { ...updated }
  }

  async deleteFeature(key: string): Promise<void> {
    const feature = this.featuresByKey.get(key)
    if (!feature) return
    for (const [id, override] of this.overrides) {
      if (override.featureId === feature.id) this.overrides.delete(id)
    }
    this.featuresByKey.delete(key)
  }

  async overridesFor(featureId: number): Promise<FeatureOverride[]> {
    return [...this.overrides.values()]
      .filter(override => override.featureId === featureId)
      .sort((a, b) => compareRecency(a, b))
      .map(override => ({ ...override }))
  }

  async createOverride(input: OverrideDraft): Promise<FeatureOverride> {
    const data = unwrap(validateOverrideInput(input))
    if (!this.hasFeatureId(data.featureId)) throw new FeatureNotFoundError(data.featureId)

    // No await between the uniqueness check and the insert.
    if (this.locate(data.featureId, data.targetType, data.targetIdentifier)) {
      throw ConflictError.forOverride(data.featureId, data.targetType, data.targetIdentifier)
    }

    const now = this.now()
    const override: FeatureOverride = {
      id: this.nextOverrideId++,
      featureId: data.featureId,
      targetType: data.targetType,
      targetIdentifier: data.targetIdentifier,
      enabled: data.enabled,
      createdAt: now,
      updatedAt: now,
    }
    this.overrides.set(override.id, override)
    return { ...override }
  }

  async updateOverride(id: number, enabled: boolean): Promise<FeatureOverride> {
    const existing = this.overrides.get(id)
    if (!existing) throw new OverrideNotFoundError(id)

    const updated: FeatureOverride = { ...existing, enabled, updatedAt: this.now() }
    this.overrides.set(id, updated)
    return { ...updated }
  }

  async deleteOverride(id: number): Promise<void> {
    this.overrides.delete(id)
  }

  private locate(
    featureId: number,
    targetType: TargetType,
    targetIdentifier: string
  ): FeatureOverride | undefined {
    const wanted = this.targetKey(featureId, targetType, targetIdentifier)
    for (const override of this.overrides.values()) {
      if (this.targetKey(override.featureId, override.targetType, override.targetIdentifier) === wanted) {
        return override
      }
    }
    return undefined
  }

  private hasFeatureId(id: number): boolean {
    for (const feature of this.featuresByKey.values()) {
      if (feature.id === id) return true
    }
    return false
  }
}

/** Positive when `a` is more recent than `b`: later `createdAt`, then higher id. */
function compareRecency(a: FeatureOverride, b: FeatureOverride): number {
  const byTime = a.createdAt.getTime() - b.createdAt.getTime()
  return byTime !== 0 ? byTime : a.id - b.id
}
