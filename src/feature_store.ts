import type { Feature, FeatureOverride, TargetType } from './types.ts'
import type { FeatureInput, FeatureChanges, OverrideDraft } from './validation.ts'

/**
 * Contract that every flag storage driver must implement.
 *
 * Drivers own the record invariants: they validate input before writing,
 * reject duplicate feature keys and override targets with a `ConflictError`,
 * and delete a feature's overrides together with the feature. Failures to
 * reach the backing store surface as `StoreUnavailableError`, never as a
 * missing record.
 */
export interface FeatureStore {
  readonly name: string

  // ── Evaluation lookups ─────────────────────────────────────────────

  /** Exact match on the unique key. */
  findFeature(key: string): Promise<Feature | undefined>

  /** Exact match on (feature, target type, identifier). */
  findOverride(
    featureId: number,
    targetType: TargetType,
    targetIdentifier: string
  ): Promise<FeatureOverride | undefined>

  /**
   * The most recently created override whose identifier is one of `identifiers`.
   * Equal `createdAt` values fall back to the highest id.
   */
  findLatestOverride(
    featureId: number,
    targetType: TargetType,
    identifiers: readonly string[]
  ): Promise<FeatureOverride | undefined>

  // ── Features ───────────────────────────────────────────────────────

  /** All features, ordered by key. */
  features(): Promise<Feature[]>

  createFeature(input: FeatureInput): Promise<Feature>

  updateFeature(key: string, changes: FeatureChanges): Promise<Feature>

  /** Remove a feature and every override it owns. No-op when missing. */
  deleteFeature(key: string): Promise<void>

  // ── Overrides ──────────────────────────────────────────────────────

  /** A feature's overrides, oldest first. */
  overridesFor(featureId: number): Promise<FeatureOverride[]>

  createOverride(input: OverrideDraft): Promise<FeatureOverride>

  /** Change an override's verdict in place. `createdAt` is left untouched. */
  updateOverride(id: number, enabled: boolean): Promise<FeatureOverride>

  /** No-op when missing. */
  deleteOverride(id: number): Promise<void>
}
