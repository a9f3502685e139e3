// ── Targets ──────────────────────────────────────────────────────────────

export const TARGET_TYPES = ['User', 'Group'] as const

/** The category an override is scoped to. */
export type TargetType = (typeof TARGET_TYPES)[number]

// ── Records ──────────────────────────────────────────────────────────────

export interface Feature {
  id: number
  key: string
  defaultEnabled: boolean
  description: string | null
  createdAt: Date
  updatedAt: Date
}

/**
 * A targeted exception to a feature's default, scoped to one user or one group.
 * `createdAt` orders competing group overrides and never moves.
 */
export interface FeatureOverride {
  id: number
  featureId: number
  targetType: TargetType
  targetIdentifier: string
  enabled: boolean
  createdAt: Date
  updatedAt: Date
}

// ── Evaluation ───────────────────────────────────────────────────────────

export interface EvaluationContext {
  /** May be empty; an empty id simply matches no user override. */
  userId: string
  groups: Iterable<string>
}

export interface EvaluateRequest extends EvaluationContext {
  featureKey: string
}

export type EvaluationReason = 'feature_not_found' | 'user_override' | 'group_override' | 'default'

export interface EvaluationResult {
  featureKey: string
  enabled: boolean
  reason: EvaluationReason
  /** The override that decided the result, when one did. */
  override?: FeatureOverride
}

// ── Configuration ────────────────────────────────────────────────────────

export interface FlagConfig {
  default: string
  drivers: Record<string, DriverConfig>
}

export interface DriverConfig {
  driver: string
  [key: string]: unknown
}
