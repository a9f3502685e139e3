import type { FeatureStore } from './feature_store.ts'
import type { EvaluateRequest, EvaluationResult } from './types.ts'
import { silentLogger, type Logger } from './logger.ts'
import { ValidationError } from './errors.ts'

export interface EvaluatorOptions {
  logger?: Logger
}

/**
 * Decides whether a feature is enabled for a user and their groups.
 *
 * Precedence, first match wins:
 *   1. the user's own override
 *   2. the most recently created override among the user's groups
 *   3. the feature's default
 *
 * Unknown features are disabled. The evaluator only reads from the store and
 * keeps no per-call state. Store failures propagate; they are never reported
 * as `false`.
 */
export class Evaluator {
  private logger: Logger

  constructor(
    private store: FeatureStore,
    options: EvaluatorOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger()
  }

  async enabled(request: EvaluateRequest): Promise<boolean> {
    return (await this.evaluate(request)).enabled
  }

  async evaluate(request: EvaluateRequest): Promise<EvaluationResult> {
    const { featureKey, userId } = request
    const groups = distinctGroups(request.groups)

    const feature = await this.store.findFeature(featureKey)
    if (!feature) {
      return this.decide({ featureKey, enabled: false, reason: 'feature_not_found' })
    }

    if (userId !== '') {
      const override = await this.store.findOverride(feature.id, 'User', userId)
      if (override) {
        return this.decide({ featureKey, enabled: override.enabled, reason: 'user_override', override })
      }
    }

    if (groups.length > 0) {
      const override = await this.store.findLatestOverride(feature.id, 'Group', groups)
      if (override) {
        return this.decide({ featureKey, enabled: override.enabled, reason: 'group_override', override })
      }
    }

    return this.decide({ featureKey, enabled: feature.defaultEnabled, reason: 'default' })
  }

  private decide(result: EvaluationResult): EvaluationResult {
    this.logger.debug(
      {
        feature: result.featureKey,
        enabled: result.enabled,
        reason: result.reason,
        overrideId: result.override?.id,
      },
      'flag evaluated'
    )
    return result
  }
}

/**
 * Group names with blanks dropped and duplicates removed. A bare string is
 * iterable too, but would be read as one group per character, so it is refused.
 */
export function distinctGroups(groups: Iterable<string>): string[] {
  if (typeof groups === 'string') {
    throw new ValidationError(['Groups must be a list of group names, not a single string'])
  }
  const seen = new Set<string>()
  for (const group of groups) {
    if (group !== '') seen.add(group)
  }
  return [...seen]
}
