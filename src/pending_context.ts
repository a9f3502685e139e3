import type { EvaluationContext, EvaluationResult } from './types.ts'
import { distinctGroups, type Evaluator } from './evaluator.ts'

/** Fluent context-bound feature check, created by `FlagManager.for(context)`. */
export default class PendingContext {
  private context: EvaluationContext

  constructor(
    private evaluator: Evaluator,
    context: EvaluationContext
  ) {
    // Iterables such as generators can only be walked once.
    this.context = { userId: context.userId, groups: distinctGroups(context.groups) }
  }

  evaluate(featureKey: string): Promise<EvaluationResult> {
    return this.evaluator.evaluate({ featureKey, ...this.context })
  }

  enabled(featureKey: string): Promise<boolean> {
    return this.evaluator.enabled({ featureKey, ...this.context })
  }

  async disabled(featureKey: string): Promise<boolean> {
    return !(await this.enabled(featureKey))
  }

  async values(featureKeys: string[]): Promise<Map<string, boolean>> {
    const result = new Map<string, boolean>()
    for (const key of featureKeys) {
      result.set(key, await this.enabled(key))
    }
    return result
  }
}
