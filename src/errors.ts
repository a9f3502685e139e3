import type { TargetType } from './types.ts'

export type FlagErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONFLICT'
  | 'FEATURE_NOT_FOUND'
  | 'OVERRIDE_NOT_FOUND'
  | 'STORE_UNAVAILABLE'
  | 'CONFIGURATION_ERROR'

export class FlagError extends Error {
  constructor(
    message: string,
    readonly code: FlagErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Input rejected before any write. `messages` are meant for inline display. */
export class ValidationError extends FlagError {
  constructor(readonly messages: string[]) {
    super(messages.join(', '), 'VALIDATION_ERROR')
  }
}

export class ConflictError extends FlagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFLICT', options)
  }

  static forFeatureKey(key: string, cause?: unknown): ConflictError {
    return new ConflictError(`Feature "${key}" already exists.`, { cause })
  }

  static forOverride(
    featureId: number,
    targetType: TargetType,
    targetIdentifier: string,
    cause?: unknown
  ): ConflictError {
    return new ConflictError(
      `Feature #${featureId} already has an override for ${targetType} "${targetIdentifier}".`,
      { cause }
    )
  }
}

export class FeatureNotFoundError extends FlagError {
  constructor(feature: string | number, options?: { cause?: unknown }) {
    super(
      typeof feature === 'number'
        ? `Feature #${feature} does not exist.`
        : `Feature "${feature}" does not exist.`,
      'FEATURE_NOT_FOUND',
      options
    )
  }
}

export class OverrideNotFoundError extends FlagError {
  constructor(id: number) {
    super(`Override #${id} does not exist.`, 'OVERRIDE_NOT_FOUND')
  }
}

/** The backing store could not answer. Never to be read as "feature disabled". */
export class StoreUnavailableError extends FlagError {
  constructor(store: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Flag store "${store}" is unavailable: ${reason}`, 'STORE_UNAVAILABLE', { cause })
  }
}

export class ConfigurationError extends FlagError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR')
  }
}
