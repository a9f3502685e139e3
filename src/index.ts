// Manager
export { default, default as FlagManager } from './flag_manager.ts'
export type { FlagManagerOptions, OverrideRequest } from './flag_manager.ts'

// Evaluation
export { Evaluator } from './evaluator.ts'
export type { EvaluatorOptions } from './evaluator.ts'
export { default as PendingContext } from './pending_context.ts'

// Store interface
export type { FeatureStore } from './feature_store.ts'

// Drivers
export { DatabaseDriver } from './drivers/database_driver.ts'
export { ArrayDriver } from './drivers/array_driver.ts'
export type { ArrayDriverOptions } from './drivers/array_driver.ts'

// Validation
export { validateFeatureInput, validateFeatureChanges, validateOverrideInput } from './validation.ts'
export type {
  FeatureInput,
  NewFeature,
  FeatureChanges,
  OverrideInput,
  OverrideDraft,
} from './validation.ts'
export { ok, err, unwrap } from './result.ts'
export type { Result, Ok, Err } from './result.ts'

// Configuration & logging
export { loadConfig } from './config.ts'
export type { AppConfig } from './config.ts'
export { createLogger, silentLogger } from './logger.ts'
export type { CreateLoggerOptions, Logger } from './logger.ts'

// Errors
export {
  FlagError,
  ValidationError,
  ConflictError,
  FeatureNotFoundError,
  OverrideNotFoundError,
  StoreUnavailableError,
  ConfigurationError,
} from './errors.ts'
export type { FlagErrorCode } from './errors.ts'

// Types
export type {
  Feature,
  FeatureOverride,
  TargetType,
  EvaluationContext,
  EvaluateRequest,
  EvaluationReason,
  EvaluationResult,
  FlagConfig,
  DriverConfig,
} from './types.ts'
export { TARGET_TYPES } from './types.ts'
