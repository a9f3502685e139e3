import { z } from 'zod'
import { TARGET_TYPES } from './types.ts'
import { ValidationError } from './errors.ts'
import { ok, err, type Result } from './result.ts'

const present = (label: string) =>
  z
    .string({ required_error: `${label} can't be blank`, invalid_type_error: `${label} must be a string` })
    .refine(value => value.trim().length > 0, { message: `${label} can't be blank` })

const FeatureInputSchema = z.object({
  key: present('Key').pipe(z.string().max(255, 'Key is too long (maximum is 255 characters)')),
  defaultEnabled: z.boolean({ invalid_type_error: 'Default enabled must be true or false' }).default(false),
  description: z.string().nullish().transform(value => value ?? null),
})

const FeatureChangesSchema = z.object({
  defaultEnabled: z.boolean({ invalid_type_error: 'Default enabled must be true or false' }).optional(),
  description: z.string().nullable().optional(),
})

const OverrideInputSchema = z.object({
  featureId: z.number({ required_error: 'Feature must exist' }).int().positive('Feature must exist'),
  targetType: z.enum(TARGET_TYPES, {
    errorMap: () => ({ message: 'Target type is not included in the list' }),
  }),
  targetIdentifier: present('Target identifier').pipe(
    z.string().max(255, 'Target identifier is too long (maximum is 255 characters)')
  ),
  enabled: z.boolean({
    required_error: 'Enabled is not included in the list',
    invalid_type_error: 'Enabled is not included in the list',
  }),
})

export type FeatureInput = z.input<typeof FeatureInputSchema>
export type NewFeature = z.output<typeof FeatureInputSchema>
export type FeatureChanges = z.output<typeof FeatureChangesSchema>
export type OverrideInput = z.output<typeof OverrideInputSchema>

/** Override input as it arrives from an administrative caller, before validation. */
export interface OverrideDraft {
  featureId: number
  targetType: string
  targetIdentifier: string
  enabled: boolean
}

function validate<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown
): Result<z.output<S>, ValidationError> {
  const parsed = schema.safeParse(input)
  if (parsed.success) return ok(parsed.data)
  return err(new ValidationError(parsed.error.issues.map(issue => issue.message)))
}

export function validateFeatureInput(input: unknown): Result<NewFeature, ValidationError> {
  return validate(FeatureInputSchema, input)
}

export function validateFeatureChanges(input: unknown): Result<FeatureChanges, ValidationError> {
  return validate(FeatureChangesSchema, input)
}

export function validateOverrideInput(input: unknown): Result<OverrideInput, ValidationError> {
  return validate(OverrideInputSchema, input)
}
