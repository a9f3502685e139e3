import { describe, test, expect } from 'vitest'
import {
  validateFeatureInput,
  validateFeatureChanges,
  validateOverrideInput,
} from '../src/validation.ts'
import { ValidationError } from '../src/errors.ts'
import { unwrap } from '../src/result.ts'

function messages(result: { ok: boolean; error?: ValidationError }): string[] {
  return result.error?.messages ?? []
}

describe('validateFeatureInput', () => {
  test('fills defaults', () => {
    const result = validateFeatureInput({ key: 'dark_mode' })
    expect(result).toEqual({
      ok: true,
      value: { key: 'dark_mode', defaultEnabled: false, description: null },
    })
  })

  test('keeps description and default', () => {
    const result = validateFeatureInput({ key: 'dark_mode', defaultEnabled: true, description: 'Dark theme' })
    expect(unwrap(result)).toEqual({ key: 'dark_mode', defaultEnabled: true, description: 'Dark theme' })
  })

  test('blank key', () => {
    const result = validateFeatureInput({ key: '' })
    expect(result.ok).toBe(false)
    expect(messages(result)).toEqual(["Key can't be blank"])
  })

  test('whitespace-only key', () => {
    expect(messages(validateFeatureInput({ key: '  \t' }))).toEqual(["Key can't be blank"])
  })

  test('missing key', () => {
    expect(messages(validateFeatureInput({}))).toEqual(["Key can't be blank"])
  })

  test('overlong key', () => {
    expect(messages(validateFeatureInput({ key: 'k'.repeat(256) }))).toEqual([
      'Key is too long (maximum is 255 characters)',
    ])
  })

  test('non-boolean default', () => {
    expect(messages(validateFeatureInput({ key: 'a', defaultEnabled: 'yes' }))).toEqual([
      'Default enabled must be true or false',
    ])
  })
})

describe('validateFeatureChanges', () => {
  test('accepts partial changes', () => {
    expect(unwrap(validateFeatureChanges({ defaultEnabled: true }))).toEqual({ defaultEnabled: true })
    expect(unwrap(validateFeatureChanges({ description: null }))).toEqual({ description: null })
  })

  test('rejects non-boolean default', () => {
    expect(messages(validateFeatureChanges({ defaultEnabled: 1 }))).toEqual([
      'Default enabled must be true or false',
    ])
  })
})

describe('validateOverrideInput', () => {
  const valid = { featureId: 1, targetType: 'Group', targetIdentifier: 'beta_testers', enabled: true }

  test('accepts User and Group targets', () => {
    expect(unwrap(validateOverrideInput(valid))).toEqual(valid)
    expect(unwrap(validateOverrideInput({ ...valid, targetType: 'User' })).targetType).toBe('User')
  })

  test('rejects other target types', () => {
    expect(messages(validateOverrideInput({ ...valid, targetType: 'Region' }))).toEqual([
      'Target type is not included in the list',
    ])
    expect(messages(validateOverrideInput({ ...valid, targetType: 'group' }))).toEqual([
      'Target type is not included in the list',
    ])
  })

  test('rejects blank identifier', () => {
    expect(messages(validateOverrideInput({ ...valid, targetIdentifier: ' ' }))).toEqual([
      "Target identifier can't be blank",
    ])
  })

  test('requires a boolean verdict', () => {
    expect(messages(validateOverrideInput({ ...valid, enabled: undefined }))).toEqual([
      'Enabled is not included in the list',
    ])
  })

  test('collects every problem', () => {
    const result = validateOverrideInput({ featureId: 1, targetType: '', targetIdentifier: '', enabled: true })
    expect(result.ok).toBe(false)
    expect(messages(result)).toEqual([
      'Target type is not included in the list',
      "Target identifier can't be blank",
    ])
    expect(result.ok ? undefined : result.error.message).toBe(
      "Target type is not included in the list, Target identifier can't be blank"
    )
  })

  test('unwrap throws the validation error', () => {
    expect(() => unwrap(validateOverrideInput({ ...valid, targetType: 'Team' }))).toThrow(ValidationError)
  })
})
