import { describe, test, expect, beforeEach } from 'vitest'
import pino from 'pino'
import FlagManager from '../src/flag_manager.ts'
import { ArrayDriver } from '../src/drivers/array_driver.ts'
import PendingContext from '../src/pending_context.ts'
import { Evaluator } from '../src/evaluator.ts'
import {
  ConfigurationError,
  ConflictError,
  FeatureNotFoundError,
  ValidationError,
} from '../src/errors.ts'
import type { FlagConfig } from '../src/types.ts'

// ── Helpers ──────────────────────────────────────────────────────────────

function arrayConfig(overrides: Partial<FlagConfig> = {}): FlagConfig {
  return {
    default: 'array',
    drivers: {
      array: { driver: 'array' },
    },
    ...overrides,
  }
}

let manager: FlagManager

beforeEach(() => {
  manager = new FlagManager(arrayConfig())
})

// ── Tests ────────────────────────────────────────────────────────────────

describe('FlagManager', () => {
  // ── Scenarios ──────────────────────────────────────────────────────

  test('absent feature is disabled', async () => {
    expect(await manager.enabled('dark_mode', { userId: '123', groups: ['beta_testers'] })).toBe(false)
  })

  test('default decides when there are no overrides', async () => {
    await manager.createFeature({ key: 'dark_mode', defaultEnabled: false })
    const context = { userId: '123', groups: ['beta_testers'] }

    expect(await manager.enabled('dark_mode', context)).toBe(false)

    await manager.updateFeature('dark_mode', { defaultEnabled: true })
    expect(await manager.enabled('dark_mode', context)).toBe(true)
  })

  test('user override beats group override', async () => {
    await manager.createFeature({ key: 'dark_mode', defaultEnabled: false })
    await manager.addOverride('dark_mode', { targetType: 'User', targetIdentifier: '123', enabled: false })
    await manager.addOverride('dark_mode', {
      targetType: 'Group',
      targetIdentifier: 'beta_testers',
      enabled: true,
    })

    expect(await manager.enabled('dark_mode', { userId: '123', groups: ['beta_testers'] })).toBe(false)
  })

  test('later group override decides', async () => {
    await manager.createFeature({ key: 'dark_mode', defaultEnabled: false })
    await manager.addOverride('dark_mode', {
      targetType: 'Group',
      targetIdentifier: 'beta_testers',
      enabled: false,
    })
    const admins = await manager.addOverride('dark_mode', {
      targetType: 'Group',
      targetIdentifier: 'admins',
      enabled: true,
    })

    const result = await manager.evaluate({
      featureKey: 'dark_mode',
      userId: '999',
      groups: ['beta_testers', 'admins'],
    })
    expect(result.enabled).toBe(true)
    expect(result.override?.id).toBe(admins.id)
  })

  test('disabled is the inverse of enabled', async () => {
    await manager.createFeature({ key: 'dark_mode', defaultEnabled: true })
    expect(await manager.disabled('dark_mode', { userId: '1', groups: [] })).toBe(false)
    expect(await manager.disabled('missing', { userId: '1', groups: [] })).toBe(true)
  })

  // ── Context-bound API (.for()) ─────────────────────────────────────

  test('for() returns PendingContext', () => {
    expect(manager.for({ userId: '1', groups: [] })).toBeInstanceOf(PendingContext)
  })

  test('for(context) checks several features', async () => {
    await manager.createFeature({ key: 'a', defaultEnabled: true })
    await manager.createFeature({ key: 'b', defaultEnabled: false })
    await manager.addOverride('b', { targetType: 'Group', targetIdentifier: 'staff', enabled: true })

    const staff = manager.for({ userId: '1', groups: ['staff'] })
    const values = await staff.values(['a', 'b', 'c'])

    expect([...values]).toEqual([
      ['a', true],
      ['b', true],
      ['c', false],
    ])
    expect(await staff.disabled('c')).toBe(true)
    expect((await staff.evaluate('b')).reason).toBe('group_override')
  })

  test('for(context) keeps groups given as a one-shot iterable', async () => {
    await manager.createFeature({ key: 'a', defaultEnabled: false })
    await manager.addOverride('a', { targetType: 'Group', targetIdentifier: 'staff', enabled: true })

    function* groups(): Generator<string> {
      yield 'staff'
    }
    const scoped = manager.for({ userId: '1', groups: groups() })

    expect(await scoped.enabled('a')).toBe(true)
    expect(await scoped.enabled('a')).toBe(true)
  })

  test('for(context) refuses a single string as groups', () => {
    expect(() => manager.for({ userId: '1', groups: 'staff' })).toThrow(ValidationError)
  })

  // ── Administration ─────────────────────────────────────────────────

  test('features are listed by key', async () => {
    await manager.createFeature({ key: 'b' })
    await manager.createFeature({ key: 'a' })
    expect((await manager.features()).map(f => f.key)).toEqual(['a', 'b'])
  })

  test('feature() looks up by key', async () => {
    await manager.createFeature({ key: 'dark_mode', description: 'Dark theme' })
    expect((await manager.feature('dark_mode'))?.description).toBe('Dark theme')
    expect(await manager.feature('nope')).toBeUndefined()
  })

  test('duplicate feature key conflicts', async () => {
    await manager.createFeature({ key: 'dark_mode' })
    await expect(manager.createFeature({ key: 'dark_mode' })).rejects.toBeInstanceOf(ConflictError)
  })

  test('invalid feature input is a validation error', async () => {
    await expect(manager.createFeature({ key: '' })).rejects.toBeInstanceOf(ValidationError)
  })

  test('addOverride on missing feature throws', async () => {
    await expect(
      manager.addOverride('nope', { targetType: 'User', targetIdentifier: '1', enabled: true })
    ).rejects.toThrow('Feature "nope" does not exist.')
  })

  test('duplicate override conflicts and keeps the original verdict', async () => {
    await manager.createFeature({ key: 'dark_mode' })
    await manager.addOverride('dark_mode', { targetType: 'User', targetIdentifier: '1', enabled: true })

    await expect(
      manager.addOverride('dark_mode', { targetType: 'User', targetIdentifier: '1', enabled: false })
    ).rejects.toBeInstanceOf(ConflictError)
    expect(await manager.enabled('dark_mode', { userId: '1', groups: [] })).toBe(true)
  })

  test('updateOverride and removeOverride', async () => {
    await manager.createFeature({ key: 'dark_mode', defaultEnabled: false })
    const o = await manager.addOverride('dark_mode', { targetType: 'User', targetIdentifier: '1', enabled: true })

    await manager.updateOverride(o.id, false)
    expect((await manager.overrides('dark_mode')).map(x => x.enabled)).toEqual([false])

    await manager.removeOverride(o.id)
    expect(await manager.overrides('dark_mode')).toEqual([])
  })

  test('overrides() on missing feature throws', async () => {
    await expect(manager.overrides('nope')).rejects.toBeInstanceOf(FeatureNotFoundError)
  })

  test('deleteFeature removes the feature and its overrides', async () => {
    await manager.createFeature({ key: 'dark_mode', defaultEnabled: true })
    await manager.addOverride('dark_mode', { targetType: 'User', targetIdentifier: '1', enabled: true })

    await manager.deleteFeature('dark_mode')
    expect(await manager.features()).toEqual([])
    expect(await manager.enabled('dark_mode', { userId: '1', groups: [] })).toBe(false)

    await manager.createFeature({ key: 'dark_mode' })
    expect(await manager.overrides('dark_mode')).toEqual([])
  })

  test('admin mutations are logged', async () => {
    const lines: string[] = []
    const logger = pino({ level: 'info', base: null }, { write: (line: string) => lines.push(line) })
    const logged = new FlagManager(arrayConfig(), { logger })

    await logged.createFeature({ key: 'dark_mode' })
    await logged.addOverride('dark_mode', { targetType: 'Group', targetIdentifier: 'a', enabled: true })

    expect(lines.map(line => JSON.parse(line).msg)).toEqual(['feature created', 'override created'])
  })

  // ── Driver management ──────────────────────────────────────────────

  test('store() returns array driver', () => {
    const store = manager.store()
    expect(store).toBeInstanceOf(ArrayDriver)
    expect(store.name).toBe('array')
  })

  test('store instances are cached', () => {
    expect(manager.store()).toBe(manager.store())
  })

  test('evaluator is built over the default store', () => {
    expect(manager.evaluator()).toBeInstanceOf(Evaluator)
    expect(manager.evaluator()).toBe(manager.evaluator())
  })

  test('throws when the driver is not configured', () => {
    const broken = new FlagManager(arrayConfig({ default: 'redis' }))
    expect(() => broken.store()).toThrow('Flag driver "redis" is not configured.')
  })

  test('throws on unknown driver', () => {
    const custom = new FlagManager(
      arrayConfig({ drivers: { custom: { driver: 'custom' } }, default: 'custom' })
    )
    expect(() => custom.store()).toThrow('Unknown flag driver')
  })

  test('extend registers custom driver', async () => {
    const custom = new FlagManager(
      arrayConfig({ drivers: { custom: { driver: 'custom' } }, default: 'custom' })
    )
    const backing = new ArrayDriver()
    await backing.createFeature({ key: 'dark_mode', defaultEnabled: true })
    custom.extend('custom', () => backing)

    expect(custom.store()).toBe(backing)
    expect(await custom.enabled('dark_mode', { userId: '', groups: [] })).toBe(true)
  })

  test('database driver without a connection is a configuration error', () => {
    const db = new FlagManager({ default: 'database', drivers: { database: { driver: 'database' } } })
    expect(() => db.store()).toThrow(ConfigurationError)
  })

  test('ensureTables is a no-op for the array driver', async () => {
    await expect(manager.ensureTables()).resolves.toBeUndefined()
  })

  test('close() drops resolved stores', async () => {
    const before = manager.store()
    await manager.close()
    expect(manager.store()).not.toBe(before)
  })
})
