import type { ConditionOp, Filter } from '@config/schema'
import { CONFIG } from '@config/store'
import { distance, isAlly, livingCharacters } from './state'
import type { Character, SimState } from './types'

export interface ConditionContext {
  state: SimState
  caster?: Character
  target?: Character
}

/**
 * Pure read of the current state. A test whose subject is missing or dead
 * evaluates false; an empty filter is true.
 */
export function matchesFilter(ctx: ConditionContext, filter: Filter | undefined): boolean {
  if (!filter) return true
  let result = true

  if (filter.test) {
    result = result && evaluateTest(ctx, filter.test)
  }

  if (filter.all) {
    result = result && filter.all.every((inner) => matchesFilter(ctx, inner))
  }

  if (filter.any) {
    result = result && filter.any.some((inner) => matchesFilter(ctx, inner))
  }

  if (filter.not) {
    result = result && !matchesFilter(ctx, filter.not)
  }

  return result
}

function evaluateTest(ctx: ConditionContext, test: NonNullable<Filter['test']>): boolean {
  const subject = test.subject === 'caster' ? ctx.caster : ctx.target
  if (!subject || !subject.alive) return false
  const { key, op, value } = test
  switch (key) {
    case 'warmthPct':
      return compareNumeric(fraction(subject.warmth, subject.maxWarmth), op, value)
    case 'energyPct':
      return compareNumeric(fraction(subject.energy, subject.maxEnergy), op, value)
    case 'grit':
      return compareNumeric(subject.secondary.grit, op, value)
    case 'rhythm':
      return compareNumeric(subject.secondary.rhythm, op, value)
    case 'credit':
      return compareNumeric(subject.secondary.credit, op, value)
    case 'secondary':
      return compareNumeric(secondaryResource(subject), op, value)
    case 'terrain':
      return compareValue(ctx.state.terrain.terrainAt(subject.position), op, value)
    case 'distance': {
      const other = subject === ctx.caster ? ctx.target : ctx.caster
      if (!other || !other.alive) return false
      return compareNumeric(distance(subject.position, other.position), op, value)
    }
    case 'alliesNearby':
      return compareNumeric(countNearby(ctx.state, subject, true), op, value)
    case 'foesNearby':
      return compareNumeric(countNearby(ctx.state, subject, false), op, value)
    case 'hasChill':
      return compareSet(subject.chills.map((entry) => entry.defId), op, value)
    case 'hasCozy':
      return compareSet(subject.cozies.map((entry) => entry.defId), op, value)
    case 'hasEffect':
      return compareSet(subject.effects.map((entry) => entry.effectId), op, value)
    case 'school':
      return compareValue(subject.school, op, value)
    case 'casting':
      return compareValue(subject.casting.phase !== 'idle', op, value)
    default:
      return false
  }
}

export function secondaryResource(c: Character): number {
  switch (c.school) {
    case 'public':
      return c.secondary.grit
    case 'private':
      return c.secondary.credit
    case 'waldorf':
      return c.secondary.rhythm
    case 'homeschool':
      return fraction(c.warmth, c.maxWarmth)
    default:
      return 0
  }
}

function countNearby(state: SimState, subject: Character, allies: boolean): number {
  const range = CONFIG().balance.EARSHOT_RANGE
  return livingCharacters(state).filter(
    (other) =>
      other.id !== subject.id &&
      isAlly(other, subject) === allies &&
      distance(other.position, subject.position) <= range,
  ).length
}

function compareNumeric(actual: number, op: ConditionOp, expected: unknown): boolean {
  if (op === 'in' || op === 'notIn') {
    const values: unknown[] = Array.isArray(expected) ? expected : [expected]
    const numbers = values
      .map((entry) => (typeof entry === 'number' ? entry : Number(entry)))
      .filter((entry) => Number.isFinite(entry))
    const has = numbers.some((entry) => entry === actual)
    return op === 'in' ? has : !has
  }

  const expectedNumber = typeof expected === 'number' ? expected : Number(expected)
  if (!Number.isFinite(expectedNumber)) {
    return false
  }

  switch (op) {
    case 'lt':
      return actual < expectedNumber
    case 'lte':
      return actual <= expectedNumber
    case 'eq':
      return actual === expectedNumber
    case 'gte':
      return actual >= expectedNumber
    case 'gt':
      return actual > expectedNumber
    case 'ne':
      return actual !== expectedNumber
    default:
      return false
  }
}

function compareValue(actual: string | boolean, op: ConditionOp, expected: unknown): boolean {
  if (op === 'in' || op === 'notIn') {
    const values: unknown[] = Array.isArray(expected) ? expected : [expected]
    const has = values.some((entry) => entry === actual)
    return op === 'in' ? has : !has
  }

  switch (op) {
    case 'eq':
      return actual === expected
    case 'ne':
      return actual !== expected
    default:
      return false
  }
}

function compareSet(actual: string[], op: ConditionOp, expected: unknown): boolean {
  const values: unknown[] = Array.isArray(expected) ? expected : [expected]
  const cleaned = values.filter((entry): entry is string => typeof entry === 'string')

  switch (op) {
    case 'eq':
      return cleaned.every((entry) => actual.includes(entry))
    case 'ne':
      return cleaned.every((entry) => !actual.includes(entry))
    case 'in':
      return cleaned.some((entry) => actual.includes(entry))
    case 'notIn':
      return cleaned.every((entry) => !actual.includes(entry))
    default:
      return false
  }
}

function fraction(current: number, max: number): number {
  if (max <= 0) return 0
  return current / max
}
