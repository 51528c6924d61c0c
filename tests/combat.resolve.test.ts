import { beforeEach, describe, expect, it } from 'vitest'

import { getSkill } from '@content/registry'
import { grantBehavior } from '@engine/combat/behaviors'
import { resolveHit } from '@engine/combat/combat'
import { addCondition } from '@engine/combat/effects'
import { eventsOf, makeWorld, spawn, useContent } from './helpers/sim'

beforeEach(() => {
  useContent({
    chills: {
      frost_eyes: { missChance: 0.5, maxIntensity: 1 },
    },
    cozies: {
      snowball_shield: { blocksNextHit: true, maxIntensity: 1 },
      bundled_up: { modifiers: [{ kind: 'incoming_damage_multiplier', value: 0.75 }], maxIntensity: 1 },
      frosty_fortitude: { modifiers: [{ kind: 'healing_multiplier', value: 1.5 }], maxIntensity: 1 },
    },
    effects: {
      soaked_through: { timing: 'on_hit', durationMs: 5000, modifiers: [{ kind: 'incoming_damage_multiplier', value: 2 }] },
      shaken: { timing: 'on_block', durationMs: 2000 },
    },
    behaviors: {
      payback: { trigger: 'on_hit_by_projectile', response: { type: 'deal_damage', amount: 6 }, target: 'source_of_damage' },
    },
    skills: {
      toss: { damage: 20, grants: { gritOnHit: 2 } },
      pierce: { damage: 20, penetration: 0.5 },
      flick: { damage: 20, projectile: 'instant' },
      soak: { damage: 20, effects: ['soaked_through'] },
      feint: { damage: 20, effects: ['shaken'] },
      sure_shot: { damage: 20, unblockable: true },
      cocoa: { skillType: 'gesture', targetType: 'ally', healing: 20 },
    },
  })
})

function duel(seed = 1) {
  const state = makeWorld(seed)
  const a = spawn(state, 'Ava', 'red')
  const b = spawn(state, 'Ben', 'blue')
  return { state, a, b }
}

describe('mitigation in the hit pipeline', () => {
  it('runs damage through armor and rounds it', () => {
    const { state, a, b } = duel()
    b.armor = 40
    expect(resolveHit(state, a, b, getSkill('toss'))).toBe('hit')
    expect(b.warmth).toBe(90)
    expect(eventsOf(state, 'hit')).toEqual([{ type: 'hit', sourceId: a.id, targetId: b.id, skillId: 'toss', damage: 10 }])
  })

  it('lets penetration ignore part of the armor', () => {
    const { state, a, b } = duel()
    b.armor = 80
    resolveHit(state, a, b, getSkill('pierce'))
    expect(b.warmth).toBe(90)
  })

  it('applies incoming multipliers before armor', () => {
    const { state, a, b } = duel()
    b.armor = 40
    addCondition(state, b, 'cozy', { id: 'bundled_up', durationMs: 5000, intensity: 1 }, b.id)
    resolveHit(state, a, b, getSkill('toss'))
    expect(b.warmth).toBe(92)
  })

  it('lands on-hit effects after the damage', () => {
    const { state, a, b } = duel()
    resolveHit(state, a, b, getSkill('soak'))
    expect(b.warmth).toBe(80)
    resolveHit(state, a, b, getSkill('soak'))
    expect(b.warmth).toBe(40)
  })

  it('caps grit gained on hit', () => {
    const { state, a, b } = duel()
    for (let i = 0; i < 3; i++) resolveHit(state, a, b, getSkill('toss'))
    expect(a.secondary.grit).toBe(5)
  })
})

describe('avoidance', () => {
  it('consumes a shield without a roll', () => {
    const { state, a, b } = duel()
    addCondition(state, b, 'cozy', { id: 'snowball_shield', durationMs: 5000, intensity: 1 }, b.id)
    expect(resolveHit(state, a, b, getSkill('toss'))).toBe('blocked')
    expect(b.warmth).toBe(100)
    expect(b.cozies).toEqual([])
    expect(state.rngSeed).toBe(1)
    expect(resolveHit(state, a, b, getSkill('toss'))).toBe('hit')
    expect(b.warmth).toBe(80)
  })

  it('misses on a low roll and applies on-block effects', () => {
    const { state, a, b } = duel()
    addCondition(state, a, 'chill', { id: 'frost_eyes', durationMs: 5000, intensity: 1 }, b.id)
    expect(resolveHit(state, a, b, getSkill('feint'))).toBe('missed')
    expect(b.warmth).toBe(100)
    expect(b.effects.map((inst) => inst.effectId)).toEqual(['shaken'])
  })

  it('never rolls for an unblockable skill', () => {
    const { state, a, b } = duel()
    addCondition(state, a, 'chill', { id: 'frost_eyes', durationMs: 5000, intensity: 1 }, b.id)
    addCondition(state, b, 'cozy', { id: 'snowball_shield', durationMs: 5000, intensity: 1 }, b.id)
    expect(resolveHit(state, a, b, getSkill('sure_shot'))).toBe('hit')
    expect(b.warmth).toBe(80)
    expect(b.cozies).toHaveLength(1)
    expect(state.rngSeed).toBe(1)
  })
})

describe('projectiles and healing', () => {
  it('lets projectile behaviors answer thrown hits only', () => {
    const { state, a, b } = duel()
    grantBehavior(state, 'payback', b, b)
    resolveHit(state, a, b, getSkill('toss'))
    expect(b.warmth).toBe(80)
    expect(a.warmth).toBe(94)
    resolveHit(state, a, b, getSkill('flick'))
    expect(b.warmth).toBe(60)
    expect(a.warmth).toBe(94)
  })

  it('scales healing by the target multiplier and caps at max warmth', () => {
    const { state, a } = duel()
    const pal = spawn(state, 'Pip', 'red', { warmth: 50 })
    addCondition(state, pal, 'cozy', { id: 'frosty_fortitude', durationMs: 5000, intensity: 1 }, pal.id)
    resolveHit(state, a, pal, getSkill('cocoa'))
    expect(pal.warmth).toBe(80)
    resolveHit(state, a, pal, getSkill('cocoa'))
    expect(pal.warmth).toBe(100)
    expect(eventsOf(state, 'heal').map((event) => event.amount)).toEqual([30, 20])
  })
})
