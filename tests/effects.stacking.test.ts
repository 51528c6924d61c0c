import { beforeEach, describe, expect, it } from 'vitest'

import { addCondition, advanceEffectTimers, applyEffect, cleanse, expireEffects, removeEffects, tickEffects } from '@engine/combat/effects'
import { modifierTotals } from '@engine/combat/modifiers'
import { runTicks } from '@engine/combat/simulation'
import { effectiveArmor } from '@engine/combat/rules'
import { eventsOf, makeWorld, spawn, useContent } from './helpers/sim'

beforeEach(() => {
  useContent({
    chills: {
      frost_eyes: { missChance: 0.5, maxIntensity: 1 },
      soggy: { modifiers: [{ kind: 'warmth_per_second', value: -2 }], maxIntensity: 3 },
    },
    cozies: {
      snow_goggles: { immuneTo: ['frost_eyes'] },
    },
    effects: {
      chilled: { durationMs: 3000, stacking: 'refresh_duration', modifiers: [{ kind: 'armor_add', value: -5 }] },
      momentum: { durationMs: 6000, stacking: 'stack_intensity', maxStacks: 3, isBuff: true, modifiers: [{ kind: 'damage_multiplier', value: 1.1 }] },
      snowflake: { durationMs: 1000, stacking: 'independent' },
      once: { durationMs: 1000, stacking: 'ignore_if_active' },
      finisher: {
        durationMs: 1000,
        condition: { test: { key: 'warmthPct', op: 'lt', value: 0.5 } },
      },
      brittle: {
        durationMs: 4000,
        chains: {
          onEnd: { effectId: 'shatter', target: 'holder' },
          onRemovedEarly: { effectId: 'thawed_out', target: 'source' },
        },
      },
      shatter: { durationMs: 0, modifiers: [{ kind: 'damage', value: 8 }] },
      renewing: { durationMs: 1000, stacking: 'stack_intensity', maxStacks: 5, chains: { onEnd: 'renewing' } },
      thawed_out: { durationMs: 3000, isBuff: true },
      echo: { durationMs: 1000, stacking: 'independent', chains: { initial: 'echo' } },
      drip: { timing: 'over_time', durationMs: 1000, stacking: 'independent', modifiers: [{ kind: 'warmth_per_second', value: -10 }] },
      cold_stiff: {
        timing: 'while_active',
        durationMs: 8000,
        condition: { test: { key: 'warmthPct', op: 'lt', value: 0.5 } },
        modifiers: [{ kind: 'armor_multiplier', value: 0.5 }],
      },
    },
  })
})

describe('stacking policies', () => {
  it('refreshes a single instance', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red')
    const b = spawn(state, 'Ben', 'blue')
    expect(applyEffect(state, 'chilled', a, b)).toBe('applied')
    b.effects[0].remainingMs = 100
    expect(applyEffect(state, 'chilled', a, b)).toBe('applied')
    expect(b.effects).toHaveLength(1)
    expect(b.effects[0].remainingMs).toBe(3000)
    expect(b.effects[0].stacks).toBe(1)
  })

  it('adds intensity up to the cap', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red')
    for (let i = 0; i < 5; i++) applyEffect(state, 'momentum', a, a)
    expect(a.effects).toHaveLength(1)
    expect(a.effects[0].stacks).toBe(3)
    expect(modifierTotals(a).damage_multiplier).toBeCloseTo(1.3)
  })

  it('keeps independent instances apart', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red')
    applyEffect(state, 'snowflake', a, a)
    applyEffect(state, 'snowflake', a, a)
    applyEffect(state, 'snowflake', a, a)
    expect(a.effects).toHaveLength(3)
    expect(new Set(a.effects.map((inst) => inst.instanceId)).size).toBe(3)
  })

  it('ignores a second application while active', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red')
    expect(applyEffect(state, 'once', a, a)).toBe('applied')
    expect(applyEffect(state, 'once', a, a)).toBe('skipped')
    expect(a.effects).toHaveLength(1)
  })

  it('skips silently when the condition is false', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red')
    const b = spawn(state, 'Ben', 'blue')
    expect(applyEffect(state, 'finisher', a, b)).toBe('skipped')
    expect(b.effects).toEqual([])
    expect(eventsOf(state, 'effect_applied')).toEqual([])

    b.warmth = 40
    expect(applyEffect(state, 'finisher', a, b)).toBe('applied')
    expect(b.effects).toHaveLength(1)
  })

  it('never applies to a knocked-out target', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red')
    const b = spawn(state, 'Ben', 'blue')
    b.alive = false
    expect(applyEffect(state, 'chilled', a, b)).toBe('skipped')
  })
})

describe('chains', () => {
  it('fires onEnd on the holder after expiry', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red')
    const b = spawn(state, 'Ben', 'blue')
    applyEffect(state, 'brittle', a, b)
    advanceEffectTimers(b, 4000)
    expireEffects(state)
    expect(b.effects).toEqual([])
    expect(b.warmth).toBe(92)
    expect(a.effects).toEqual([])
  })

  it('removes an expired instance even when onEnd re-applies the same effect', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red')
    applyEffect(state, 'renewing', a, a)
    applyEffect(state, 'renewing', a, a)
    const first = a.effects[0].instanceId
    expect(a.effects[0].stacks).toBe(2)

    advanceEffectTimers(a, 1000)
    expireEffects(state)
    expect(a.effects).toHaveLength(1)
    expect(a.effects[0].instanceId).not.toBe(first)
    expect(a.effects[0].stacks).toBe(1)
    expect(a.effects[0].remainingMs).toBe(1000)
    expect(eventsOf(state, 'effect_ended')).toEqual([{ type: 'effect_ended', targetId: a.id, effectId: 'renewing', early: false }])
  })

  it('does not grow stacks across repeated expiries in the loop', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red')
    applyEffect(state, 'renewing', a, a)
    runTicks(state, 200)
    expect(a.effects).toHaveLength(1)
    expect(a.effects[0].stacks).toBe(1)
  })

  it('fires onRemovedEarly at the source instead of onEnd', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red')
    const b = spawn(state, 'Ben', 'blue')
    applyEffect(state, 'brittle', a, b)
    expect(removeEffects(state, b, (inst) => inst.effectId === 'brittle')).toBe(1)
    expect(b.warmth).toBe(100)
    expect(a.effects.map((inst) => inst.effectId)).toEqual(['thawed_out'])
    expect(eventsOf(state, 'effect_ended')).toEqual([{ type: 'effect_ended', targetId: b.id, effectId: 'brittle', early: true }])
  })

  it('treats cleanse as early removal and keeps buffs', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red')
    const b = spawn(state, 'Ben', 'blue')
    applyEffect(state, 'brittle', a, b)
    applyEffect(state, 'momentum', b, b)
    addCondition(state, b, 'chill', { id: 'soggy', durationMs: 5000, intensity: 1 }, a.id)
    expect(cleanse(state, b)).toBe(2)
    expect(b.effects.map((inst) => inst.effectId)).toEqual(['momentum'])
    expect(b.chills).toEqual([])
    expect(a.effects.map((inst) => inst.effectId)).toEqual(['thawed_out'])
  })

  it('stops a self-chain at the depth cap and says so', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red')
    applyEffect(state, 'echo', a, a)
    expect(a.effects).toHaveLength(9)
    expect(eventsOf(state, 'chain_truncated')).toEqual([{ type: 'chain_truncated', id: 'echo', depth: 9 }])
    expect(state.log).toContain('[0] Chain into echo stopped at depth 8.')
  })
})

describe('periodic effects', () => {
  it('waits one tick before the first pulse', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red')
    const b = spawn(state, 'Ben', 'blue')
    applyEffect(state, 'drip', a, b)
    tickEffects(state, 50)
    expect(b.warmth).toBe(100)
    state.tick = 1
    tickEffects(state, 50)
    expect(b.warmth).toBe(99.5)
  })

  it('suppresses a while_active effect while its condition fails', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red')
    const b = spawn(state, 'Ben', 'blue', { armor: 40, warmth: 40 })
    applyEffect(state, 'cold_stiff', a, b)
    expect(effectiveArmor(b)).toBe(20)

    b.warmth = 80
    state.tick = 1
    tickEffects(state, 50)
    expect(b.effects[0].suppressed).toBe(true)
    expect(effectiveArmor(b)).toBe(40)

    b.warmth = 30
    state.tick = 2
    tickEffects(state, 50)
    expect(b.effects[0].suppressed).toBe(false)
    expect(effectiveArmor(b)).toBe(20)
  })
})

describe('chills and cozies', () => {
  it('keeps the longer duration and adds intensity to the cap', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red')
    const b = spawn(state, 'Ben', 'blue')
    addCondition(state, b, 'chill', { id: 'soggy', durationMs: 5000, intensity: 2 }, a.id)
    addCondition(state, b, 'chill', { id: 'soggy', durationMs: 2000, intensity: 2 }, a.id)
    expect(b.chills).toEqual([{ defId: 'soggy', remainingMs: 5000, intensity: 3, sourceId: a.id }])
  })

  it('respects cozy immunity', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red')
    const b = spawn(state, 'Ben', 'blue')
    addCondition(state, b, 'cozy', { id: 'snow_goggles', durationMs: 5000, intensity: 1 }, b.id)
    expect(addCondition(state, b, 'chill', { id: 'frost_eyes', durationMs: 5000, intensity: 1 }, a.id)).toBe('skipped')
    expect(b.chills).toEqual([])
  })

  it('ticks chill damage scaled by intensity', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red')
    const b = spawn(state, 'Ben', 'blue')
    addCondition(state, b, 'chill', { id: 'soggy', durationMs: 5000, intensity: 2 }, a.id)
    tickEffects(state, 500)
    expect(b.warmth).toBe(98)
  })
})
