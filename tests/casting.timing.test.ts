import { beforeEach, describe, expect, it } from 'vitest'

import { equipSkill, startCast } from '@engine/combat/casting'
import { killCharacter } from '@engine/combat/combat'
import { tick } from '@engine/combat/simulation'
import type { Snapshot } from '@engine/combat/snapshot'
import type { Intent, SimState } from '@engine/combat/types'
import { makeWorld, spawn, useContent } from './helpers/sim'

beforeEach(() => {
  useContent({
    skills: {
      lob: { mechanic: 'windup', activationMs: 1000, aftercastMs: 750, damage: 20, energyCost: 5, rechargeMs: 5000, castRange: 500 },
      focus: { mechanic: 'concentrate', activationMs: 1000, damage: 20, castRange: 500 },
      bark: { mechanic: 'shout', damage: 10, castRange: 500 },
      bonk: { mechanic: 'shout', damage: 5, interrupts: true, castRange: 500 },
      loan: { mechanic: 'shout', targetType: 'self', creditCost: 5 },
      small_loan: { mechanic: 'shout', targetType: 'self', creditCost: 0.5 },
      sacrifice: { mechanic: 'shout', targetType: 'self', warmthCostPercent: 0.2 },
      big_snowball: { isAp: true },
      ice_ball: { isAp: true },
    },
  })
})

function view(snapshot: Snapshot, id: number) {
  const found = snapshot.characters.find((c) => c.id === id)
  if (!found) throw new Error(`no character ${id} in snapshot`)
  return found
}

function run(state: SimState, ticks: number, intents: Record<number, Intent[]> = {}): Snapshot[] {
  const snapshots: Snapshot[] = []
  for (let t = 1; t <= ticks; t++) {
    snapshots[t] = tick(state, intents[t] ?? [])
  }
  return snapshots
}

function duel(skill: string) {
  const state = makeWorld()
  const a = spawn(state, 'Ava', 'red', { skills: [skill] })
  const b = spawn(state, 'Ben', 'blue', { position: { x: 100, z: 0 } })
  return { state, a, b }
}

describe('activation timing', () => {
  it('releases a windup halfway through its activation', () => {
    const { state, a, b } = duel('lob')
    const snaps = run(state, 40, { 1: [{ kind: 'activate', actorId: a.id, slot: 0, targetId: b.id }] })

    expect(view(snaps[1], a.id).energy).toBe(20)
    expect(view(snaps[1], a.id).cast.recharge[0]).toBe(4950)
    expect(view(snaps[9], b.id).warmth).toBe(100)
    expect(view(snaps[10], b.id).warmth).toBe(80)
    expect(view(snaps[10], a.id).cast).toMatchObject({ phase: 'activating', released: true, elapsedMs: 500, progress: 0.5, releaseAtMs: 500 })
    expect(snaps[10].events).toContainEqual({ type: 'cast_released', actorId: a.id, skillId: 'lob' })
  })

  it('moves into aftercast at full activation and idles when it ends', () => {
    const { state, a, b } = duel('lob')
    const snaps = run(state, 40, { 1: [{ kind: 'activate', actorId: a.id, slot: 0, targetId: b.id }] })

    expect(view(snaps[19], a.id).cast.phase).toBe('activating')
    expect(view(snaps[20], a.id).cast.phase).toBe('aftercast')
    expect(view(snaps[34], a.id).cast.phase).toBe('aftercast')
    expect(view(snaps[35], a.id).cast.phase).toBe('idle')
    expect(view(snaps[40], b.id).warmth).toBe(80)
  })

  it('releases a concentrate skill at full activation', () => {
    const { state, a, b } = duel('focus')
    const snaps = run(state, 20, { 1: [{ kind: 'activate', actorId: a.id, slot: 0, targetId: b.id }] })
    expect(view(snaps[19], b.id).warmth).toBe(100)
    expect(view(snaps[20], b.id).warmth).toBe(80)
    expect(view(snaps[20], a.id).cast.phase).toBe('aftercast')
  })

  it('lands a zero-activation skill in the tick it starts', () => {
    const { state, a, b } = duel('bark')
    const snaps = run(state, 1, { 1: [{ kind: 'activate', actorId: a.id, slot: 0, targetId: b.id }] })
    expect(view(snaps[1], b.id).warmth).toBe(90)
    expect(view(snaps[1], a.id).cast.phase).toBe('idle')
  })
})

describe('cancel and interrupt', () => {
  it('cancels on movement before release and keeps costs and recharge', () => {
    const { state, a, b } = duel('lob')
    const snaps = run(state, 40, {
      1: [{ kind: 'activate', actorId: a.id, slot: 0, targetId: b.id }],
      5: [{ kind: 'move', actorId: a.id, destination: { x: 0, z: 50 } }],
      6: [{ kind: 'activate', actorId: a.id, slot: 0, targetId: b.id }],
    })

    expect(snaps[5].events).toContainEqual({ type: 'cast_canceled', actorId: a.id, skillId: 'lob', reason: 'moved' })
    expect(view(snaps[5], a.id).cast.recharge[0]).toBe(4750)
    expect(snaps[6].events).toContainEqual({ type: 'cast_rejected', actorId: a.id, slot: 0, reason: 'recharging' })
    expect(view(snaps[40], a.id).energy).toBe(20)
    expect(view(snaps[40], b.id).warmth).toBe(100)
    expect(view(snaps[40], a.id).position).toEqual({ x: 0, z: 50 })
  })

  it('stops after release without undoing the hit', () => {
    const { state, a, b } = duel('lob')
    const snaps = run(state, 12, {
      1: [{ kind: 'activate', actorId: a.id, slot: 0, targetId: b.id }],
      12: [{ kind: 'cancel', actorId: a.id }],
    })
    expect(view(snaps[12], a.id).cast.phase).toBe('idle')
    expect(view(snaps[12], b.id).warmth).toBe(80)
  })

  it('cancels when the target is gone before release', () => {
    const { state, a, b } = duel('lob')
    run(state, 3, { 1: [{ kind: 'activate', actorId: a.id, slot: 0, targetId: b.id }] })
    killCharacter(state, b, 0)
    const snapshot = tick(state)
    expect(snapshot.events).toContainEqual({ type: 'cast_canceled', actorId: a.id, skillId: 'lob', reason: 'target_lost' })
    expect(view(snapshot, a.id).cast.phase).toBe('idle')
  })

  it('lets an interrupting hit stop a cast while its recharge keeps running', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red', { skills: ['lob'] })
    const b = spawn(state, 'Ben', 'blue', { position: { x: 100, z: 0 }, skills: ['bonk'] })
    const snaps = run(state, 20, {
      1: [{ kind: 'activate', actorId: a.id, slot: 0, targetId: b.id }],
      3: [{ kind: 'activate', actorId: b.id, slot: 0, targetId: a.id }],
    })

    expect(snaps[3].events).toContainEqual({ type: 'cast_canceled', actorId: a.id, skillId: 'lob', reason: 'interrupted' })
    expect(view(snaps[3], a.id).warmth).toBe(95)
    expect(view(snaps[3], a.id).cast.phase).toBe('idle')
    expect(view(snaps[3], a.id).cast.recharge[0]).toBe(4850)
    expect(view(snaps[4], a.id).cast.recharge[0]).toBe(4800)
    expect(view(snaps[20], b.id).warmth).toBe(100)
  })
})

describe('pre-cast checks', () => {
  it('rejects without touching any state', () => {
    const { state, a, b } = duel('lob')
    a.energy = 2
    const result = startCast(state, { actorId: a.id, slot: 0, targetId: b.id })
    expect(result).toEqual({ ok: false, reason: 'insufficient_energy', log: ['Ava cannot use slot 0: insufficient_energy.'] })
    expect(a.energy).toBe(2)
    expect(a.casting.phase).toBe('idle')
    expect(a.casting.recharge[0]).toBe(0)
  })

  it('reports each refusal reason', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red', { skills: ['lob'] })
    const b = spawn(state, 'Ben', 'blue', { position: { x: 100, z: 0 } })
    const c = spawn(state, 'Cal', 'red')
    const far = spawn(state, 'Fay', 'blue', { position: { x: 1000, z: 0 } })

    const reason = (req: Parameters<typeof startCast>[1]) => startCast(state, req).reason
    expect(reason({ actorId: 99, slot: 0, targetId: b.id })).toBe('unknown_actor')
    expect(reason({ actorId: a.id, slot: 9, targetId: b.id })).toBe('invalid_slot')
    expect(reason({ actorId: a.id, slot: -1, targetId: b.id })).toBe('invalid_slot')
    expect(reason({ actorId: a.id, slot: 5, targetId: b.id })).toBe('no_skill')
    expect(reason({ actorId: a.id, slot: 0 })).toBe('no_target')
    expect(reason({ actorId: a.id, slot: 0, targetId: c.id })).toBe('invalid_target')
    expect(reason({ actorId: a.id, slot: 0, targetId: far.id })).toBe('out_of_range')

    expect(startCast(state, { actorId: a.id, slot: 0, targetId: b.id }).ok).toBe(true)
    expect(reason({ actorId: a.id, slot: 0, targetId: b.id })).toBe('already_casting')

    c.alive = false
    expect(reason({ actorId: c.id, slot: 0, targetId: b.id })).toBe('dead')
  })

  it('redirects an enemy cast to the taunting foe', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red', { skills: ['lob'] })
    const b = spawn(state, 'Ben', 'blue', { position: { x: 100, z: 0 } })
    const loud = spawn(state, 'Lou', 'blue', { position: { x: 50, z: 0 } })
    state.taunts[a.id] = { sourceId: loud.id, remainingMs: 1000 }
    expect(startCast(state, { actorId: a.id, slot: 0, targetId: b.id }).ok).toBe(true)
    expect(a.casting.targetId).toBe(loud.id)
  })

  it('borrows energy capacity on credit and pays it back over time', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red', { school: 'private', skills: ['loan'] })
    tick(state, [{ kind: 'activate', actorId: a.id, slot: 0 }])
    expect(a.secondary.credit).toBe(5)
    expect(a.energy).toBe(20)
    expect(a.secondary.creditRecoveryMs).toBe(2950)
    for (let t = 2; t <= 60; t++) tick(state)
    expect(a.secondary.credit).toBe(4)
    expect(a.secondary.creditRecoveryMs).toBe(3000)
  })

  it('settles a fractional credit at zero', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red', { school: 'private', skills: ['small_loan'] })
    tick(state, [{ kind: 'activate', actorId: a.id, slot: 0 }])
    expect(a.secondary.credit).toBe(0.5)
    for (let t = 2; t <= 80; t++) tick(state)
    expect(a.secondary.credit).toBe(0)
    expect(a.secondary.creditRecoveryMs).toBe(0)
  })

  it('never lets a warmth sacrifice knock the caster out', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red', { warmth: 10, skills: ['sacrifice'] })
    expect(startCast(state, { actorId: a.id, slot: 0 }).ok).toBe(true)
    expect(a.warmth).toBe(1)
    expect(a.alive).toBe(true)
  })
})

describe('loadout', () => {
  it('allows a single AP skill', () => {
    const state = makeWorld()
    const a = spawn(state, 'Ava', 'red')
    expect(equipSkill(state, a, 1, 'big_snowball')).toEqual({ ok: true })
    expect(equipSkill(state, a, 2, 'ice_ball')).toEqual({ ok: false, reason: 'ap_limit' })
    expect(equipSkill(state, a, 1, 'ice_ball')).toEqual({ ok: true })
    expect(equipSkill(state, a, 2, 'mystery')).toEqual({ ok: false, reason: 'unknown_skill' })
    expect(equipSkill(state, a, 8, 'lob')).toEqual({ ok: false, reason: 'invalid_slot' })
    expect(a.skills.slice(0, 3)).toEqual([null, 'ice_ball', null])
  })

  it('refuses loadout changes mid-cast', () => {
    const { state, a, b } = duel('lob')
    startCast(state, { actorId: a.id, slot: 0, targetId: b.id })
    expect(equipSkill(state, a, 1, 'bark')).toEqual({ ok: false, reason: 'casting' })
  })
})
