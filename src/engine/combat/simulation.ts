import { CONFIG } from '@config/store'
import { Skills } from '@content/registry'
import { advanceBehaviorTimers, pruneBehaviors, tickWhileActiveBehaviors } from './behaviors'
import { advanceCasting, cancelCast, checkCast, resolveCast, startCast } from './casting'
import { matchesFilter } from './conditions'
import { advanceEffectTimers, adjustEnergy, expireEffects, tickEffects } from './effects'
import { modifierTotals } from './modifiers'
import { takeSnapshot } from './snapshot'
import type { Snapshot } from './snapshot'
import { allCharacters, distance, findCharacter, isFoe, livingCharacters, pushLog } from './state'
import { forcedTarget } from './targeting'
import type { CastResult, Character, Intent, SimState } from './types'

export const tickMs = () => 1000 / CONFIG().balance.TICK_RATE

/**
 * One fixed step. Intents (auto-casts queued last tick first) are consumed,
 * then: timers, cast resolution, periodic effects, expiry, auto-cast checks.
 * Returns a frozen view of the state after the step.
 */
export function tick(state: SimState, intents: readonly Intent[] = []): Snapshot {
  const dt = tickMs()
  state.tick += 1
  state.timeMs += dt
  state.events = []

  const pending = [...state.queued, ...intents]
  state.queued = []
  for (const intent of pending) applyIntent(state, intent)

  advanceTimers(state, dt)
  for (const c of livingCharacters(state)) resolveCast(state, c)
  tickEffects(state, dt)
  tickWhileActiveBehaviors(state)
  expire(state)
  queueAutoCasts(state)

  return takeSnapshot(state, state.events)
}

export function runTicks(state: SimState, count: number, intents: (tick: number) => readonly Intent[] = () => []): Snapshot {
  let snapshot = takeSnapshot(state, [])
  for (let i = 0; i < count; i++) {
    snapshot = tick(state, intents(state.tick + 1))
  }
  return snapshot
}

export function applyIntent(state: SimState, intent: Intent): CastResult | null {
  const actor = findCharacter(state, intent.actorId)
  switch (intent.kind) {
    case 'activate':
      return startCast(state, intent)
    case 'move':
      if (!actor || !actor.alive) return null
      actor.destination = { ...intent.destination }
      if (actor.casting.phase === 'activating') cancelCast(state, actor, 'moved')
      return null
    case 'cancel':
      if (actor) cancelCast(state, actor, 'canceled')
      return null
  }
}

function advanceTimers(state: SimState, dt: number) {
  const { ENERGY_REGEN_PER_SECOND, CREDIT_RECOVERY_MS } = CONFIG().balance
  state.terrain.advance(dt)
  for (const c of livingCharacters(state)) {
    advanceCasting(c, dt)
    advanceEffectTimers(c, dt)
    move(state, c, dt)

    const totals = modifierTotals(c)
    adjustEnergy(c, ENERGY_REGEN_PER_SECOND * totals.energy_regen_multiplier * (dt / 1000))

    const secondary = c.secondary
    if (secondary.credit > 0) {
      secondary.creditRecoveryMs -= dt
      if (secondary.creditRecoveryMs <= 0) {
        secondary.credit = Math.max(0, secondary.credit - 1)
        secondary.creditRecoveryMs = secondary.credit > 0 ? CREDIT_RECOVERY_MS : 0
      }
    }
  }
  advanceBehaviorTimers(state, dt)
  for (const taunt of Object.values(state.taunts)) {
    if (taunt) taunt.remainingMs -= dt
  }
}

function move(state: SimState, c: Character, dt: number) {
  const dest = c.destination
  if (!dest) return
  const { BASE_MOVE_SPEED } = CONFIG().balance
  const speed = BASE_MOVE_SPEED * modifierTotals(c).move_speed_multiplier * state.terrain.speedMultiplierAt(c.position)
  const step = Math.max(0, speed) * (dt / 1000)
  const remaining = distance(c.position, dest)
  if (remaining <= step) {
    c.position = { ...dest }
    c.destination = null
    return
  }
  c.position = {
    x: c.position.x + ((dest.x - c.position.x) / remaining) * step,
    z: c.position.z + ((dest.z - c.position.z) / remaining) * step,
  }
}

function expire(state: SimState) {
  expireEffects(state)
  pruneBehaviors(state)
  for (const c of allCharacters(state)) {
    const taunt = state.taunts[c.id]
    if (taunt && (taunt.remainingMs <= 0 || !c.alive)) delete state.taunts[c.id]
  }
}

/**
 * Idle characters whose equipped skills carry an auto-cast condition get at
 * most one cast queued for the next tick.
 */
function queueAutoCasts(state: SimState) {
  const skills = Skills()
  for (const c of livingCharacters(state)) {
    if (c.casting.phase !== 'idle') continue
    for (let slot = 0; slot < c.skills.length; slot++) {
      const skillId = c.skills[slot]
      const skill = skillId ? skills[skillId] : undefined
      if (!skill?.autoCast || skill.targetType === 'ground') continue
      const target = skill.targetType === 'enemy' ? forcedTarget(state, c) ?? nearestFoe(state, c) : c
      if (!target) continue
      const req = { actorId: c.id, slot, targetId: target.id }
      if (typeof checkCast(state, req) === 'string') continue
      if (!matchesFilter({ state, caster: c, target }, skill.autoCast)) continue
      state.queued.push({ kind: 'activate', ...req })
      pushLog(state, `${c.name} readies ${skill.name}.`)
      break
    }
  }
}

function nearestFoe(state: SimState, c: Character): Character | undefined {
  let best: Character | undefined
  let bestDistance = Infinity
  for (const other of livingCharacters(state)) {
    if (!isFoe(c, other)) continue
    const d = distance(c.position, other.position)
    if (d < bestDistance) {
      best = other
      bestDistance = d
    }
  }
  return best
}
