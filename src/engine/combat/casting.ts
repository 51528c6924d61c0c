import type { SkillDef, SkillMechanic } from '@config/schema'
import { CONFIG } from '@config/store'
import { Skills } from '@content/registry'
import { applySkillEffects, releaseSkill } from './combat'
import { activationFor, energyCost, rechargeFor } from './rules'
import { distance, effectiveMaxEnergy, emit, findCharacter, isAlly, pushLog, resetCasting } from './state'
import { forcedTarget } from './targeting'
import { NO_ENTITY } from './types'
import type { CastRejection, CastResult, Character, EntityId, SimState, Vec2 } from './types'

const AFTERCAST_MECHANICS = new Set<SkillMechanic>(['windup', 'concentrate', 'ready'])

const hasAftercast = (mechanic: SkillMechanic) => AFTERCAST_MECHANICS.has(mechanic)

/** Elapsed activation time at which the skill lands. */
export function releasePoint(mechanic: SkillMechanic, activationMs: number): number {
  return mechanic === 'windup' ? activationMs / 2 : activationMs
}

export interface CastRequest {
  actorId: EntityId
  slot: number
  targetId?: EntityId
  groundTarget?: Vec2
}

interface CastPlan {
  caster: Character
  skill: Readonly<SkillDef>
  target: Character | undefined
  ground: Vec2 | null
}

function reject(state: SimState, req: CastRequest, reason: CastRejection, caster?: Character): CastResult {
  emit(state, { type: 'cast_rejected', actorId: req.actorId, slot: req.slot, reason })
  const entry = `${caster?.name ?? `#${req.actorId}`} cannot use slot ${req.slot}: ${reason}.`
  pushLog(state, entry)
  return { ok: false, reason, log: [entry] }
}

/**
 * Every pre-cast check, with no mutation. Returns the resolved plan or the
 * first reason the cast is refused.
 */
export function checkCast(state: SimState, req: CastRequest): CastPlan | CastRejection {
  const caster = findCharacter(state, req.actorId)
  if (!caster) return 'unknown_actor'
  if (!caster.alive) return 'dead'
  if (!Number.isInteger(req.slot) || req.slot < 0 || req.slot >= caster.skills.length) return 'invalid_slot'
  const skillId = caster.skills[req.slot]
  const skill = skillId ? Skills()[skillId] : undefined
  if (!skill) return 'no_skill'
  if (caster.casting.phase !== 'idle') return 'already_casting'
  if ((caster.casting.recharge[req.slot] ?? 0) > 0) return 'recharging'

  if (energyCost(skill, caster) > caster.energy) return 'insufficient_energy'
  if (skill.creditCost > 0) {
    const { MIN_EFFECTIVE_MAX_ENERGY } = CONFIG().balance
    if (caster.maxEnergy - (caster.secondary.credit + skill.creditCost) < MIN_EFFECTIVE_MAX_ENERGY) return 'insufficient_energy'
  }
  if (caster.secondary.grit < skill.gritCost) return 'insufficient_grit'
  if (caster.secondary.rhythm < Math.max(skill.requiresRhythm, skill.rhythmCost)) return 'insufficient_rhythm'
  if (skill.warmthCostPercent > 0 && caster.warmth / caster.maxWarmth < skill.minWarmthPercent) return 'insufficient_warmth'

  let target: Character | undefined
  let ground: Vec2 | null = null
  switch (skill.targetType) {
    case 'self':
      target = caster
      break
    case 'ground':
      if (!req.groundTarget) return 'no_target'
      ground = { ...req.groundTarget }
      if (distance(caster.position, ground) > skill.castRange) return 'out_of_range'
      break
    case 'ally':
      target = req.targetId ? findCharacter(state, req.targetId) : caster
      if (!target) return 'invalid_target'
      if (!target.alive || !isAlly(caster, target)) return 'invalid_target'
      break
    default: {
      const forced = forcedTarget(state, caster)
      if (forced) {
        target = forced
      } else {
        if (!req.targetId) return 'no_target'
        target = findCharacter(state, req.targetId)
      }
      if (!target || !target.alive || isAlly(caster, target)) return 'invalid_target'
      break
    }
  }
  if (target && target !== caster && distance(caster.position, target.position) > skill.castRange) return 'out_of_range'
  return { caster, skill, target, ground }
}

/**
 * Starts a cast: costs are paid and the slot's recharge begins right here,
 * whatever happens to the cast afterwards.
 */
export function startCast(state: SimState, req: CastRequest): CastResult {
  const plan = checkCast(state, req)
  if (typeof plan === 'string') return reject(state, req, plan, findCharacter(state, req.actorId))
  const { caster, skill, target, ground } = plan
  const { MAX_GRIT, MAX_RHYTHM, CREDIT_RECOVERY_MS } = CONFIG().balance

  caster.energy = Math.max(0, caster.energy - energyCost(skill, caster))
  caster.secondary.grit = Math.max(0, caster.secondary.grit - skill.gritCost)
  caster.secondary.rhythm = skill.consumesAllRhythm ? 0 : Math.max(0, caster.secondary.rhythm - skill.rhythmCost)
  if (skill.creditCost > 0) {
    if (caster.secondary.credit <= 0) caster.secondary.creditRecoveryMs = CREDIT_RECOVERY_MS
    caster.secondary.credit += skill.creditCost
    caster.energy = Math.min(caster.energy, effectiveMaxEnergy(caster))
  }
  if (skill.warmthCostPercent > 0) {
    caster.warmth = Math.max(1, caster.warmth - caster.maxWarmth * skill.warmthCostPercent)
  }
  caster.secondary.grit = Math.min(MAX_GRIT, caster.secondary.grit + skill.grants.gritOnCast)
  caster.secondary.rhythm = Math.min(MAX_RHYTHM, caster.secondary.rhythm + skill.grants.rhythmOnCast)

  const casting = caster.casting
  casting.recharge[req.slot] = rechargeFor(skill, caster)
  casting.phase = 'activating'
  casting.slot = req.slot
  casting.skillId = skill.id
  casting.targetId = target?.id ?? NO_ENTITY
  casting.groundTarget = ground
  casting.elapsedMs = 0
  casting.activationMs = activationFor(skill, caster)
  casting.released = false

  emit(state, { type: 'cast_started', actorId: caster.id, skillId: skill.id, targetId: casting.targetId })
  const entry = target && target !== caster
    ? `${caster.name} begins ${skill.name} on ${target.name}.`
    : `${caster.name} begins ${skill.name}.`
  pushLog(state, entry)

  applySkillEffects(state, caster, target, skill, ['on_activation'])
  return { ok: true, log: [entry] }
}

/**
 * Ends an activating cast. Before release nothing lands; after release the
 * activation just ends. Costs and recharge stay as they are.
 */
export function cancelCast(
  state: SimState,
  caster: Character,
  reason: 'moved' | 'canceled' | 'target_lost' | 'interrupted' | 'died' = 'canceled',
): boolean {
  const casting = caster.casting
  if (casting.phase !== 'activating' || !casting.skillId) return false
  const skillId = casting.skillId
  const released = casting.released
  resetCasting(casting)
  emit(state, { type: 'cast_canceled', actorId: caster.id, skillId, reason })
  const name = Skills()[skillId]?.name ?? skillId
  pushLog(state, released ? `${caster.name} stops ${name}.` : `${caster.name}'s ${name} was ${reason === 'interrupted' ? 'interrupted' : 'canceled'}.`)
  return true
}

/** Interrupts only bite before the release point. */
export function interruptCast(state: SimState, target: Character): boolean {
  if (target.casting.phase !== 'activating' || target.casting.released) return false
  return cancelCast(state, target, 'interrupted')
}

export function forceIdle(state: SimState, c: Character) {
  if (c.casting.phase === 'activating') {
    cancelCast(state, c, 'died')
    return
  }
  resetCasting(c.casting)
}

export function advanceCasting(c: Character, dtMs: number) {
  const casting = c.casting
  for (let i = 0; i < casting.recharge.length; i++) {
    casting.recharge[i] = Math.max(0, casting.recharge[i] - dtMs)
  }
  if (casting.phase !== 'idle') casting.elapsedMs += dtMs
}

/**
 * Release and phase transitions for one character: the hit lands once the
 * release point is reached, activation then hands over to aftercast (for
 * the mechanics that have one) or straight back to idle.
 */
export function resolveCast(state: SimState, caster: Character) {
  const casting = caster.casting
  if (casting.phase === 'aftercast') {
    const skill = casting.skillId ? Skills()[casting.skillId] : undefined
    if (!skill || casting.elapsedMs >= skill.aftercastMs) resetCasting(casting)
    return
  }
  if (casting.phase !== 'activating' || !casting.skillId) return

  const skill = Skills()[casting.skillId]
  if (!skill) {
    resetCasting(casting)
    return
  }

  if (!casting.released) {
    const target = findCharacter(state, casting.targetId)
    const needsTarget = skill.targetType === 'enemy' || skill.targetType === 'ally'
    if (needsTarget && (!target || !target.alive)) {
      cancelCast(state, caster, 'target_lost')
      return
    }
    if (casting.elapsedMs >= releasePoint(skill.mechanic, casting.activationMs)) {
      casting.released = true
      releaseSkill(state, caster, skill, target, casting.groundTarget)
      if (!caster.alive || caster.casting.phase !== 'activating') return
    }
  }

  if (casting.released && casting.elapsedMs >= casting.activationMs) {
    const overflow = casting.elapsedMs - casting.activationMs
    if (hasAftercast(skill.mechanic) && skill.aftercastMs > overflow) {
      casting.phase = 'aftercast'
      casting.elapsedMs = overflow
    } else {
      resetCasting(casting)
    }
  }
}

export type EquipRejection = 'invalid_slot' | 'unknown_skill' | 'ap_limit' | 'casting'

/** Loadout change; at most one AP skill may be slotted. */
export function equipSkill(
  state: SimState,
  c: Character,
  slot: number,
  skillId: string | null,
): { ok: true } | { ok: false; reason: EquipRejection } {
  if (!Number.isInteger(slot) || slot < 0 || slot >= c.skills.length) return { ok: false, reason: 'invalid_slot' }
  if (c.casting.phase !== 'idle') return { ok: false, reason: 'casting' }
  if (skillId !== null) {
    const skills = Skills()
    const skill = skills[skillId]
    if (!skill) return { ok: false, reason: 'unknown_skill' }
    const otherAp = c.skills.some((id, i) => i !== slot && id !== null && (skills[id]?.isAp ?? false))
    if (skill.isAp && otherAp) return { ok: false, reason: 'ap_limit' }
  }
  c.skills[slot] = skillId
  pushLog(state, skillId ? `${c.name} equips ${skillId} in slot ${slot}.` : `${c.name} clears slot ${slot}.`)
  return { ok: true }
}
