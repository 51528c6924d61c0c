import type { BehaviorDef, BehaviorResponse, BehaviorTrigger } from '@config/schema'
import { CONFIG } from '@config/store'
import { Behaviors, getBehavior } from '@content/registry'
import { dealDamage, healCharacter } from './combat'
import { matchesFilter } from './conditions'
import { applyEffect } from './effects'
import { resolveTargets } from './targeting'
import { addCharacter, distance, emit, findCharacter, isAlly, isFoe, nextInstanceId, pushLog } from './state'
import type { BehaviorInstance, Character, EntityId, SimState } from './types'

/**
 * A pending outcome a behavior may intercept. `targetId` is the character
 * taking the damage (or about to die); `guard` holds instance ids that already
 * responded upstream of this event and may not respond again.
 */
export interface TriggerEvent {
  trigger: BehaviorTrigger
  targetId: EntityId
  sourceId: EntityId
  amount: number
  skillId: string | null
  prevented: boolean
  guard: Set<number>
  depth: number
}

export function grantBehavior(
  state: SimState,
  behaviorId: string,
  owner: Character,
  source: Character,
  durationMs?: number,
): BehaviorInstance {
  const def = getBehavior(behaviorId)
  const duration = durationMs ?? def.durationMs
  const inst: BehaviorInstance = {
    instanceId: nextInstanceId(state),
    behaviorId: def.id,
    ownerId: owner.id,
    sourceId: source.id,
    remainingMs: duration,
    timed: duration > 0,
    activationsRemaining: def.maxActivations,
    limited: def.maxActivations > 0,
    cooldownMs: 0,
  }
  state.behaviors.push(inst)
  pushLog(state, `${owner.name} gains ${def.name}.`)
  return inst
}

function isRelevant(owner: Character, subject: Character, trigger: BehaviorTrigger): boolean {
  if (trigger !== 'on_ally_take_damage') return owner.id === subject.id
  return (
    owner.id !== subject.id &&
    isAlly(owner, subject) &&
    distance(owner.position, subject.position) <= CONFIG().balance.EARSHOT_RANGE
  )
}

function hasBudget(inst: BehaviorInstance): boolean {
  if (inst.timed && inst.remainingMs <= 0) return false
  if (inst.cooldownMs > 0) return false
  return !inst.limited || inst.activationsRemaining > 0
}

/**
 * Offers `event` to every live instance in registration order. The first one
 * that matches, is relevant, passes its condition and has budget consumes the
 * event; nobody after it is evaluated.
 */
export function dispatchBehavior(state: SimState, event: TriggerEvent): TriggerEvent {
  const subject = findCharacter(state, event.targetId)
  if (!subject) return event
  const defs = Behaviors()

  for (const inst of state.behaviors.slice()) {
    if (event.guard.has(inst.instanceId)) continue
    const def = defs[inst.behaviorId]
    if (!def || def.trigger !== event.trigger) continue
    const owner = findCharacter(state, inst.ownerId)
    if (!owner || !owner.alive || !isRelevant(owner, subject, event.trigger)) continue
    if (!hasBudget(inst)) continue
    if (!matchesFilter({ state, caster: owner, target: subject }, def.condition)) continue

    consume(inst, def)
    emit(state, { type: 'behavior_triggered', ownerId: owner.id, behaviorId: def.id, response: def.response.type })
    pushLog(state, `${owner.name}'s ${def.name} responds (${def.response.type}).`)
    respond(state, inst, def, def.response, event, owner, 0)
    break
  }
  pruneBehaviors(state)
  return event
}

function consume(inst: BehaviorInstance, def: Readonly<BehaviorDef>) {
  inst.cooldownMs = def.cooldownMs
  if (inst.limited) inst.activationsRemaining = Math.max(0, inst.activationsRemaining - 1)
}

function isDamageTrigger(trigger: BehaviorTrigger) {
  return trigger === 'on_take_damage' || trigger === 'on_ally_take_damage' || trigger === 'on_hit_by_projectile'
}

function respond(
  state: SimState,
  inst: BehaviorInstance,
  def: Readonly<BehaviorDef>,
  response: Readonly<BehaviorResponse>,
  event: TriggerEvent,
  owner: Character,
  depth: number,
) {
  const subject = findCharacter(state, event.targetId)
  const source = findCharacter(state, event.sourceId)
  const targets = () => resolveTargets(state, def.target, { self: owner, target: subject, sourceOfDamage: source })
  const guard = new Set([...event.guard, inst.instanceId])
  const dying = event.trigger === 'on_would_die'

  switch (response.type) {
    case 'prevent':
      event.amount = 0
      event.prevented = true
      break

    case 'redirect_to_self':
    case 'redirect_to_source':
    case 'redirect_to_target': {
      const amount = event.amount
      event.amount = 0
      event.prevented = true
      if (!isDamageTrigger(event.trigger) || amount <= 0) break
      const next =
        response.type === 'redirect_to_self' ? owner : response.type === 'redirect_to_source' ? source : targets()[0]
      if (!next || !next.alive) break
      pushLog(state, `${amount} damage redirected to ${next.name}.`)
      dealDamage(state, {
        sourceId: event.sourceId,
        targetId: next.id,
        amount,
        skillId: event.skillId,
        guard,
        depth: event.depth + 1,
      })
      break
    }

    case 'split_damage': {
      if (!subject || !isDamageTrigger(event.trigger)) break
      const others = targets().filter((c) => c.id !== subject.id)
      const shares = splitShares(event.amount, response.sharePercent, others, response.splitType)
      event.amount = shares.primary
      others.forEach((other, i) => {
        dealDamage(state, {
          sourceId: event.sourceId,
          targetId: other.id,
          amount: shares.others[i],
          skillId: event.skillId,
          guard,
          depth: event.depth + 1,
        })
      })
      break
    }

    case 'heal_percent': {
      const recipients = dying && subject ? [subject] : targets()
      for (const recipient of recipients) {
        const amount = recipient.maxWarmth * response.percent
        if (dying && recipient === subject) {
          recipient.warmth = Math.max(1, Math.min(recipient.maxWarmth, amount))
          event.prevented = true
        } else {
          healCharacter(state, owner, recipient, amount)
        }
        if (response.grantEffectId) applyEffect(state, response.grantEffectId, owner, recipient, depth + 1)
      }
      break
    }

    case 'grant_effect':
      if (dying && subject) {
        subject.warmth = 1
        event.prevented = true
      }
      for (const recipient of targets()) {
        applyEffect(state, response.effectId, owner, recipient, depth + 1)
      }
      break

    case 'deal_damage':
      for (const recipient of targets()) {
        dealDamage(state, { sourceId: owner.id, targetId: recipient.id, amount: response.amount, guard, depth: event.depth + 1 })
      }
      break

    case 'force_target_self':
      for (const foe of targets()) {
        if (!isFoe(owner, foe)) continue
        state.taunts[foe.id] = { sourceId: owner.id, remainingMs: response.durationMs }
        pushLog(state, `${foe.name} is drawn to ${owner.name}.`)
      }
      break

    case 'summon':
      for (let i = 0; i < response.summon.count; i++) {
        const summoned = addCharacter(state, {
          name: response.summon.name,
          team: owner.team,
          school: owner.school,
          position: { x: owner.position.x + 10 * (i + 1), z: owner.position.z },
          maxWarmth: response.summon.maxWarmth,
          maxEnergy: 0,
          armor: response.summon.armor,
          summonedBy: owner.id,
        })
        emit(state, { type: 'summoned', actorId: summoned.id, ownerId: owner.id })
        pushLog(state, `${owner.name} summons ${summoned.name}.`)
      }
      break

    case 'chain': {
      const limit = CONFIG().balance.MAX_CHAIN_DEPTH
      if (depth + 1 > limit) {
        emit(state, { type: 'chain_truncated', id: response.behaviorId, depth: depth + 1 })
        pushLog(state, `Chain into ${response.behaviorId} stopped at depth ${limit}.`)
        break
      }
      const next = getBehavior(response.behaviorId)
      respond(state, inst, next, next.response, event, owner, depth + 1)
      break
    }
  }
}

export interface SplitShares { primary: number; others: number[] }

/**
 * Moves `sharePercent` of `amount` off the primary target onto `others`.
 * `equal` and `proportional_max_warmth` hand out whole points and leave the
 * rounding with the primary; `absorb_remainder` hands out exact fractions.
 */
export function splitShares(
  amount: number,
  sharePercent: number,
  others: Character[],
  splitType: 'equal' | 'proportional_max_warmth' | 'absorb_remainder',
): SplitShares {
  const pool = amount * sharePercent
  if (!others.length || pool <= 0) return { primary: amount, others: others.map(() => 0) }
  let shares: number[]
  switch (splitType) {
    case 'proportional_max_warmth': {
      const total = others.reduce((sum, c) => sum + c.maxWarmth, 0)
      shares = others.map((c) => Math.floor((pool * c.maxWarmth) / total))
      break
    }
    case 'absorb_remainder':
      shares = others.map(() => pool / others.length)
      break
    default:
      shares = others.map(() => Math.floor(pool / others.length))
      break
  }
  const given = shares.reduce((sum, share) => sum + share, 0)
  return { primary: amount - given, others: shares }
}

/** Passive `while_active` instances fire on their own clock, gated by cooldown. */
export function tickWhileActiveBehaviors(state: SimState) {
  const defs = Behaviors()
  for (const inst of state.behaviors.slice()) {
    const def = defs[inst.behaviorId]
    if (!def || def.trigger !== 'while_active' || !hasBudget(inst)) continue
    const owner = findCharacter(state, inst.ownerId)
    if (!owner || !owner.alive) continue
    if (!matchesFilter({ state, caster: owner, target: owner }, def.condition)) continue
    consume(inst, def)
    const event: TriggerEvent = {
      trigger: 'while_active',
      targetId: owner.id,
      sourceId: owner.id,
      amount: 0,
      skillId: null,
      prevented: false,
      guard: new Set([inst.instanceId]),
      depth: 0,
    }
    emit(state, { type: 'behavior_triggered', ownerId: owner.id, behaviorId: def.id, response: def.response.type })
    respond(state, inst, def, def.response, event, owner, 0)
  }
  pruneBehaviors(state)
}

export function advanceBehaviorTimers(state: SimState, dtMs: number) {
  for (const inst of state.behaviors) {
    if (inst.timed) inst.remainingMs -= dtMs
    inst.cooldownMs = Math.max(0, inst.cooldownMs - dtMs)
  }
}

/** Removes expired, spent and orphaned instances. */
export function pruneBehaviors(state: SimState) {
  state.behaviors = state.behaviors.filter((inst) => {
    if (inst.timed && inst.remainingMs <= 0) return false
    if (inst.limited && inst.activationsRemaining <= 0) return false
    return findCharacter(state, inst.ownerId)?.alive ?? false
  })
}
