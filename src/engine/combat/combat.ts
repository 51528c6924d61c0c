import type { BehaviorTrigger, SkillDef } from '@config/schema'
import { CONFIG } from '@config/store'
import { Chills, Cozies, getEffect } from '@content/registry'
import { dispatchBehavior, grantBehavior } from './behaviors'
import type { TriggerEvent } from './behaviors'
import { forceIdle, interruptCast } from './casting'
import { addCondition, adjustEnergy, applyEffect } from './effects'
import { modifierTotals } from './modifiers'
import { avoidChance, effectiveArmor, mitigate } from './rules'
import { resolveTargets } from './targeting'
import { distance, emit, findCharacter, isAlly, livingCharacters, nextRandom, pushLog } from './state'
import type { Character, EntityId, SimState, Vec2 } from './types'

export interface DamageRequest {
  sourceId: EntityId
  targetId: EntityId
  amount: number
  depth: number
  skillId?: string | null
  projectile?: boolean
  guard?: ReadonlySet<number>
}

/**
 * The single path every point of damage takes once mitigation is done:
 * behavior interception, warmth decrement, then the would-die check.
 * Returns the damage that actually landed on the target.
 */
export function dealDamage(state: SimState, req: DamageRequest): number {
  const target = findCharacter(state, req.targetId)
  if (!target || !target.alive || req.amount <= 0) return 0

  const event: TriggerEvent = {
    trigger: 'on_take_damage',
    targetId: target.id,
    sourceId: req.sourceId,
    amount: req.amount,
    skillId: req.skillId ?? null,
    prevented: false,
    guard: new Set(req.guard ?? []),
    depth: req.depth,
  }

  const limit = CONFIG().balance.MAX_CHAIN_DEPTH
  if (event.depth <= limit) {
    const triggers: BehaviorTrigger[] = req.projectile
      ? ['on_hit_by_projectile', 'on_ally_take_damage', 'on_take_damage']
      : ['on_ally_take_damage', 'on_take_damage']
    for (const trigger of triggers) {
      if (event.prevented || event.amount <= 0) break
      event.trigger = trigger
      dispatchBehavior(state, event)
    }
  } else {
    emit(state, { type: 'chain_truncated', id: `damage:${target.id}`, depth: event.depth })
    pushLog(state, `Damage chain onto ${target.name} stopped at depth ${limit}.`)
  }

  const amount = Math.max(0, event.amount)
  if (amount <= 0 || !target.alive) return 0

  target.warmth = Math.max(0, target.warmth - amount)
  emit(state, { type: 'damage', sourceId: req.sourceId, targetId: target.id, amount })

  if (interruptsOnDamage(target)) {
    interruptCast(state, target)
  }

  if (target.warmth <= 0) {
    resolveWouldDie(state, target, req.sourceId, event.guard, req.depth)
  }
  return amount
}

function interruptsOnDamage(target: Character): boolean {
  const chills = Chills()
  const cozies = Cozies()
  return (
    target.chills.some((active) => chills[active.defId]?.interruptsOnDamage ?? false) ||
    target.cozies.some((active) => cozies[active.defId]?.interruptsOnDamage ?? false)
  )
}

function resolveWouldDie(state: SimState, target: Character, killerId: EntityId, guard: ReadonlySet<number>, depth: number) {
  const event: TriggerEvent = {
    trigger: 'on_would_die',
    targetId: target.id,
    sourceId: killerId,
    amount: 0,
    skillId: null,
    prevented: false,
    guard: new Set(guard),
    depth,
  }
  dispatchBehavior(state, event)
  if (event.prevented) {
    target.warmth = Math.max(1, target.warmth)
    emit(state, { type: 'death_prevented', actorId: target.id })
    pushLog(state, `${target.name} refuses to go down.`)
    return
  }
  killCharacter(state, target, killerId)
}

export function killCharacter(state: SimState, target: Character, killerId: EntityId) {
  target.alive = false
  target.warmth = 0
  target.destination = null
  forceIdle(state, target)
  target.effects = []
  target.chills = []
  target.cozies = []
  state.behaviors = state.behaviors.filter((inst) => inst.ownerId !== target.id)
  emit(state, { type: 'death', actorId: target.id })
  const killer = findCharacter(state, killerId)
  pushLog(state, killer ? `${target.name} was knocked out by ${killer.name}.` : `${target.name} was knocked out.`)
}

export function healCharacter(state: SimState, source: Character, target: Character, amount: number): number {
  if (!target.alive || amount <= 0) return 0
  const scaled = amount * modifierTotals(target).healing_multiplier
  const before = target.warmth
  target.warmth = Math.min(target.maxWarmth, target.warmth + scaled)
  const healed = target.warmth - before
  if (healed > 0) emit(state, { type: 'heal', sourceId: source.id, targetId: target.id, amount: healed })
  return healed
}

/** Outgoing damage before the target's defenses. */
function offensiveDamage(skill: SkillDef, caster: Character): number {
  const totals = modifierTotals(caster)
  return Math.max(0, (skill.damage + totals.damage_add) * totals.damage_multiplier)
}

/** What `base` becomes on `target`: incoming multipliers, then armor. */
function incomingDamage(base: number, skill: SkillDef, target: Character): number {
  const incoming = base * modifierTotals(target).incoming_damage_multiplier
  return Math.round(mitigate(incoming, effectiveArmor(target), skill.penetration, skill.soak))
}

type HitOutcome = 'hit' | 'blocked' | 'missed' | 'invalid'

/**
 * Per-target hit pipeline: avoidance, mitigation, damage (with behavior
 * interception), then on-hit effects, conditions, healing and grants.
 */
export function resolveHit(state: SimState, caster: Character, target: Character, skill: Readonly<SkillDef>): HitOutcome {
  if (!target.alive) return 'invalid'

  if (!skill.unblockable && !isAlly(caster, target)) {
    const avoided = rollAvoidance(state, caster, target)
    if (avoided) {
      emit(state, { type: 'avoided', sourceId: caster.id, targetId: target.id, skillId: skill.id, how: avoided })
      pushLog(state, `${target.name} ${avoided === 'blocked' ? 'blocked' : 'dodged'} ${caster.name}'s ${skill.name}.`)
      applySkillEffects(state, caster, target, skill, ['on_block'])
      return avoided
    }
  }

  let landed = 0
  if (skill.damage > 0) {
    const amount = incomingDamage(offensiveDamage(skill, caster), skill, target)
    emit(state, { type: 'hit', sourceId: caster.id, targetId: target.id, skillId: skill.id, damage: amount })
    landed = dealDamage(state, {
      sourceId: caster.id,
      targetId: target.id,
      amount,
      depth: 0,
      skillId: skill.id,
      projectile: skill.skillType === 'throw' && skill.projectile !== 'instant',
    })
    pushLog(state, `${caster.name}'s ${skill.name} hit ${target.name} for ${landed}.`)
  } else {
    emit(state, { type: 'hit', sourceId: caster.id, targetId: target.id, skillId: skill.id, damage: 0 })
  }

  applySkillEffects(state, caster, target, skill, ['on_hit', 'over_time', 'while_active'])
  for (const app of skill.chills) addCondition(state, target, 'chill', app, caster.id)
  for (const app of skill.cozies) addCondition(state, target, 'cozy', app, caster.id)
  if (skill.healing > 0) healCharacter(state, caster, target, skill.healing)

  const { MAX_GRIT } = CONFIG().balance
  if (skill.grants.gritOnHit > 0) {
    caster.secondary.grit = Math.min(MAX_GRIT, caster.secondary.grit + skill.grants.gritOnHit)
  }
  if (skill.grants.energyOnHit > 0 && landed > 0) adjustEnergy(caster, skill.grants.energyOnHit)
  if (skill.interrupts) interruptCast(state, target)
  return 'hit'
}

function rollAvoidance(state: SimState, caster: Character, target: Character): 'blocked' | 'missed' | null {
  const cozies = Cozies()
  const shield = target.cozies.findIndex((active) => cozies[active.defId]?.blocksNextHit ?? false)
  if (shield >= 0) {
    target.cozies.splice(shield, 1)
    return 'blocked'
  }
  const chance = avoidChance(caster, target)
  if (chance <= 0) return null
  return nextRandom(state) < chance ? 'missed' : null
}

export function applySkillEffects(
  state: SimState,
  caster: Character,
  target: Character | undefined,
  skill: Readonly<SkillDef>,
  timings: readonly string[],
) {
  for (const effectId of skill.effects) {
    const def = getEffect(effectId)
    if (!timings.includes(def.timing)) continue
    for (const recipient of resolveTargets(state, def.target, { self: caster, target })) {
      applyEffect(state, def, caster, recipient)
    }
  }
}

function sideFilter(caster: Character, skill: Readonly<SkillDef>) {
  return (c: Character) => (skill.targetType === 'ally' || skill.targetType === 'self' ? isAlly(caster, c) : !isAlly(caster, c))
}

/** Resolved target set for a released skill, primary first. */
function releaseTargets(
  state: SimState,
  caster: Character,
  skill: Readonly<SkillDef>,
  primary: Character | undefined,
  ground: Vec2 | null,
): Character[] {
  const { ADJACENT_RANGE } = CONFIG().balance
  const sameSide = sideFilter(caster, skill)
  const center = skill.targetType === 'ground' ? ground : primary?.position ?? null
  if (!center) return []

  const around = (radius: number, exclude?: Character) =>
    livingCharacters(state).filter((c) => c !== exclude && sameSide(c) && distance(c.position, center) <= radius)

  if (skill.targetType === 'ground') {
    return skill.aoeRadius > 0 ? around(skill.aoeRadius) : []
  }
  if (!primary || !primary.alive) return []
  switch (skill.aoe) {
    case 'adjacent':
      return [primary, ...around(ADJACENT_RANGE, primary)]
    case 'area':
      return [primary, ...around(skill.aoeRadius, primary)]
    default:
      return [primary]
  }
}

/** The release point of a cast: everything the skill does lands here. */
export function releaseSkill(state: SimState, caster: Character, skill: Readonly<SkillDef>, primary: Character | undefined, ground: Vec2 | null) {
  emit(state, { type: 'cast_released', actorId: caster.id, skillId: skill.id })
  pushLog(state, `${caster.name} releases ${skill.name}.`)

  if (skill.terrainEffect) {
    const point = skill.targetType === 'ground' ? ground : primary?.position ?? null
    if (point) state.terrain.applyTerrainEffect(skill.terrainEffect, point, caster.id)
  }

  for (const target of releaseTargets(state, caster, skill, primary, ground)) {
    if (!caster.alive) break
    resolveHit(state, caster, target, skill)
  }

  if (skill.behaviorId && caster.alive) {
    const recipient = skill.targetType === 'ally' || skill.targetType === 'self' ? primary ?? caster : caster
    if (recipient.alive) {
      grantBehavior(state, skill.behaviorId, recipient, caster, skill.durationMs > 0 ? skill.durationMs : undefined)
    }
  }
}
