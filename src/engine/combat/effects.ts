import type { ChainRef, ConditionApplication, EffectDef, Modifier } from '@config/schema'
import { CONFIG } from '@config/store'
import { Chills, Cozies, Effects, getEffect } from '@content/registry'
import { interruptCast } from './casting'
import { dealDamage, healCharacter } from './combat'
import { matchesFilter } from './conditions'
import { scaleModifier } from './modifiers'
import { isImmune } from './rules'
import { effectiveMaxEnergy, emit, findCharacter, nextInstanceId, pushLog } from './state'
import type { ActiveEffect, Character, EntityId, SimState } from './types'

export type ApplyOutcome = 'applied' | 'skipped'

/**
 * Applies one effect definition from `source` onto `target`.
 *
 * The IF predicate is read against the current state; false is a silent skip.
 * Instant modifiers land on every successful application, then the stacking
 * policy decides what happens to the timed instance (if the effect has a
 * duration). `initial` chains fire only when a new instance is created.
 */
export function applyEffect(
  state: SimState,
  effect: Readonly<EffectDef> | string,
  source: Character,
  target: Character,
  depth = 0,
): ApplyOutcome {
  const def = typeof effect === 'string' ? getEffect(effect) : effect
  if (!target.alive) return 'skipped'
  if (!matchesFilter({ state, caster: source, target }, def.condition)) return 'skipped'

  const existing = target.effects.filter((inst) => inst.effectId === def.id)
  if (def.durationMs > 0 && def.stacking === 'ignore_if_active' && existing.length) return 'skipped'

  let created = false
  if (def.durationMs > 0) {
    const current = existing[0]
    if (current && def.stacking === 'refresh_duration') {
      current.remainingMs = def.durationMs
      current.sourceId = source.id
    } else if (current && def.stacking === 'stack_intensity') {
      current.stacks = Math.min(def.maxStacks, current.stacks + 1)
      current.remainingMs = def.durationMs
      current.sourceId = source.id
    } else {
      if (target.effects.length >= CONFIG().balance.MAX_ACTIVE_EFFECTS) {
        pushLog(state, `${target.name} cannot hold more effects; ${def.name} skipped.`)
        return 'skipped'
      }
      target.effects.push({
        instanceId: nextInstanceId(state),
        effectId: def.id,
        remainingMs: def.durationMs,
        stacks: 1,
        sourceId: source.id,
        appliedTick: state.tick,
        suppressed: false,
      })
      created = true
    }
  }

  const stacks = target.effects.find((inst) => inst.effectId === def.id)?.stacks ?? 1
  emit(state, { type: 'effect_applied', targetId: target.id, effectId: def.id, stacks })
  pushLog(state, `${target.name} is affected by ${def.name}.`)

  applyInstantModifiers(state, def.modifiers, source, target, depth)

  if (created || def.durationMs <= 0) {
    fireChain(state, def.chains.initial, target, source.id, depth)
  }
  return 'applied'
}

function applyInstantModifiers(
  state: SimState,
  modifiers: readonly Modifier[],
  source: Character,
  target: Character,
  depth: number,
) {
  for (const mod of modifiers) {
    if (!target.alive) return
    switch (mod.kind) {
      case 'damage':
        dealDamage(state, { sourceId: source.id, targetId: target.id, amount: mod.value, depth })
        break
      case 'heal':
        healCharacter(state, source, target, mod.value)
        break
      case 'energy':
        adjustEnergy(target, mod.value)
        break
      case 'interrupt':
        interruptCast(state, target)
        break
      case 'cleanse':
        cleanse(state, target, depth)
        break
      default:
        break
    }
  }
}

export function adjustEnergy(c: Character, delta: number) {
  c.energy = Math.min(effectiveMaxEnergy(c), Math.max(0, c.energy + delta))
}

function fireChain(state: SimState, ref: ChainRef | undefined, holder: Character, sourceId: EntityId, depth: number) {
  if (!ref) return
  const limit = CONFIG().balance.MAX_CHAIN_DEPTH
  if (depth + 1 > limit) {
    emit(state, { type: 'chain_truncated', id: ref.effectId, depth: depth + 1 })
    pushLog(state, `Chain into ${ref.effectId} stopped at depth ${limit}.`)
    return
  }
  const source = findCharacter(state, sourceId) ?? holder
  const recipient = ref.target === 'source' ? source : holder
  applyEffect(state, ref.effectId, ref.target === 'source' ? holder : source, recipient, depth + 1)
}

/** Removes instances before their timer runs out; fires `onRemovedEarly`, never `onEnd`. */
export function removeEffects(
  state: SimState,
  target: Character,
  predicate: (inst: ActiveEffect, def: Readonly<EffectDef>) => boolean,
  depth = 0,
): number {
  const effects = Effects()
  const removed: ActiveEffect[] = []
  target.effects = target.effects.filter((inst) => {
    const def = effects[inst.effectId]
    if (def && predicate(inst, def)) {
      removed.push(inst)
      return false
    }
    return true
  })
  for (const inst of removed) {
    const def = effects[inst.effectId]
    emit(state, { type: 'effect_ended', targetId: target.id, effectId: inst.effectId, early: true })
    pushLog(state, `${def.name} was removed from ${target.name}.`)
    fireChain(state, def.chains.onRemovedEarly, target, inst.sourceId, depth)
  }
  return removed.length
}

export function cleanse(state: SimState, target: Character, depth = 0): number {
  const chills = target.chills.length
  target.chills = []
  return chills + removeEffects(state, target, (_inst, def) => !def.isBuff, depth)
}

/** Chill or cozy application: refresh to the longer duration, intensities add up to the cap. */
export function addCondition(
  state: SimState,
  target: Character,
  kind: 'chill' | 'cozy',
  app: ConditionApplication,
  sourceId: EntityId,
): ApplyOutcome {
  if (!target.alive) return 'skipped'
  const def = (kind === 'chill' ? Chills() : Cozies())[app.id]
  if (!def) return 'skipped'
  if (kind === 'chill' && isImmune(target, app.id)) {
    pushLog(state, `${target.name} shrugs off ${def.name}.`)
    return 'skipped'
  }
  const list = kind === 'chill' ? target.chills : target.cozies
  const current = list.find((active) => active.defId === app.id)
  if (current) {
    current.remainingMs = Math.max(current.remainingMs, app.durationMs)
    current.intensity = Math.min(def.maxIntensity, current.intensity + app.intensity)
    current.sourceId = sourceId
  } else {
    list.push({ defId: app.id, remainingMs: app.durationMs, intensity: Math.min(def.maxIntensity, app.intensity), sourceId })
  }
  pushLog(state, `${target.name} gains ${def.name}.`)
  return 'applied'
}

/**
 * Per-tick re-evaluation of over_time and while_active instances. Instances
 * created during this tick are left alone until the next one.
 */
export function tickEffects(state: SimState, dtMs: number) {
  const effects = Effects()
  const seconds = dtMs / 1000
  for (const holder of Object.values(state.characters)) {
    if (!holder.alive) continue
    for (const inst of holder.effects.slice()) {
      const def = effects[inst.effectId]
      if (!def || (def.timing !== 'over_time' && def.timing !== 'while_active')) continue
      if (inst.appliedTick === state.tick) continue
      const source = findCharacter(state, inst.sourceId)
      const holds = matchesFilter({ state, caster: source, target: holder }, def.condition)
      inst.suppressed = !holds
      if (holds) applyPeriodic(state, def.modifiers, inst.stacks, inst.sourceId, holder, seconds)
      if (!holder.alive) break
    }
    if (holder.alive) tickConditionPeriodics(state, holder, seconds)
  }
}

function tickConditionPeriodics(state: SimState, holder: Character, seconds: number) {
  const chills = Chills()
  for (const active of holder.chills.slice()) {
    const def = chills[active.defId]
    if (def) applyPeriodic(state, def.modifiers, active.intensity, active.sourceId, holder, seconds)
    if (!holder.alive) return
  }
  const cozies = Cozies()
  for (const active of holder.cozies.slice()) {
    const def = cozies[active.defId]
    if (def) applyPeriodic(state, def.modifiers, active.intensity, active.sourceId, holder, seconds)
    if (!holder.alive) return
  }
}

function applyPeriodic(
  state: SimState,
  modifiers: readonly Modifier[],
  stacks: number,
  sourceId: EntityId,
  holder: Character,
  seconds: number,
) {
  for (const mod of modifiers) {
    if (mod.kind === 'warmth_per_second') {
      const amount = scaleModifier(mod, stacks) * seconds
      if (amount < 0) {
        dealDamage(state, { sourceId, targetId: holder.id, amount: -amount, depth: 0 })
      } else if (amount > 0) {
        healCharacter(state, findCharacter(state, sourceId) ?? holder, holder, amount)
      }
    } else if (mod.kind === 'energy_per_second') {
      adjustEnergy(holder, scaleModifier(mod, stacks) * seconds)
    }
  }
}

export function advanceEffectTimers(c: Character, dtMs: number) {
  for (const inst of c.effects) inst.remainingMs -= dtMs
  for (const active of c.chills) active.remainingMs -= dtMs
  for (const active of c.cozies) active.remainingMs -= dtMs
}

/**
 * Ends every instance whose timer ran out. Expired instances leave the holder
 * first, so an `onEnd` chain into the same effect starts a fresh instance.
 */
export function expireEffects(state: SimState) {
  const effects = Effects()
  for (const holder of Object.values(state.characters)) {
    holder.chills = holder.chills.filter((active) => active.remainingMs > 0)
    holder.cozies = holder.cozies.filter((active) => active.remainingMs > 0)

    const expired = holder.effects.filter((inst) => inst.remainingMs <= 0)
    if (!expired.length) continue
    holder.effects = holder.effects.filter((inst) => inst.remainingMs > 0)
    for (const inst of expired) {
      const def = effects[inst.effectId]
      if (def && holder.alive) fireChain(state, def.chains.onEnd, holder, inst.sourceId, 0)
      emit(state, { type: 'effect_ended', targetId: holder.id, effectId: inst.effectId, early: false })
      if (def) pushLog(state, `${def.name} wore off ${holder.name}.`)
    }
  }
}
