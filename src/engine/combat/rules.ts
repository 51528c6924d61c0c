import { CONFIG } from '@config/store'
import type { SkillDef } from '@config/schema'
import { Chills, Cozies } from '@content/registry'
import { modifierTotals } from './modifiers'
import type { Character } from './types'

/**
 * Fraction of incoming damage that survives armor.
 *
 * `1 - (1 - soak) * a / (a + K)` with `a = armor * (1 - penetration)`. Always in
 * (0, 1], exactly 0.5 when the effective armor equals K and soak is 0.
 */
export function armorMultiplier(armor: number, penetration = 0, soak = 0): number {
  const K = CONFIG().balance.ARMOR_K
  const a = Math.max(0, armor) * (1 - clamp(penetration, 0, 1))
  const s = clamp(soak, 0, 1)
  return 1 - (1 - s) * (a / (a + K))
}

export function mitigate(base: number, armor: number, penetration = 0, soak = 0): number {
  return base * armorMultiplier(armor, penetration, soak)
}

export function effectiveArmor(c: Character): number {
  const totals = modifierTotals(c)
  return Math.max(0, (c.armor + totals.armor_add) * totals.armor_multiplier)
}

export function missChance(caster: Character): number {
  const chills = Chills()
  let chance = 0
  for (const active of caster.chills) {
    chance = Math.max(chance, chills[active.defId]?.missChance ?? 0)
  }
  return chance
}

// Caster-side miss plus target evasion, rolled once per resolved hit.
export function avoidChance(caster: Character, target: Character): number {
  return clamp(missChance(caster) + modifierTotals(target).evasion_percent, 0, 1)
}

export function isImmune(target: Character, chillId: string): boolean {
  const cozies = Cozies()
  return target.cozies.some((active) => cozies[active.defId]?.immuneTo.includes(chillId) ?? false)
}

export function energyCost(skill: SkillDef, c: Character): number {
  return Math.max(0, skill.energyCost * modifierTotals(c).energy_cost_multiplier)
}

export function rechargeFor(skill: SkillDef, c: Character): number {
  const { MAX_COOLDOWN_REDUCTION } = CONFIG().balance
  const totals = modifierTotals(c)
  const percent = clamp(totals.cooldown_reduction_percent, 0, MAX_COOLDOWN_REDUCTION)
  return Math.max(0, skill.rechargeMs * (1 - percent) - totals.cooldown_reduction)
}

export function activationFor(skill: SkillDef, c: Character): number {
  const speed = modifierTotals(c).cast_speed_multiplier
  return speed > 0 ? skill.activationMs / speed : skill.activationMs
}

export function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) {
    return min
  }
  if (value < min) return min
  if (value > max) return max
  return value
}
