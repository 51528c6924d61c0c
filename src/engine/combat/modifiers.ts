import type { Modifier, ModifierKind, StaticModifierKind } from '@config/schema'
import { Chills, Cozies, Effects } from '@content/registry'
import type { Character } from './types'

const MULTIPLIER_KINDS = new Set<ModifierKind>([
  'damage_multiplier',
  'incoming_damage_multiplier',
  'armor_multiplier',
  'move_speed_multiplier',
  'cast_speed_multiplier',
  'energy_regen_multiplier',
  'energy_cost_multiplier',
  'healing_multiplier',
])

export type ModifierTotals = Record<StaticModifierKind, number> & {
  warmth_per_second: number
  energy_per_second: number
}

export function isMultiplier(kind: ModifierKind): boolean {
  return MULTIPLIER_KINDS.has(kind)
}

// Stacks scale a multiplier's deviation from 1, everything else linearly.
export function scaleModifier(mod: Modifier, stacks: number): number {
  return isMultiplier(mod.kind) ? 1 + (mod.value - 1) * stacks : mod.value * stacks
}

function neutralTotals(): ModifierTotals {
  return {
    damage_multiplier: 1,
    damage_add: 0,
    incoming_damage_multiplier: 1,
    armor_multiplier: 1,
    armor_add: 0,
    move_speed_multiplier: 1,
    cast_speed_multiplier: 1,
    energy_regen_multiplier: 1,
    energy_cost_multiplier: 1,
    cooldown_reduction: 0,
    cooldown_reduction_percent: 0,
    healing_multiplier: 1,
    evasion_percent: 0,
    warmth_per_second: 0,
    energy_per_second: 0,
  }
}

function fold(totals: ModifierTotals, modifiers: readonly Modifier[], stacks: number) {
  for (const mod of modifiers) {
    switch (mod.kind) {
      case 'damage':
      case 'heal':
      case 'energy':
      case 'interrupt':
      case 'cleanse':
        break
      default: {
        const value = scaleModifier(mod, stacks)
        totals[mod.kind] = isMultiplier(mod.kind) ? totals[mod.kind] * value : totals[mod.kind] + value
      }
    }
  }
}

// Static and periodic totals over every active, unsuppressed source on `c`.
export function modifierTotals(c: Character): ModifierTotals {
  const totals = neutralTotals()
  const effects = Effects()
  for (const inst of c.effects) {
    const def = effects[inst.effectId]
    if (!def || inst.suppressed) continue
    fold(totals, def.modifiers, inst.stacks)
  }
  const chills = Chills()
  for (const active of c.chills) {
    const def = chills[active.defId]
    if (def) fold(totals, def.modifiers, active.intensity)
  }
  const cozies = Cozies()
  for (const active of c.cozies) {
    const def = cozies[active.defId]
    if (def) fold(totals, def.modifiers, active.intensity)
  }
  return totals
}
