import type { TargetSelector } from '@config/schema'
import { CONFIG } from '@config/store'
import { distance, findCharacter, isAlly, isFoe, livingCharacters, nextRandom } from './state'
import type { Character, SimState } from './types'

export interface SelectorContext {
  self: Character
  target?: Character
  sourceOfDamage?: Character
}

export function resolveTargets(state: SimState, selector: TargetSelector, ctx: SelectorContext): Character[] {
  const pool = scopePool(state, selector, ctx)
  return pick(state, pool, selector, ctx.self)
}

function scopePool(state: SimState, selector: TargetSelector, ctx: SelectorContext): Character[] {
  const { ADJACENT_RANGE, EARSHOT_RANGE } = CONFIG().balance
  const { self, target } = ctx
  const living = livingCharacters(state)
  const near = (center: Character, range: number) => (c: Character) =>
    c.id !== center.id && distance(c.position, center.position) <= range

  switch (selector.scope) {
    case 'self':
      return self.alive ? [self] : []
    case 'target':
      return target?.alive ? [target] : []
    case 'source_of_damage':
      return ctx.sourceOfDamage?.alive ? [ctx.sourceOfDamage] : []
    case 'adjacent_to_self':
      return living.filter((c) => isFoe(self, c) && near(self, ADJACENT_RANGE)(c))
    case 'adjacent_to_target':
      return target ? living.filter((c) => isFoe(self, c) && near(target, ADJACENT_RANGE)(c)) : []
    case 'allies_in_earshot':
      return living.filter((c) => isAlly(self, c) && near(self, EARSHOT_RANGE)(c))
    case 'foes_in_earshot':
      return living.filter((c) => isFoe(self, c) && near(self, EARSHOT_RANGE)(c))
    case 'allies_near_target':
      return target ? living.filter((c) => isAlly(target, c) && near(target, EARSHOT_RANGE)(c)) : []
    case 'foes_near_target':
      return target ? living.filter((c) => isFoe(self, c) && near(target, EARSHOT_RANGE)(c)) : []
    case 'linked_allies':
      return living.filter((c) => isAlly(self, c) && near(self, EARSHOT_RANGE)(c))
    case 'all_allies':
      return living.filter((c) => isAlly(self, c))
    case 'all_foes':
      return living.filter((c) => isFoe(self, c))
    default:
      return []
  }
}

function pick(state: SimState, pool: Character[], selector: TargetSelector, origin: Character): Character[] {
  const mode = selector.pick ?? 'all'
  const count = selector.count != null ? Math.max(0, Math.floor(selector.count)) : mode === 'all' ? pool.length : 1

  switch (mode) {
    case 'nearest':
      return pool
        .slice()
        .sort((a, b) => distance(a.position, origin.position) - distance(b.position, origin.position) || a.id - b.id)
        .slice(0, count)
    case 'lowest_warmth':
      return pool
        .slice()
        .sort((a, b) => a.warmth / a.maxWarmth - b.warmth / b.maxWarmth || a.id - b.id)
        .slice(0, count)
    case 'random':
      return pickRandom(state, pool, count)
    default:
      return pool.slice(0, count)
  }
}

function pickRandom(state: SimState, pool: Character[], count: number): Character[] {
  const available = pool.slice()
  const chosen: Character[] = []
  while (available.length && chosen.length < count) {
    const index = Math.floor(nextRandom(state) * available.length)
    chosen.push(...available.splice(index, 1))
  }
  return chosen
}

/** The taunt source a taunted caster must target, when still valid. */
export function forcedTarget(state: SimState, caster: Character): Character | undefined {
  const taunt = state.taunts[caster.id]
  if (!taunt || taunt.remainingMs <= 0) return undefined
  const source = findCharacter(state, taunt.sourceId)
  return source?.alive && isFoe(caster, source) ? source : undefined
}
