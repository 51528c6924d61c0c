import type { School } from '@config/schema'
import { CONFIG } from '@config/store'
import { UnknownEntityError } from './errors'
import { createFlatTerrain } from './terrain'
import { NO_ENTITY } from './types'
import type { CastingState, Character, CombatEvent, EntityId, SimState, TerrainPort, Vec2 } from './types'

const RNG_A = 1664525
const RNG_C = 1013904223
const RNG_M = 0x100000000

export interface CharacterSpec {
  name: string
  team: string
  school?: School
  position?: Vec2
  maxWarmth?: number
  warmth?: number
  maxEnergy?: number
  energy?: number
  armor?: number
  skills?: (string | null)[]
  summonedBy?: EntityId
}

export function createState(p: { seed: number; terrain?: TerrainPort }): SimState {
  return {
    tick: 0,
    timeMs: 0,
    rngSeed: p.seed >>> 0,
    nextEntityId: 1,
    nextInstanceId: 1,
    characters: {},
    behaviors: [],
    taunts: {},
    queued: [],
    terrain: p.terrain ?? createFlatTerrain(),
    log: [],
    events: [],
  }
}

function idleCasting(slots: number): CastingState {
  return {
    phase: 'idle',
    slot: null,
    skillId: null,
    targetId: NO_ENTITY,
    groundTarget: null,
    elapsedMs: 0,
    activationMs: 0,
    released: false,
    recharge: new Array<number>(slots).fill(0),
  }
}

export function resetCasting(casting: CastingState) {
  casting.phase = 'idle'
  casting.slot = null
  casting.skillId = null
  casting.targetId = NO_ENTITY
  casting.groundTarget = null
  casting.elapsedMs = 0
  casting.activationMs = 0
  casting.released = false
}

export function addCharacter(state: SimState, spec: CharacterSpec): Character {
  const slots = CONFIG().balance.MAX_SKILLS
  const maxWarmth = Math.max(1, spec.maxWarmth ?? 100)
  const maxEnergy = Math.max(0, spec.maxEnergy ?? 25)
  const skills = (spec.skills ?? []).slice(0, slots)
  while (skills.length < slots) skills.push(null)

  const id = state.nextEntityId++
  const character: Character = {
    id,
    name: spec.name,
    team: spec.team,
    school: spec.school ?? 'public',
    alive: true,
    position: { ...(spec.position ?? { x: 0, z: 0 }) },
    destination: null,
    warmth: Math.min(maxWarmth, spec.warmth ?? maxWarmth),
    maxWarmth,
    energy: Math.min(maxEnergy, spec.energy ?? maxEnergy),
    maxEnergy,
    armor: Math.max(0, spec.armor ?? 0),
    secondary: { grit: 0, rhythm: 0, credit: 0, creditRecoveryMs: 0 },
    skills,
    effects: [],
    chills: [],
    cozies: [],
    casting: idleCasting(slots),
    summonedBy: spec.summonedBy ?? NO_ENTITY,
  }
  state.characters[id] = character
  return character
}

export function nextInstanceId(state: SimState): number {
  return state.nextInstanceId++
}

export function nextRandom(state: SimState): number {
  const seed = state.rngSeed >>> 0
  const next = (Math.imul(seed, RNG_A) + RNG_C) >>> 0
  state.rngSeed = next
  return next / RNG_M
}

export function pushLog(state: SimState, entry: string) {
  state.log.push(`[${state.tick}] ${entry}`)
  const overflow = state.log.length - CONFIG().balance.MAX_LOG_LINES
  if (overflow > 0) state.log.splice(0, overflow)
}

export function emit(state: SimState, event: CombatEvent) {
  state.events.push(event)
}

export function findCharacter(state: SimState, id: EntityId): Character | undefined {
  return id ? state.characters[id] : undefined
}

export function getCharacter(state: SimState, id: EntityId): Character {
  const character = findCharacter(state, id)
  if (!character) throw new UnknownEntityError(id)
  return character
}

// Ascending id order, which is creation order.
export function allCharacters(state: SimState): Character[] {
  return Object.values(state.characters)
}

export function livingCharacters(state: SimState): Character[] {
  return allCharacters(state).filter((c) => c.alive)
}

export function distance(a: Vec2, b: Vec2): number {
  return Math.hypot(a.x - b.x, a.z - b.z)
}

export const isAlly = (a: Character, b: Character) => a.team === b.team
export const isFoe = (a: Character, b: Character) => a.team !== b.team

// Effective max energy shrinks while credit debt is outstanding.
export function effectiveMaxEnergy(c: Character): number {
  const { MIN_EFFECTIVE_MAX_ENERGY } = CONFIG().balance
  if (c.secondary.credit <= 0) return c.maxEnergy
  return Math.max(Math.min(MIN_EFFECTIVE_MAX_ENERGY, c.maxEnergy), c.maxEnergy - c.secondary.credit)
}
