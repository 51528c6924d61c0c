import type { School, TerrainEffect, TerrainKind } from '@config/schema'

export type EntityId = number
export const NO_ENTITY: EntityId = 0

export interface Vec2 { x: number; z: number }

export interface SecondaryResources {
  grit: number
  rhythm: number
  credit: number
  creditRecoveryMs: number
}

export interface ActiveEffect {
  instanceId: number
  effectId: string
  remainingMs: number
  stacks: number
  sourceId: EntityId
  appliedTick: number
  suppressed: boolean
}

export interface ActiveCondition {
  defId: string
  remainingMs: number
  intensity: number
  sourceId: EntityId
}

export type CastPhase = 'idle' | 'activating' | 'aftercast'

export interface CastingState {
  phase: CastPhase
  slot: number | null
  skillId: string | null
  targetId: EntityId
  groundTarget: Vec2 | null
  elapsedMs: number
  activationMs: number
  released: boolean
  recharge: number[]
}

export interface Character {
  id: EntityId
  name: string
  team: string
  school: School
  alive: boolean
  position: Vec2
  destination: Vec2 | null
  warmth: number; maxWarmth: number
  energy: number; maxEnergy: number
  armor: number
  secondary: SecondaryResources
  skills: (string | null)[]
  effects: ActiveEffect[]
  chills: ActiveCondition[]
  cozies: ActiveCondition[]
  casting: CastingState
  summonedBy: EntityId
}

export interface BehaviorInstance {
  instanceId: number
  behaviorId: string
  ownerId: EntityId
  sourceId: EntityId
  remainingMs: number
  timed: boolean
  activationsRemaining: number
  limited: boolean
  cooldownMs: number
}

export interface TauntState { sourceId: EntityId; remainingMs: number }

export interface TerrainPort {
  terrainAt(pos: Vec2): TerrainKind
  speedMultiplierAt(pos: Vec2): number
  applyTerrainEffect(effect: TerrainEffect, pos: Vec2, casterId: EntityId): void
  advance(dtMs: number): void
}

export type Intent =
  | { kind: 'move'; actorId: EntityId; destination: Vec2 }
  | { kind: 'activate'; actorId: EntityId; slot: number; targetId?: EntityId; groundTarget?: Vec2 }
  | { kind: 'cancel'; actorId: EntityId }

export type CastRejection =
  | 'unknown_actor' | 'dead' | 'invalid_slot' | 'no_skill'
  | 'already_casting' | 'recharging'
  | 'insufficient_energy' | 'insufficient_grit' | 'insufficient_rhythm' | 'insufficient_warmth'
  | 'no_target' | 'invalid_target' | 'out_of_range'

export type CombatEvent =
  | { type: 'cast_started'; actorId: EntityId; skillId: string; targetId: EntityId }
  | { type: 'cast_rejected'; actorId: EntityId; slot: number; reason: CastRejection }
  | { type: 'cast_released'; actorId: EntityId; skillId: string }
  | { type: 'cast_canceled'; actorId: EntityId; skillId: string; reason: 'moved' | 'canceled' | 'target_lost' | 'interrupted' | 'died' }
  | { type: 'hit'; sourceId: EntityId; targetId: EntityId; skillId: string; damage: number }
  | { type: 'avoided'; sourceId: EntityId; targetId: EntityId; skillId: string; how: 'blocked' | 'missed' }
  | { type: 'damage'; sourceId: EntityId; targetId: EntityId; amount: number }
  | { type: 'heal'; sourceId: EntityId; targetId: EntityId; amount: number }
  | { type: 'death'; actorId: EntityId }
  | { type: 'death_prevented'; actorId: EntityId }
  | { type: 'effect_applied'; targetId: EntityId; effectId: string; stacks: number }
  | { type: 'effect_ended'; targetId: EntityId; effectId: string; early: boolean }
  | { type: 'behavior_triggered'; ownerId: EntityId; behaviorId: string; response: string }
  | { type: 'chain_truncated'; id: string; depth: number }
  | { type: 'summoned'; actorId: EntityId; ownerId: EntityId }

export interface SimState {
  tick: number
  timeMs: number
  rngSeed: number
  nextEntityId: EntityId
  nextInstanceId: number
  characters: Record<EntityId, Character>
  behaviors: BehaviorInstance[]
  taunts: Record<EntityId, TauntState | undefined>
  queued: Intent[]
  terrain: TerrainPort
  // newest MAX_LOG_LINES entries
  log: string[]
  // emitted since the current tick started
  events: CombatEvent[]
}

export interface CastResult { ok: boolean; reason?: CastRejection; log: string[] }
