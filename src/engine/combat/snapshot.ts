import { Skills } from '@content/registry'
import { deepFreeze } from '@content/adapters'
import { releasePoint } from './casting'
import type { CastPhase, CombatEvent, EntityId, SecondaryResources, SimState, Vec2 } from './types'

export interface CastView {
  phase: CastPhase
  skillId: string | null
  targetId: EntityId
  elapsedMs: number
  progress: number
  released: boolean
  releaseAtMs: number
  recharge: readonly number[]
}

export interface CharacterView {
  id: EntityId
  name: string
  team: string
  alive: boolean
  position: Vec2
  warmth: number; maxWarmth: number
  energy: number; maxEnergy: number
  armor: number
  secondary: SecondaryResources
  skills: readonly (string | null)[]
  effects: readonly { effectId: string; remainingMs: number; stacks: number; suppressed: boolean }[]
  chills: readonly { id: string; remainingMs: number; intensity: number }[]
  cozies: readonly { id: string; remainingMs: number; intensity: number }[]
  cast: CastView
  summonedBy: EntityId
}

export interface Snapshot {
  tick: number
  timeMs: number
  characters: readonly CharacterView[]
  behaviors: readonly { behaviorId: string; ownerId: EntityId; remainingMs: number | null; activationsRemaining: number | null }[]
  events: readonly CombatEvent[]
}

/** Deep-frozen copy; nothing in it aliases live state. */
export function takeSnapshot(state: SimState, events: CombatEvent[]): Readonly<Snapshot> {
  const skills = Skills()
  const characters = Object.values(state.characters).map((c): CharacterView => {
    const skill = c.casting.skillId ? skills[c.casting.skillId] : undefined
    const activation = c.casting.activationMs
    return {
      id: c.id,
      name: c.name,
      team: c.team,
      alive: c.alive,
      position: { ...c.position },
      warmth: c.warmth,
      maxWarmth: c.maxWarmth,
      energy: c.energy,
      maxEnergy: c.maxEnergy,
      armor: c.armor,
      secondary: { ...c.secondary },
      skills: c.skills.slice(),
      effects: c.effects.map((e) => ({ effectId: e.effectId, remainingMs: e.remainingMs, stacks: e.stacks, suppressed: e.suppressed })),
      chills: c.chills.map((e) => ({ id: e.defId, remainingMs: e.remainingMs, intensity: e.intensity })),
      cozies: c.cozies.map((e) => ({ id: e.defId, remainingMs: e.remainingMs, intensity: e.intensity })),
      cast: {
        phase: c.casting.phase,
        skillId: c.casting.skillId,
        targetId: c.casting.targetId,
        elapsedMs: c.casting.elapsedMs,
        progress: c.casting.phase === 'activating' && activation > 0 ? Math.min(1, c.casting.elapsedMs / activation) : 0,
        released: c.casting.released,
        releaseAtMs: skill ? releasePoint(skill.mechanic, activation) : 0,
        recharge: c.casting.recharge.slice(),
      },
      summonedBy: c.summonedBy,
    }
  })

  return deepFreeze({
    tick: state.tick,
    timeMs: state.timeMs,
    characters,
    behaviors: state.behaviors.map((inst) => ({
      behaviorId: inst.behaviorId,
      ownerId: inst.ownerId,
      remainingMs: inst.timed ? inst.remainingMs : null,
      activationsRemaining: inst.limited ? inst.activationsRemaining : null,
    })),
    events: structuredClone(events),
  })
}
