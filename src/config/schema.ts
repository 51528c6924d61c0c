export type School = 'public' | 'private' | 'homeschool' | 'waldorf' | 'montessori'
export type SkillType = 'throw' | 'trick' | 'stance' | 'call' | 'gesture'
export type SkillMechanic = 'windup' | 'concentrate' | 'shout' | 'shift' | 'ready' | 'reflex'
export type SkillTarget = 'enemy' | 'ally' | 'self' | 'ground'
export type AoeType = 'single' | 'adjacent' | 'area'
export type ProjectileType = 'direct' | 'arcing' | 'instant'
export type TerrainKind = 'packed_snow' | 'deep_powder' | 'ice' | 'slush' | 'cleared'

export type ConditionOp = 'lt'|'lte'|'eq'|'gte'|'gt'|'ne'|'in'|'notIn'
export type CompareKey =
  | 'warmthPct' | 'energyPct' | 'grit' | 'rhythm' | 'credit' | 'secondary'
  | 'terrain' | 'distance' | 'alliesNearby' | 'foesNearby'
  | 'hasChill' | 'hasCozy' | 'hasEffect' | 'school' | 'casting'
export type CompareSubject = 'target' | 'caster'
export type CompareValue = number | string | boolean | (number | string)[]

export interface Filter { all?: Filter[]; any?: Filter[]; not?: Filter; test?: { subject?: CompareSubject; key: CompareKey; op: ConditionOp; value: CompareValue } }

export type TargetScope =
  | 'self' | 'target' | 'source_of_damage'
  | 'adjacent_to_self' | 'adjacent_to_target'
  | 'allies_in_earshot' | 'foes_in_earshot'
  | 'allies_near_target' | 'foes_near_target'
  | 'linked_allies' | 'all_allies' | 'all_foes'
export type TargetPick = 'all' | 'nearest' | 'lowest_warmth' | 'random'
export interface TargetSelector { scope: TargetScope; pick?: TargetPick; count?: number }

export type StaticModifierKind =
  | 'damage_multiplier' | 'damage_add' | 'incoming_damage_multiplier'
  | 'armor_multiplier' | 'armor_add'
  | 'move_speed_multiplier' | 'cast_speed_multiplier'
  | 'energy_regen_multiplier' | 'energy_cost_multiplier'
  | 'cooldown_reduction' | 'cooldown_reduction_percent'
  | 'healing_multiplier' | 'evasion_percent'
export type PeriodicModifierKind = 'warmth_per_second' | 'energy_per_second'
export type InstantModifierKind = 'damage' | 'heal' | 'energy' | 'interrupt' | 'cleanse'
export type ModifierKind = StaticModifierKind | PeriodicModifierKind | InstantModifierKind

export interface Modifier { kind: ModifierKind; value: number }

export type EffectTiming = 'on_activation' | 'on_hit' | 'on_block' | 'over_time' | 'while_active'
export type StackPolicy = 'refresh_duration' | 'stack_intensity' | 'independent' | 'ignore_if_active'
export type ChainTarget = 'holder' | 'source'
export interface ChainRef { effectId: string; target: ChainTarget }

export interface EffectDef {
  id: string; name: string; desc?: string
  modifiers: Modifier[]
  timing: EffectTiming
  target: TargetSelector
  condition?: Filter
  durationMs: number
  isBuff: boolean
  stacking: StackPolicy
  maxStacks: number
  chains: { initial?: ChainRef; onEnd?: ChainRef; onRemovedEarly?: ChainRef }
}

export type BehaviorTrigger = 'on_would_die' | 'on_take_damage' | 'on_ally_take_damage' | 'on_hit_by_projectile' | 'while_active'
export type SplitType = 'equal' | 'proportional_max_warmth' | 'absorb_remainder'

export interface SummonSpec { name: string; maxWarmth: number; armor: number; count: number }

export type BehaviorResponse =
  | { type: 'prevent' }
  | { type: 'redirect_to_self' }
  | { type: 'redirect_to_source' }
  | { type: 'redirect_to_target' }
  | { type: 'split_damage'; splitType: SplitType; sharePercent: number }
  | { type: 'heal_percent'; percent: number; grantEffectId?: string }
  | { type: 'grant_effect'; effectId: string }
  | { type: 'deal_damage'; amount: number }
  | { type: 'force_target_self'; durationMs: number }
  | { type: 'summon'; summon: SummonSpec }
  | { type: 'chain'; behaviorId: string }

export interface BehaviorDef {
  id: string; name: string; desc?: string
  trigger: BehaviorTrigger
  response: BehaviorResponse
  condition?: Filter
  target: TargetSelector
  durationMs: number
  cooldownMs: number
  maxActivations: number
}

export interface ConditionDef {
  id: string; name: string; desc?: string; tags: string[]
  modifiers: Modifier[]
  maxIntensity: number
  missChance: number
  blocksNextHit: boolean
  interruptsOnDamage: boolean
  immuneTo: string[]
}

export interface ConditionApplication { id: string; durationMs: number; intensity: number }

export interface TerrainEffect { terrain: TerrainKind; radius: number; durationMs: number }

export interface SkillDef {
  id: string; name: string; desc?: string
  skillType: SkillType
  mechanic: SkillMechanic
  energyCost: number
  gritCost: number
  creditCost: number
  rhythmCost: number
  requiresRhythm: number
  consumesAllRhythm: boolean
  warmthCostPercent: number
  minWarmthPercent: number
  activationMs: number
  aftercastMs: number
  rechargeMs: number
  durationMs: number
  damage: number
  healing: number
  castRange: number
  targetType: SkillTarget
  aoe: AoeType
  aoeRadius: number
  effects: string[]
  chills: ConditionApplication[]
  cozies: ConditionApplication[]
  behaviorId?: string
  unblockable: boolean
  soak: number
  penetration: number
  interrupts: boolean
  projectile: ProjectileType
  terrainEffect?: TerrainEffect
  grants: { gritOnHit: number; gritOnCast: number; energyOnHit: number; rhythmOnCast: number }
  isAp: boolean
  autoCast?: Filter
}

export interface Balance {
  TICK_RATE: number
  ARMOR_K: number
  MAX_CHAIN_DEPTH: number
  MAX_SKILLS: number
  ADJACENT_RANGE: number
  EARSHOT_RANGE: number
  MAX_COOLDOWN_REDUCTION: number
  BASE_MOVE_SPEED: number
  ENERGY_REGEN_PER_SECOND: number
  MAX_GRIT: number
  MAX_RHYTHM: number
  CREDIT_RECOVERY_MS: number
  MIN_EFFECTIVE_MAX_ENERGY: number
  MAX_ACTIVE_EFFECTS: number
  MAX_LOG_LINES: number
}

export interface GameConfig {
  __version: number
  balance: Balance
  skills: Record<string, SkillDef>
  effects: Record<string, EffectDef>
  behaviors: Record<string, BehaviorDef>
  chills: Record<string, ConditionDef>
  cozies: Record<string, ConditionDef>
}
