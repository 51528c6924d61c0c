import { BALANCE, DEFAULTS } from '@config/defaults';
import type {
  BehaviorDef,
  ConditionDef,
  EffectDef,
  Filter,
  GameConfig,
  SkillDef,
  TargetScope,
  TargetSelector,
} from '@config/schema';
import { ContentValidationError } from '@engine/combat/errors';
import type { ContentIssue } from '@engine/combat/errors';
import { z } from 'zod';

const compareKeys = [
  'warmthPct',
  'energyPct',
  'grit',
  'rhythm',
  'credit',
  'secondary',
  'terrain',
  'distance',
  'alliesNearby',
  'foesNearby',
  'hasChill',
  'hasCozy',
  'hasEffect',
  'school',
  'casting',
] as const;
const conditionOps = ['lt', 'lte', 'eq', 'gte', 'gt', 'ne', 'in', 'notIn'] as const;
const compareSubjects = ['target', 'caster'] as const;
const targetScopes = [
  'self',
  'target',
  'source_of_damage',
  'adjacent_to_self',
  'adjacent_to_target',
  'allies_in_earshot',
  'foes_in_earshot',
  'allies_near_target',
  'foes_near_target',
  'linked_allies',
  'all_allies',
  'all_foes',
] as const;
const targetPicks = ['all', 'nearest', 'lowest_warmth', 'random'] as const;
const modifierKinds = [
  'damage_multiplier',
  'damage_add',
  'incoming_damage_multiplier',
  'armor_multiplier',
  'armor_add',
  'move_speed_multiplier',
  'cast_speed_multiplier',
  'energy_regen_multiplier',
  'energy_cost_multiplier',
  'cooldown_reduction',
  'cooldown_reduction_percent',
  'healing_multiplier',
  'evasion_percent',
  'warmth_per_second',
  'energy_per_second',
  'damage',
  'heal',
  'energy',
  'interrupt',
  'cleanse',
] as const;
const effectTimings = ['on_activation', 'on_hit', 'on_block', 'over_time', 'while_active'] as const;
const stackPolicies = ['refresh_duration', 'stack_intensity', 'independent', 'ignore_if_active'] as const;
const chainTargets = ['holder', 'source'] as const;
const behaviorTriggers = [
  'on_would_die',
  'on_take_damage',
  'on_ally_take_damage',
  'on_hit_by_projectile',
  'while_active',
] as const;
const splitTypes = ['equal', 'proportional_max_warmth', 'absorb_remainder'] as const;
const skillTypes = ['throw', 'trick', 'stance', 'call', 'gesture'] as const;
const skillMechanics = ['windup', 'concentrate', 'shout', 'shift', 'ready', 'reflex'] as const;
const skillTargets = ['enemy', 'ally', 'self', 'ground'] as const;
const aoeTypes = ['single', 'adjacent', 'area'] as const;
const projectileTypes = ['direct', 'arcing', 'instant'] as const;
const terrainKinds = ['packed_snow', 'deep_powder', 'ice', 'slush', 'cleared'] as const;

const enumOr = <T extends string>(values: readonly [T, ...T[]], fallback: T) =>
  z.preprocess((val) => (values.some((v) => v === val) ? val : fallback), z.enum(values));

const enumOptional = <T extends string>(values: readonly [T, ...T[]]) =>
  z.preprocess((val) => (values.some((v) => v === val) ? val : undefined), z.enum(values).optional());

const coerceNumber = () =>
  z.preprocess((val) => {
    if (val === '' || val === null || val === undefined) return undefined;
    const num = Number(val);
    return Number.isFinite(num) ? num : undefined;
  }, z.number().finite().optional());

const numberOr = (fallback: number) => coerceNumber().transform((val) => val ?? fallback);
const nonNegative = (fallback: number) => numberOr(fallback).transform((val) => Math.max(0, val));
const fraction = (fallback: number) => numberOr(fallback).transform((val) => Math.min(1, Math.max(0, val)));
const atLeastOne = (fallback: number) => numberOr(fallback).transform((val) => Math.max(1, Math.floor(val)));

const coerceBoolean = () =>
  z.preprocess((val) => {
    if (val === '' || val === null || val === undefined) return undefined;
    if (typeof val === 'boolean') return val;
    if (val === 'true') return true;
    if (val === 'false') return false;
    return undefined;
  }, z.boolean().optional());

const booleanOr = (fallback: boolean) => coerceBoolean().transform((val) => val ?? fallback);

const optionalString = () =>
  z.preprocess((val) => {
    if (val === null || val === undefined || val === '') return undefined;
    return typeof val === 'number' ? String(val) : val;
  }, z.string().optional()).catch(undefined);

const stringOr = (fallback: string) => optionalString().transform((val) => val ?? fallback);

const stringList = () =>
  z
    .array(z.unknown())
    .catch([])
    .transform((list) => list.filter((val): val is string => typeof val === 'string' && val.length > 0));

function compact<T>(list: (T | null)[]): T[] {
  const out: T[] = [];
  for (const entry of list) {
    if (entry !== null) out.push(entry);
  }
  return out;
}

// Shorthand: a bare string stands for the object keyed by `key`.
const fromShorthand = (key: string) => (val: unknown) => (typeof val === 'string' ? { [key]: val } : val);

const CompareValueSchema = z.union([
  z.number(),
  z.string(),
  z.boolean(),
  z.array(z.union([z.number(), z.string()])),
]);

const FilterTestSchema = z
  .object({
    subject: enumOptional(compareSubjects),
    key: z.enum(compareKeys),
    op: enumOr(conditionOps, 'eq'),
    value: CompareValueSchema,
  })
  .strip();

const FilterSchema: z.ZodType<Filter, z.ZodTypeDef, unknown> = z
  .lazy(() =>
    z
      .object({
        all: z.array(FilterSchema).optional(),
        any: z.array(FilterSchema).optional(),
        not: FilterSchema.optional(),
        test: FilterTestSchema.optional(),
      })
      .strip()
  )
  .catch({});

const optionalFilter = () => FilterSchema.optional();

const TargetSelectorSchema = (fallback: TargetScope) =>
  z
    .preprocess(
      fromShorthand('scope'),
      z
        .object({
          scope: enumOr(targetScopes, fallback),
          pick: enumOptional(targetPicks),
          count: coerceNumber(),
        })
        .strip()
    )
    .catch({ scope: fallback } satisfies TargetSelector);

const ModifierSchema = z
  .object({
    kind: z.enum(modifierKinds),
    value: numberOr(0),
  })
  .strip();

const modifierList = () => z.array(ModifierSchema.nullable().catch(null)).catch([]).transform(compact);

const ChainRefSchema = z
  .preprocess(
    fromShorthand('effectId'),
    z
      .object({
        effectId: z.string().min(1),
        target: enumOr(chainTargets, 'holder'),
      })
      .strip()
  )
  .optional()
  .catch(undefined);

const EffectSchema: z.ZodType<EffectDef, z.ZodTypeDef, unknown> = z
  .object({
    id: stringOr(''),
    name: stringOr('Unnamed effect'),
    desc: optionalString(),
    modifiers: modifierList(),
    timing: enumOr(effectTimings, 'on_hit'),
    target: TargetSelectorSchema('target'),
    condition: optionalFilter(),
    durationMs: nonNegative(0),
    isBuff: booleanOr(false),
    stacking: enumOr(stackPolicies, 'refresh_duration'),
    maxStacks: atLeastOne(1),
    chains: z
      .object({
        initial: ChainRefSchema,
        onEnd: ChainRefSchema,
        onRemovedEarly: ChainRefSchema,
      })
      .strip()
      .catch({}),
  })
  .strip();

const SummonSchema = z
  .object({
    name: stringOr('Snowman'),
    maxWarmth: atLeastOne(50),
    armor: nonNegative(0),
    count: atLeastOne(1),
  })
  .strip()
  .catch({ name: 'Snowman', maxWarmth: 50, armor: 0, count: 1 });

const BehaviorResponseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('prevent') }).strip(),
  z.object({ type: z.literal('redirect_to_self') }).strip(),
  z.object({ type: z.literal('redirect_to_source') }).strip(),
  z.object({ type: z.literal('redirect_to_target') }).strip(),
  z
    .object({
      type: z.literal('split_damage'),
      splitType: enumOr(splitTypes, 'equal'),
      sharePercent: fraction(0.5),
    })
    .strip(),
  z
    .object({
      type: z.literal('heal_percent'),
      percent: fraction(0.5),
      grantEffectId: optionalString(),
    })
    .strip(),
  z.object({ type: z.literal('grant_effect'), effectId: z.string().min(1) }).strip(),
  z.object({ type: z.literal('deal_damage'), amount: nonNegative(0) }).strip(),
  z.object({ type: z.literal('force_target_self'), durationMs: nonNegative(3000) }).strip(),
  z.object({ type: z.literal('summon'), summon: SummonSchema }).strip(),
  z.object({ type: z.literal('chain'), behaviorId: z.string().min(1) }).strip(),
]);

const BehaviorSchema: z.ZodType<BehaviorDef, z.ZodTypeDef, unknown> = z
  .object({
    id: stringOr(''),
    name: stringOr('Unnamed behavior'),
    desc: optionalString(),
    trigger: z.enum(behaviorTriggers),
    response: BehaviorResponseSchema,
    condition: optionalFilter(),
    target: TargetSelectorSchema('self'),
    durationMs: nonNegative(0),
    cooldownMs: nonNegative(0),
    maxActivations: nonNegative(0).transform(Math.floor),
  })
  .strip();

const ConditionSchema: z.ZodType<ConditionDef, z.ZodTypeDef, unknown> = z
  .object({
    id: stringOr(''),
    name: stringOr('Unnamed condition'),
    desc: optionalString(),
    tags: stringList(),
    modifiers: modifierList(),
    maxIntensity: atLeastOne(255),
    missChance: fraction(0),
    blocksNextHit: booleanOr(false),
    interruptsOnDamage: booleanOr(false),
    immuneTo: stringList(),
  })
  .strip();

const ConditionApplicationSchema = z
  .preprocess(
    fromShorthand('id'),
    z
      .object({
        id: z.string().min(1),
        durationMs: nonNegative(5000),
        intensity: atLeastOne(1),
      })
      .strip()
  )
  .nullable()
  .catch(null);

const conditionApplications = () => z.array(ConditionApplicationSchema).catch([]).transform(compact);

const SkillSchema: z.ZodType<SkillDef, z.ZodTypeDef, unknown> = z
  .object({
    id: stringOr(''),
    name: stringOr('Unnamed skill'),
    desc: optionalString(),
    skillType: enumOr(skillTypes, 'throw'),
    mechanic: enumOr(skillMechanics, 'windup'),
    energyCost: nonNegative(0),
    gritCost: nonNegative(0),
    creditCost: nonNegative(0),
    rhythmCost: nonNegative(0),
    requiresRhythm: nonNegative(0),
    consumesAllRhythm: booleanOr(false),
    warmthCostPercent: fraction(0),
    minWarmthPercent: fraction(0),
    activationMs: nonNegative(0),
    aftercastMs: nonNegative(750),
    rechargeMs: nonNegative(0),
    durationMs: nonNegative(0),
    damage: nonNegative(0),
    healing: nonNegative(0),
    castRange: nonNegative(200),
    targetType: enumOr(skillTargets, 'enemy'),
    aoe: enumOr(aoeTypes, 'single'),
    aoeRadius: nonNegative(0),
    effects: stringList(),
    chills: conditionApplications(),
    cozies: conditionApplications(),
    behaviorId: optionalString(),
    unblockable: booleanOr(false),
    soak: fraction(0),
    penetration: fraction(0),
    interrupts: booleanOr(false),
    projectile: enumOr(projectileTypes, 'direct'),
    terrainEffect: z
      .object({
        terrain: z.enum(terrainKinds),
        radius: nonNegative(0),
        durationMs: nonNegative(0),
      })
      .strip()
      .optional()
      .catch(undefined),
    grants: z
      .object({
        gritOnHit: nonNegative(0),
        gritOnCast: nonNegative(0),
        energyOnHit: nonNegative(0),
        rhythmOnCast: nonNegative(0),
      })
      .strip()
      .catch({ gritOnHit: 0, gritOnCast: 0, energyOnHit: 0, rhythmOnCast: 0 }),
    isAp: booleanOr(false),
    autoCast: optionalFilter(),
  })
  .strip();

const BalanceSchema = z
  .object({
    TICK_RATE: atLeastOne(BALANCE.TICK_RATE),
    ARMOR_K: atLeastOne(BALANCE.ARMOR_K),
    MAX_CHAIN_DEPTH: atLeastOne(BALANCE.MAX_CHAIN_DEPTH),
    MAX_SKILLS: atLeastOne(BALANCE.MAX_SKILLS),
    ADJACENT_RANGE: nonNegative(BALANCE.ADJACENT_RANGE),
    EARSHOT_RANGE: nonNegative(BALANCE.EARSHOT_RANGE),
    MAX_COOLDOWN_REDUCTION: fraction(BALANCE.MAX_COOLDOWN_REDUCTION),
    BASE_MOVE_SPEED: nonNegative(BALANCE.BASE_MOVE_SPEED),
    ENERGY_REGEN_PER_SECOND: nonNegative(BALANCE.ENERGY_REGEN_PER_SECOND),
    MAX_GRIT: nonNegative(BALANCE.MAX_GRIT),
    MAX_RHYTHM: nonNegative(BALANCE.MAX_RHYTHM),
    CREDIT_RECOVERY_MS: atLeastOne(BALANCE.CREDIT_RECOVERY_MS),
    MIN_EFFECTIVE_MAX_ENERGY: nonNegative(BALANCE.MIN_EFFECTIVE_MAX_ENERGY),
    MAX_ACTIVE_EFFECTS: atLeastOne(BALANCE.MAX_ACTIVE_EFFECTS),
    MAX_LOG_LINES: atLeastOne(BALANCE.MAX_LOG_LINES),
  })
  .strip()
  .catch(BALANCE);

// Entries that fail to parse are dropped; an empty id takes its record key.
function keyed<T extends { id: string }>(record: Record<string, T | null>): Record<string, T> {
  const out: Record<string, T> = {};
  for (const [key, value] of Object.entries(record)) {
    if (!value) continue;
    out[key] = value.id ? value : { ...value, id: key };
  }
  return out;
}

const entries = <T extends { id: string }>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) =>
  z.record(schema.nullable().catch(null)).catch({}).transform((record) => keyed(record));

const GameConfigSchema: z.ZodType<GameConfig, z.ZodTypeDef, unknown> = z
  .object({
    __version: numberOr(DEFAULTS.__version),
    balance: BalanceSchema,
    skills: entries(SkillSchema),
    effects: entries(EffectSchema),
    behaviors: entries(BehaviorSchema),
    chills: entries(ConditionSchema),
    cozies: entries(ConditionSchema),
  })
  .strip();

export function migrate(cfg: GameConfig): GameConfig {
  if (!cfg.__version || cfg.__version === 1) {
    return { ...cfg, __version: 1 };
  }
  return cfg;
}

export function validateAndRepair(input: unknown): GameConfig {
  const parsed = GameConfigSchema.safeParse(input ?? {});
  return migrate(parsed.success ? parsed.data : DEFAULTS);
}

function filterReferences(filter: Filter | undefined, cfg: GameConfig, where: string, issues: ContentIssue[]) {
  if (!filter) return;
  for (const sub of filter.all ?? []) filterReferences(sub, cfg, where, issues);
  for (const sub of filter.any ?? []) filterReferences(sub, cfg, where, issues);
  filterReferences(filter.not, cfg, where, issues);
  const test = filter.test;
  if (!test || typeof test.value !== 'string') return;
  const pools: Partial<Record<string, Record<string, unknown>>> = {
    hasChill: cfg.chills,
    hasCozy: cfg.cozies,
    hasEffect: cfg.effects,
  };
  const pool = pools[test.key];
  if (pool && !(test.value in pool)) {
    issues.push({ where, message: `condition references unknown ${test.key.slice(3).toLowerCase()} "${test.value}"` });
  }
}

export function findReferenceIssues(cfg: GameConfig): ContentIssue[] {
  const issues: ContentIssue[] = [];
  const need = (pool: Record<string, unknown>, id: string | undefined, where: string, what: string) => {
    if (id !== undefined && !(id in pool)) issues.push({ where, message: `unknown ${what} "${id}"` });
  };

  for (const skill of Object.values(cfg.skills)) {
    const where = `skills.${skill.id}`;
    for (const id of skill.effects) need(cfg.effects, id, where, 'effect');
    for (const app of skill.chills) need(cfg.chills, app.id, where, 'chill');
    for (const app of skill.cozies) need(cfg.cozies, app.id, where, 'cozy');
    need(cfg.behaviors, skill.behaviorId, where, 'behavior');
    filterReferences(skill.autoCast, cfg, where, issues);
  }

  for (const effect of Object.values(cfg.effects)) {
    const where = `effects.${effect.id}`;
    need(cfg.effects, effect.chains.initial?.effectId, where, 'chained effect');
    need(cfg.effects, effect.chains.onEnd?.effectId, where, 'chained effect');
    need(cfg.effects, effect.chains.onRemovedEarly?.effectId, where, 'chained effect');
    filterReferences(effect.condition, cfg, where, issues);
  }

  for (const behavior of Object.values(cfg.behaviors)) {
    const where = `behaviors.${behavior.id}`;
    const response = behavior.response;
    switch (response.type) {
      case 'grant_effect':
        need(cfg.effects, response.effectId, where, 'effect');
        break;
      case 'heal_percent':
        need(cfg.effects, response.grantEffectId, where, 'effect');
        break;
      case 'chain':
        need(cfg.behaviors, response.behaviorId, where, 'chained behavior');
        break;
      default:
        break;
    }
    filterReferences(behavior.condition, cfg, where, issues);
  }

  for (const cozy of Object.values(cfg.cozies)) {
    for (const id of cozy.immuneTo) need(cfg.chills, id, `cozies.${cozy.id}`, 'chill');
  }

  return issues;
}

export function assertValidContent(cfg: GameConfig): GameConfig {
  const issues = findReferenceIssues(cfg);
  if (issues.length) {
    throw new ContentValidationError(issues);
  }
  return cfg;
}
