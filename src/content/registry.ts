import type { BehaviorDef, ConditionDef, EffectDef, GameConfig, SkillDef } from '@config/schema';
import { toBehaviors, toChills, toCozies, toEffects, toSkills } from '@content/adapters';
import type { BehaviorMap, ConditionMap, EffectMap, SkillMap } from '@content/adapters';
import { assertValidContent } from '@content/validate';
import { UnknownDefinitionError } from '@engine/combat/errors';

let skills: SkillMap = {};
let effects: EffectMap = {};
let behaviors: BehaviorMap = {};
let chills: ConditionMap = {};
let cozies: ConditionMap = {};

export function rebuildFromConfig(cfg: GameConfig) {
  assertValidContent(cfg);
  skills = toSkills(cfg);
  effects = toEffects(cfg);
  behaviors = toBehaviors(cfg);
  chills = toChills(cfg);
  cozies = toCozies(cfg);
}

export const Skills = () => skills;
export const Effects = () => effects;
export const Behaviors = () => behaviors;
export const Chills = () => chills;
export const Cozies = () => cozies;

function lookup<T>(pool: Readonly<Record<string, T>>, kind: string, id: string): T {
  const def = pool[id];
  if (!def) throw new UnknownDefinitionError(kind, id);
  return def;
}

export const getSkill = (id: string): Readonly<SkillDef> => lookup(skills, 'skill', id);
export const getEffect = (id: string): Readonly<EffectDef> => lookup(effects, 'effect', id);
export const getBehavior = (id: string): Readonly<BehaviorDef> => lookup(behaviors, 'behavior', id);
export const getChill = (id: string): Readonly<ConditionDef> => lookup(chills, 'chill', id);
export const getCozy = (id: string): Readonly<ConditionDef> => lookup(cozies, 'cozy', id);
