import type { BehaviorDef, ConditionDef, EffectDef, GameConfig, SkillDef } from '@config/schema';

type AnyRecord<T> = Record<string, T>;

export type SkillMap = Readonly<AnyRecord<Readonly<SkillDef>>>;
export type EffectMap = Readonly<AnyRecord<Readonly<EffectDef>>>;
export type BehaviorMap = Readonly<AnyRecord<Readonly<BehaviorDef>>>;
export type ConditionMap = Readonly<AnyRecord<Readonly<ConditionDef>>>;

// Definitions are shared by reference across every runtime instance, so the
// registry hands out frozen copies.
export function deepFreeze<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  Object.freeze(value);
  return value;
}

function toFrozenMap<T extends object>(source: AnyRecord<T>): Readonly<AnyRecord<T>> {
  const out: AnyRecord<T> = {};
  for (const [id, def] of Object.entries(source)) {
    out[id] = deepFreeze(structuredClone(def));
  }
  return Object.freeze(out);
}

export function toSkills(cfg: GameConfig): SkillMap {
  return toFrozenMap(cfg.skills);
}

export function toEffects(cfg: GameConfig): EffectMap {
  return toFrozenMap(cfg.effects);
}

export function toBehaviors(cfg: GameConfig): BehaviorMap {
  return toFrozenMap(cfg.behaviors);
}

export function toChills(cfg: GameConfig): ConditionMap {
  return toFrozenMap(cfg.chills);
}

export function toCozies(cfg: GameConfig): ConditionMap {
  return toFrozenMap(cfg.cozies);
}
