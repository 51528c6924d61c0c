import type { Balance, GameConfig } from './schema'

export const BALANCE: Balance = {
  TICK_RATE: 20,
  ARMOR_K: 40,
  MAX_CHAIN_DEPTH: 8,
  MAX_SKILLS: 8,
  ADJACENT_RANGE: 50,
  EARSHOT_RANGE: 200,
  MAX_COOLDOWN_REDUCTION: 0.8,
  BASE_MOVE_SPEED: 100,
  ENERGY_REGEN_PER_SECOND: 1,
  MAX_GRIT: 5,
  MAX_RHYTHM: 5,
  CREDIT_RECOVERY_MS: 3000,
  MIN_EFFECTIVE_MAX_ENERGY: 5,
  MAX_ACTIVE_EFFECTS: 16,
  MAX_LOG_LINES: 500,
}

export const DEFAULTS: GameConfig = {
  __version: 1,
  balance: BALANCE,
  skills: {},
  effects: {},
  behaviors: {},
  chills: {},
  cozies: {},
}
