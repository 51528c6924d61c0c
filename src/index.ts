export type * from '@config/schema'
export { BALANCE, DEFAULTS } from '@config/defaults'
export { applyConfig, CONFIG, exportConfig, importConfig, load, save, subscribe } from '@config/store'
export { Behaviors, Chills, Cozies, Effects, getBehavior, getChill, getCozy, getEffect, getSkill, Skills } from '@content/registry'
export { starterConfig } from '@content/starter'
export { assertValidContent, findReferenceIssues, validateAndRepair } from '@content/validate'

export type * from '@engine/combat/types'
export { NO_ENTITY } from '@engine/combat/types'
export { ContentValidationError, SimError, UnknownDefinitionError, UnknownEntityError } from '@engine/combat/errors'
export type { ContentIssue } from '@engine/combat/errors'
export { addCharacter, createState, getCharacter } from '@engine/combat/state'
export type { CharacterSpec } from '@engine/combat/state'
export { createFlatTerrain } from '@engine/combat/terrain'
export type { FlatTerrain, TerrainPatch } from '@engine/combat/terrain'
export { applyIntent, runTicks, tick, tickMs } from '@engine/combat/simulation'
export type { CastView, CharacterView, Snapshot } from '@engine/combat/snapshot'
export { checkCast, equipSkill, startCast } from '@engine/combat/casting'
export type { CastRequest, EquipRejection } from '@engine/combat/casting'
export { armorMultiplier, mitigate } from '@engine/combat/rules'
