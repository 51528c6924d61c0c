import type { TerrainEffect, TerrainKind } from '@config/schema'
import type { EntityId, TerrainPort, Vec2 } from './types'

const SPEED_BY_TERRAIN: Record<TerrainKind, number> = {
  packed_snow: 1,
  cleared: 1,
  ice: 1.2,
  slush: 0.8,
  deep_powder: 0.6,
}

// remainingMs is undefined for a patch laid down with no duration.
export interface TerrainPatch { terrain: TerrainKind; center: Vec2; radius: number; casterId: EntityId; remainingMs?: number }

export interface FlatTerrain extends TerrainPort {
  readonly patches: readonly TerrainPatch[]
}

// Uniform ground plus circular patches laid down by skills; the newest patch
// covering a point wins. A patch with a duration wears off on the sim clock.
export function createFlatTerrain(base: TerrainKind = 'packed_snow'): FlatTerrain {
  const patches: TerrainPatch[] = []

  const terrainAt = (pos: Vec2): TerrainKind => {
    for (let i = patches.length - 1; i >= 0; i--) {
      const patch = patches[i]
      if (Math.hypot(pos.x - patch.center.x, pos.z - patch.center.z) <= patch.radius) return patch.terrain
    }
    return base
  }

  return {
    patches,
    terrainAt,
    speedMultiplierAt: (pos) => SPEED_BY_TERRAIN[terrainAt(pos)],
    applyTerrainEffect(effect: TerrainEffect, pos: Vec2, casterId: EntityId) {
      patches.push({
        terrain: effect.terrain,
        center: { ...pos },
        radius: effect.radius,
        casterId,
        remainingMs: effect.durationMs > 0 ? effect.durationMs : undefined,
      })
    },
    advance(dtMs: number) {
      for (let i = patches.length - 1; i >= 0; i--) {
        const patch = patches[i]
        if (patch.remainingMs === undefined) continue
        patch.remainingMs -= dtMs
        if (patch.remainingMs <= 0) patches.splice(i, 1)
      }
    },
  }
}
