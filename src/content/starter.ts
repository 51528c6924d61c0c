import type { GameConfig } from '@config/schema';
import { validateAndRepair } from '@content/validate';
import pack from './starter-pack.json';

/** The bundled snowfight content, repaired the same way any imported config is. */
export function starterConfig(): GameConfig {
  return validateAndRepair(pack);
}
