import { z } from 'zod/v4';
import type { ProducerCategory, SpeedTable } from '../core/types.js';
import { PRODUCER_CATEGORIES } from '../core/types.js';
import { ResolutionError } from '../core/errors.js';

export type SpeedPresetId = 'base' | 'early' | 'mid' | 'late';

export interface SpeedPreset {
  id: SpeedPresetId;
  name: string;
  description: string;
  speeds: SpeedTable;
}

export const SPEED_PRESETS: Record<SpeedPresetId, SpeedPreset> = {
  base: {
    id: 'base',
    name: 'Recipe Time',
    description: 'Every producer crafts at listed recipe speed.',
    speeds: {},
  },
  early: {
    id: 'early',
    name: 'Early Game',
    description: 'Assembling machine 1, stone furnaces.',
    speeds: { machine: 0.5, furnace: 1, chem_plant: 1, rocket_silo: 1 },
  },
  mid: {
    id: 'mid',
    name: 'Mid Game',
    description: 'Assembling machine 2, steel furnaces.',
    speeds: { machine: 0.75, furnace: 2, chem_plant: 1, rocket_silo: 1 },
  },
  late: {
    id: 'late',
    name: 'Late Game',
    description: 'Assembling machine 3, electric furnaces.',
    speeds: { machine: 1.25, furnace: 2, chem_plant: 1, rocket_silo: 1 },
  },
};

export function isSpeedPresetId(value: string): value is SpeedPresetId {
  return Object.hasOwn(SPEED_PRESETS, value);
}

// ─── Overrides ─────────────────────────────────────────────────────────────

const SpeedOverrideSchema = z.object({
  category: z.enum(PRODUCER_CATEGORIES),
  multiplier: z.number().positive(),
});

/** Parse a `category=multiplier` override, e.g. `machine=1.25`. */
export function parseSpeedOverride(text: string): [ProducerCategory, number] {
  const match = /^([a-z_]+)=(.+)$/.exec(text.trim());
  if (!match) {
    throw new ResolutionError('InvalidRate', `Speed override "${text}" must look like category=multiplier`);
  }
  const [, category, value] = match;
  const parsed = SpeedOverrideSchema.safeParse({ category, multiplier: Number(value) });
  if (!parsed.success) {
    throw new ResolutionError(
      'InvalidRate',
      `Speed override "${text}" needs a known category and a positive multiplier`,
      category,
    );
  }
  return [parsed.data.category, parsed.data.multiplier];
}

/** Preset speeds with per-category overrides layered on top. */
export function resolveSpeedTable(presetId: SpeedPresetId = 'base', overrides: string[] = []): SpeedTable {
  const table: SpeedTable = { ...SPEED_PRESETS[presetId].speeds };
  for (const text of overrides) {
    const [category, multiplier] = parseSpeedOverride(text);
    table[category] = multiplier;
  }
  return table;
}
