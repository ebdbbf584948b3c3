import { z } from 'zod';

const MapSizeSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export const CombatConfigSchema = z.object({
  seed: z.number().int(),
  // Used when the squad collaborator reports no speed of its own
  defaultMovementSpeed: z.number().int().nonnegative().default(3),
  defaultAttackRange: z.number().int().positive().default(1),
  squadActionPoints: z.number().int().positive().default(10),
  movementCostPerTile: z.number().int().positive().default(1),
  attackCost: z.number().int().positive().default(2),
  mapSize: MapSizeSchema.optional(),
});

export type CombatConfig = z.infer<typeof CombatConfigSchema>;
export type CombatConfigInput = z.input<typeof CombatConfigSchema>;

/**
 * Validate and fill defaults. Throws a ZodError describing every bad field.
 */
export function parseCombatConfig(input: unknown): CombatConfig {
  return CombatConfigSchema.parse(input);
}
