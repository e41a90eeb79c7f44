import { z } from 'zod';

/**
 * A magnitude paired with the unit it was reported in.
 *
 * Instrument servers return every reading as a Quantity; units are only
 * dropped at the very end of a cycle, when the row is handed to the store.
 */
export interface Quantity {
  readonly value: number;
  readonly unit: string;
}

/**
 * Wire shape of a quantity in instrument server replies.
 * Dimensionless values carry an empty unit.
 */
export const QuantitySchema = z.object({
  value: z.number(),
  unit: z.string().default(''),
});

export function quantity(value: number, unit: string): Quantity {
  return { value, unit };
}

/**
 * Drop units, keeping each magnitude in its own reported unit.
 */
export function stripUnits(values: readonly Quantity[]): number[] {
  return values.map((q) => q.value);
}
