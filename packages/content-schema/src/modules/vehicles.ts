import { z } from 'zod';

import { assetGuidSchema } from '../base/ids.js';
import {
  byteSchema,
  integerSchema,
  positiveUint16Schema,
  uint16Schema,
} from '../base/numbers.js';
import { assetNameSchema } from './items.js';

const MAX_TIRE_SLOTS = 64;
const MAX_TURRET_MOUNTS = 32;

const tireCountSchema = integerSchema.refine(
  (value) => value >= 0 && value <= MAX_TIRE_SLOTS,
  { message: `Tire count must be between 0 and ${MAX_TIRE_SLOTS}.` },
);

const turretMountSchema = z
  .object({
    itemId: positiveUint16Schema,
  })
  .strict();

const trunkSchema = z
  .object({
    width: byteSchema,
    height: byteSchema,
  })
  .strict();

type VehicleDefinitionInput = {
  readonly id: number;
  readonly guid: string;
  readonly name: string;
  readonly tireCount?: number;
  readonly turrets?: readonly { readonly itemId: number }[];
  readonly trunk?: { readonly width: number; readonly height: number } | null;
  readonly maxHealth?: number;
  readonly maxFuel?: number;
  readonly maxBatteryCharge?: number;
};

type VehicleDefinition = {
  readonly id: number;
  readonly guid: string;
  readonly name: string;
  readonly tireCount: number;
  /** Turret mounts in seat order; each names the weapon item mounted there. */
  readonly turrets: readonly { readonly itemId: number }[];
  /** Trunk grid, or `null` for vehicles without cargo space. */
  readonly trunk: { readonly width: number; readonly height: number } | null;
  readonly maxHealth: number;
  readonly maxFuel: number;
  readonly maxBatteryCharge: number;
};

export const vehicleDefinitionSchema: z.ZodType<
  VehicleDefinition,
  z.ZodTypeDef,
  VehicleDefinitionInput
> = z
  .object({
    id: positiveUint16Schema,
    guid: assetGuidSchema,
    name: assetNameSchema,
    tireCount: tireCountSchema.default(0),
    turrets: z
      .array(turretMountSchema)
      .max(MAX_TURRET_MOUNTS, {
        message: `Vehicles may declare at most ${MAX_TURRET_MOUNTS} turret mounts.`,
      })
      .default([]),
    trunk: trunkSchema.nullable().default(null),
    maxHealth: uint16Schema.default(65_535),
    maxFuel: uint16Schema.default(65_535),
    maxBatteryCharge: uint16Schema.default(10_000),
  })
  .strict()
  .transform((vehicle) => ({
    ...vehicle,
    turrets: Object.freeze(vehicle.turrets.map((mount) => Object.freeze({ ...mount }))),
    trunk: vehicle.trunk ? Object.freeze({ ...vehicle.trunk }) : null,
  }));

export type Vehicle = z.infer<typeof vehicleDefinitionSchema>;
