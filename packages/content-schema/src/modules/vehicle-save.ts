import { z } from 'zod';

import { assetGuidSchema, EMPTY_ASSET_GUID, identitySchema } from '../base/ids.js';
import {
  byteSchema,
  finiteNumberSchema,
  uint16Schema,
  uint32Schema,
} from '../base/numbers.js';

export const VEHICLE_SAVE_SCHEMA_VERSION = 1;

const BASE64_PATTERN =
  /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Opaque byte blob encoded as standard base64. The empty string is the empty
 * blob.
 */
export const base64BlobSchema = z
  .string()
  .regex(BASE64_PATTERN, { message: 'Blobs must be standard base64.' })
  .transform((value) => new Uint8Array(Buffer.from(value, 'base64')));

export const encodeBase64Blob = (bytes: Uint8Array): string =>
  Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');

export const vector3Schema = z
  .object({
    x: finiteNumberSchema,
    y: finiteNumberSchema,
    z: finiteNumberSchema,
  })
  .strict();

export const quaternionSchema = z
  .object({
    x: finiteNumberSchema,
    y: finiteNumberSchema,
    z: finiteNumberSchema,
    w: finiteNumberSchema,
  })
  .strict();

/** `[r, g, b, a]`; `[0, 0, 0, 0]` means "no paint override". */
export const paintBytesSchema = z.tuple([
  byteSchema,
  byteSchema,
  byteSchema,
  byteSchema,
]);

const itemPayloadSchema = z
  .object({
    id: uint16Schema,
    amount: byteSchema,
    quality: byteSchema,
    state: base64BlobSchema.default(''),
  })
  .strict();

const cargoEntrySchema = z
  .object({
    x: byteSchema,
    y: byteSchema,
    rotation: byteSchema,
    item: itemPayloadSchema,
  })
  .strict();

export const cargoSaveSchema = z
  .object({
    width: byteSchema,
    height: byteSchema,
    items: z.array(cargoEntrySchema).default([]),
  })
  .strict();

const attachedEntityFields = {
  definitionId: uint16Schema,
  definitionGuid: assetGuidSchema.default(EMPTY_ASSET_GUID),
  health: uint16Schema,
  owner: identitySchema,
  group: identitySchema,
  position: vector3Schema,
  rotation: quaternionSchema,
};

export const barricadeSaveSchema = z
  .object({
    ...attachedEntityFields,
    state: base64BlobSchema.default(''),
  })
  .strict();

export const structureSaveSchema = z.object(attachedEntityFields).strict();

export const vehicleSaveSchemaV1 = z
  .object({
    version: z.literal(VEHICLE_SAVE_SCHEMA_VERSION),
    savedAt: finiteNumberSchema
      .refine((value) => value >= 0, {
        message: 'savedAt must not be negative.',
      })
      .default(0),
    definitionId: uint16Schema,
    definitionGuid: assetGuidSchema,
    instanceId: uint32Schema,
    skinId: uint16Schema,
    mythicId: uint16Schema,
    roadPosition: finiteNumberSchema,
    health: uint16Schema,
    fuel: uint16Schema,
    batteryCharge: uint16Schema,
    owner: identitySchema,
    group: identitySchema,
    tires: z.array(z.boolean()),
    turrets: z.array(base64BlobSchema),
    cargo: cargoSaveSchema,
    barricades: z.array(barricadeSaveSchema),
    structures: z.array(structureSaveSchema),
    position: vector3Schema,
    rotation: quaternionSchema,
    paintColor: paintBytesSchema,
  })
  .strict();

/** JSON-safe wire shape written by encoders. */
export type VehicleSaveFormatV1 = z.input<typeof vehicleSaveSchemaV1>;

/** Decoded shape: blobs as `Uint8Array`, identities as `bigint`. */
export type ParsedVehicleSaveV1 = z.output<typeof vehicleSaveSchemaV1>;

export type BarricadeSaveFormat = z.input<typeof barricadeSaveSchema>;
export type StructureSaveFormat = z.input<typeof structureSaveSchema>;
export type CargoSaveFormat = z.input<typeof cargoSaveSchema>;
