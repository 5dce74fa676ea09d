import { z } from 'zod';

import { assetGuidSchema } from '../base/ids.js';
import { byteSchema, positiveUint16Schema } from '../base/numbers.js';

const NAME_MAX_LENGTH = 64;
const DEFAULT_STATE_MAX_BYTES = 1024;

export const assetNameSchema = z
  .string()
  .trim()
  .min(1, { message: 'Asset names must contain at least one character.' })
  .max(NAME_MAX_LENGTH, {
    message: `Asset names must contain at most ${NAME_MAX_LENGTH} characters.`,
  });

type ItemDefinitionInput = {
  readonly id: number;
  readonly guid: string;
  readonly name: string;
  readonly defaultState?: readonly number[];
};

type ItemDefinition = {
  readonly id: number;
  readonly guid: string;
  readonly name: string;
  /**
   * State blob a freshly created instance of this item starts with, e.g.
   * the loaded magazine of a mounted weapon.
   */
  readonly defaultState: readonly number[];
};

export const itemDefinitionSchema: z.ZodType<
  ItemDefinition,
  z.ZodTypeDef,
  ItemDefinitionInput
> = z
  .object({
    id: positiveUint16Schema,
    guid: assetGuidSchema,
    name: assetNameSchema,
    defaultState: z
      .array(byteSchema)
      .max(DEFAULT_STATE_MAX_BYTES, {
        message: `Default item state must contain at most ${DEFAULT_STATE_MAX_BYTES} bytes.`,
      })
      .default([]),
  })
  .strict()
  .transform((item) => ({
    ...item,
    defaultState: Object.freeze([...item.defaultState]),
  }));

export type Item = z.infer<typeof itemDefinitionSchema>;
