import { z } from 'zod';

const FINITE_NUMBER_MESSAGE = 'Value must be a finite number.';

const ensureFinite = (value: number, ctx: z.RefinementCtx) => {
  if (!Number.isFinite(value)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: FINITE_NUMBER_MESSAGE,
    });
    return z.NEVER;
  }

  return value;
};

export const finiteNumberSchema = z
  .number()
  .transform((value, ctx) => ensureFinite(value, ctx));

export const integerSchema = finiteNumberSchema.refine(Number.isInteger, {
  message: 'Value must be an integer.',
});

const createUnsignedSchema = (bits: 8 | 16 | 32) => {
  const max = 2 ** bits - 1;
  return integerSchema.refine((value) => value >= 0 && value <= max, {
    message: `Value must be an unsigned ${bits}-bit integer (0-${max}).`,
  });
};

export const byteSchema = createUnsignedSchema(8);

export const uint16Schema = createUnsignedSchema(16);

export const uint32Schema = createUnsignedSchema(32);

export const positiveUint16Schema = uint16Schema.refine((value) => value > 0, {
  message: 'Value must be greater than 0.',
});
