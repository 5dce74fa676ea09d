import semver from 'semver';
import { z } from 'zod';

const CATALOG_SLUG_PATTERN = /^[a-z0-9][a-z0-9\-._]*$/;
const GUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
const IDENTITY_PATTERN = /^\d{1,20}$/;

export const EMPTY_ASSET_GUID = '00000000-0000-0000-0000-000000000000';

export const MAX_IDENTITY = (1n << 64n) - 1n;

/**
 * Lowercases a GUID and dashes the 32-digit form. Values that are not GUIDs
 * come back trimmed and lowercased.
 */
export const normalizeAssetGuid = (value: string): string => {
  const trimmed = value.trim().toLowerCase();
  if (/^[0-9a-f]{32}$/.test(trimmed)) {
    return [
      trimmed.slice(0, 8),
      trimmed.slice(8, 12),
      trimmed.slice(12, 16),
      trimmed.slice(16, 20),
      trimmed.slice(20),
    ].join('-');
  }
  return trimmed;
};

const validateSemver = (value: string, ctx: z.RefinementCtx): string => {
  const cleaned = semver.clean(value.trim());
  if (cleaned) {
    return cleaned;
  }

  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: 'Invalid semantic version.',
  });
  return z.NEVER;
};

const toIdentity = (
  value: string | number | bigint,
  ctx: z.RefinementCtx,
): bigint => {
  if (typeof value === 'string' && !IDENTITY_PATTERN.test(value)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Identities must be unsigned decimal integers.',
    });
    return z.NEVER;
  }
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Numeric identities must be safe integers; use a decimal string.',
    });
    return z.NEVER;
  }

  const identity = BigInt(value);
  if (identity < 0n || identity > MAX_IDENTITY) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Identities must fit in an unsigned 64-bit integer.',
    });
    return z.NEVER;
  }
  return identity;
};

/**
 * Asset GUIDs accept the dashed and the 32-digit forms and normalize to the
 * dashed lowercase form.
 */
export const assetGuidSchema = z
  .string()
  .transform(normalizeAssetGuid)
  .refine((value) => GUID_PATTERN.test(value), {
    message: 'Asset GUIDs must be 128-bit hexadecimal identifiers.',
  });

export const catalogSlugSchema = z
  .string()
  .trim()
  .min(1, { message: 'Catalog id must contain at least one character.' })
  .max(64, { message: 'Catalog id must contain at most 64 characters.' })
  .transform((value) => value.toLowerCase())
  .refine((value) => CATALOG_SLUG_PATTERN.test(value), {
    message:
      'Catalog id must start with an alphanumeric character and may include "-", "_" or "." thereafter.',
  });

export const semverSchema = z
  .string()
  .trim()
  .min(1, { message: 'Semantic versions must not be empty.' })
  .transform((value, ctx) => validateSemver(value, ctx));

/**
 * 64-bit owner/group identity. Wire values are decimal strings because they
 * do not fit in a double; parsed values are `bigint`.
 */
export const identitySchema = z
  .union([z.string().trim(), z.number(), z.bigint()])
  .transform((value, ctx) => toIdentity(value, ctx));

export const isEmptyAssetGuid = (guid: string): boolean =>
  guid.length === 0 || guid === EMPTY_ASSET_GUID;
