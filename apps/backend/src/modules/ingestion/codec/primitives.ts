/**
 * Zod schemas for the scalar values of the classifier's wire format.
 *
 * The classifier serializes 64-bit and 256-bit quantities (logical times,
 * coin amounts) as decimal strings; small integers may arrive as JSON numbers.
 */
import { z } from 'zod';
import { errorMessage } from '../../../lib/errors.js';
import { AccountId, Asset } from '../../../lib/ton-address.js';

export const BigIntSchema = z
  .union([
    z.string().regex(/^-?\d+$/u, 'Expected a decimal integer string'),
    z.number().int().refine(Number.isSafeInteger, 'Integer exceeds the safe range; send it as a string')
  ])
  .transform(value => BigInt(value));

export const LtSchema = z
  .string()
  .regex(/^\d+$/u, 'Logical time must be a non-negative decimal string')
  .transform(value => BigInt(value));

export const AccountIdSchema = z.string().transform((value, ctx) => {
  try {
    return AccountId.parse(value);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(error) });
    return z.NEVER;
  }
});

/**
 * `{ is_ton: true }` is the native currency; anything else names a jetton master.
 */
export const AssetSchema = z
  .object({
    is_ton: z.boolean(),
    jetton_address: AccountIdSchema.nullable().optional()
  })
  .transform(({ is_ton, jetton_address }) => (is_ton ? Asset.native() : new Asset(false, jetton_address ?? null)));

export const BytesSchema = z
  .string()
  .regex(/^[A-Za-z0-9+/]*={0,2}$/u, 'Expected base64-encoded bytes')
  .transform(value => Uint8Array.from(Buffer.from(value, 'base64')));

/**
 * Raw address string as found on ledger transactions, canonicalized to upper-case hex.
 */
export const RawAddressSchema = AccountIdSchema.transform(account => account.toRawString());
