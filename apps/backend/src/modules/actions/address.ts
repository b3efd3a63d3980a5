import type { IAccountId, IAsset } from '@actionindex/types';

export type AddressRef = IAccountId | IAsset | null | undefined;

/**
 * Render an account or asset reference as the raw address string stored on actions.
 *
 * Assets resolve to their jetton master; the native currency has no contract
 * and resolves to `null`, as does an absent reference.
 */
export function resolveAddress(ref: AddressRef): string | null {
    if (ref == null) {
        return null;
    }
    if ('isNative' in ref) {
        return !ref.isNative && ref.jettonAddress ? ref.jettonAddress.toRawString() : null;
    }
    return ref.toRawString();
}
