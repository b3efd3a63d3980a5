import type { IAccountId } from './IAccountId.js';

/**
 * A fungible asset moved by an operation.
 *
 * Either the chain's native currency, which has no contract address, or a
 * jetton identified by its master contract.
 */
export interface IAsset {
    readonly isNative: boolean;
    /** Jetton master contract; always null for the native currency */
    readonly jettonAddress: IAccountId | null;
}
