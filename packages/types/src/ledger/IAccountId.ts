/**
 * Reference to an account on the ledger.
 *
 * An account is addressed by its workchain id and a 256-bit hash of its initial
 * state. The canonical string form used throughout stored actions is the raw
 * form `"<workchain>:<HEX>"` with upper-case hex digits.
 */
export interface IAccountId {
    readonly workchain: number;
    /** 32-byte account hash */
    readonly hash: Uint8Array;

    /**
     * Render the canonical raw form, e.g. `0:83DFD552E63729B472FCBCC8C45EBCC6691702558B68EC7527E1BA403A0F31A8`.
     */
    toRawString(): string;
}
