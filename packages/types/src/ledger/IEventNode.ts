/**
 * A ledger transaction as seen by the normalizer.
 *
 * Only the attributes the action record needs are carried: the hash, the
 * account that executed it and its position in time.
 */
export interface ILedgerTransaction {
    /** Base64 transaction hash */
    hash: string;
    /** Raw form of the executing account */
    account: string;
    /** Logical time of the transaction */
    lt: bigint;
    /** Wall-clock time, seconds since the Unix epoch */
    utime: number;
}

/**
 * Event node reached through an inbound message.
 *
 * The transaction is the one holding the message. It is null when the message
 * was never processed on-chain (for example a bounced message still in flight).
 */
export interface IMessageEventNode {
    kind: 'message';
    lt: bigint;
    message: {
        /** Base64 hash of the inbound message */
        msgHash: string;
        transaction: ILedgerTransaction | null;
    };
}

/**
 * Event node for a self-triggered (tick-tock) transaction, which has no
 * inbound message and is owned directly by one account.
 */
export interface ITickTockEventNode {
    kind: 'tick_tock';
    lt: bigint;
    transaction: ILedgerTransaction;
}

/**
 * A participant transaction within a trace.
 */
export type EventNode = IMessageEventNode | ITickTockEventNode;
