import type { IAccountId } from '../../ledger/index.js';

/**
 * Generic contract call, or the deployment of a contract by an inbound message.
 */
export interface ICallContractData {
    /** 32-bit operation code from the message body, null for empty bodies */
    opcode: number | null;
    source: IAccountId | null;
    destination: IAccountId | null;
    /** Attached native value in nanotons */
    value: bigint;
}

/**
 * Plain native-currency transfer, optionally carrying a text comment.
 */
export interface ITonTransferData {
    /** Null when the classifier could not resolve the sending account */
    source: IAccountId | null;
    /** Null when the classifier could not resolve the receiving account */
    destination: IAccountId | null;
    value: bigint;
    /** Decoded comment text; for encrypted comments the raw envelope as text */
    comment: string | null;
    encrypted: boolean;
}
