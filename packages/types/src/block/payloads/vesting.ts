import type { IAccountId } from '../../ledger/index.js';

export interface IVestingSendMessageData {
    sender: IAccountId | null;
    vesting: IAccountId | null;
    /** Where the vesting wallet forwarded the message */
    messageDestination: IAccountId | null;
    messageValue: bigint;
    queryId: bigint;
    /** Base64 BoC of the forwarded message */
    messageBoc: string;
}

export interface IVestingAddWhitelistData {
    adder: IAccountId | null;
    vesting: IAccountId | null;
    queryId: bigint;
    accountsAdded: IAccountId[];
}
