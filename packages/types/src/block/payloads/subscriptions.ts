import type { IAccountId } from '../../ledger/index.js';

export interface ISubscribeData {
    subscriber: IAccountId;
    beneficiary: IAccountId | null;
    subscription: IAccountId;
    amount: bigint;
}

export interface IUnsubscribeData {
    subscriber: IAccountId;
    beneficiary: IAccountId | null;
    subscription: IAccountId;
}
