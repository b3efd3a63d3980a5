import type { IAccountId, IAsset } from '@actionindex/types';
import { ValidationError } from './errors.js';

const RAW_ADDRESS_REGEX = /^(-?\d+):([0-9a-fA-F]{64})$/u;

/**
 * Account identifier in raw form (`<workchain>:<hash>`).
 *
 * User-friendly base64 addresses are resolved upstream; the classifier hands us
 * raw addresses only.
 */
export class AccountId implements IAccountId {
  private constructor(public readonly workchain: number, public readonly hash: Uint8Array) {}

  static parse(address: string): AccountId {
    if (!address || typeof address !== 'string') {
      throw new ValidationError('Address is required', { address });
    }

    const match = RAW_ADDRESS_REGEX.exec(address.trim());
    if (!match) {
      throw new ValidationError('Invalid raw account address', { address });
    }

    const workchain = Number(match[1]);
    if (!Number.isSafeInteger(workchain) || workchain < -2147483648 || workchain > 2147483647) {
      throw new ValidationError('Workchain id out of range', { address });
    }

    return new AccountId(workchain, Uint8Array.from(Buffer.from(match[2], 'hex')));
  }

  static fromParts(workchain: number, hash: Uint8Array): AccountId {
    if (!Number.isInteger(workchain)) {
      throw new ValidationError('Workchain id must be an integer', { workchain });
    }
    if (hash.length !== 32) {
      throw new ValidationError('Account hash must be 32 bytes', { length: hash.length });
    }
    return new AccountId(workchain, Uint8Array.from(hash));
  }

  toRawString(): string {
    return `${this.workchain}:${Buffer.from(this.hash).toString('hex').toUpperCase()}`;
  }

}

export class Asset implements IAsset {
  constructor(public readonly isNative: boolean, public readonly jettonAddress: IAccountId | null) {}

  static native(): Asset {
    return new Asset(true, null);
  }

  static jetton(master: IAccountId): Asset {
    return new Asset(false, master);
  }
}
