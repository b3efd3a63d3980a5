import type { EventNode } from '@actionindex/types';

/** Hash of the transaction that holds the node, if it was processed. */
export function txHashOf(node: EventNode): string | null {
    return node.kind === 'message' ? node.message.transaction?.hash ?? null : node.transaction.hash;
}

/** Account that holds the node; for tick-tock nodes, the account that ran it. */
export function accountOf(node: EventNode): string | null {
    return node.kind === 'message' ? node.message.transaction?.account ?? null : node.transaction.account;
}

/**
 * Identity key of a node: the inbound message hash, else the transaction hash.
 */
export function eventNodeKey(node: EventNode): string {
    return node.kind === 'message' ? node.message.msgHash : node.transaction.hash;
}

export function isSameEventNode(a: EventNode, b: EventNode): boolean {
    return a.kind === b.kind && a.lt === b.lt && eventNodeKey(a) === eventNodeKey(b);
}

/**
 * Distinct non-null values in first-seen order.
 */
export function uniquePresent<T>(values: Iterable<T | null | undefined>): T[] {
    const seen = new Set<T>();
    for (const value of values) {
        if (value != null) {
            seen.add(value);
        }
    }
    return [...seen];
}
