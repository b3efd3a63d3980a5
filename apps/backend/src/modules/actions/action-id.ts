import { createHash } from 'node:crypto';
import type { EventNode, IncomingBlock } from '@actionindex/types';
import { eventNodeKey } from './event-nodes.js';

/**
 * Pick the node an action is anchored to: the one with the lowest logical time.
 *
 * Nodes sharing the lowest lt are ordered by identity key (code-unit order) so
 * that the choice does not depend on the order the classifier emitted them in.
 * Nodes with equal lt and equal key keep the first one encountered.
 */
export function selectRootEventNode(nodes: readonly EventNode[]): EventNode | null {
    let root: EventNode | null = null;
    for (const node of nodes) {
        if (root === null || node.lt < root.lt || (node.lt === root.lt && eventNodeKey(node) < eventNodeKey(root))) {
            root = node;
        }
    }
    return root;
}

/**
 * Deterministic action identifier: base64(sha256(rootKey + btype)).
 *
 * A block without event nodes hashes the block type alone.
 */
export function deriveActionId(block: Pick<IncomingBlock, 'btype' | 'eventNodes'>): string {
    const root = selectRootEventNode(block.eventNodes);
    const key = (root ? eventNodeKey(root) : '') + block.btype;
    return createHash('sha256').update(key, 'utf8').digest('base64');
}
