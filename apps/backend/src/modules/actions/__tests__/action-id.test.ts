/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { deriveActionId, selectRootEventNode } from '../action-id.js';
import { messageNode, raw, tickTockNode } from './helpers.js';

describe('selectRootEventNode', () => {
    it('picks the node with the lowest logical time', () => {
        const early = messageNode(5n, 'msg-b', null);
        const late = messageNode(9n, 'msg-a', null);

        expect(selectRootEventNode([late, early])).toBe(early);
    });

    it('breaks lt ties by the smallest key regardless of input order', () => {
        const a = messageNode(5n, 'msg-a', null);
        const b = messageNode(5n, 'msg-b', null);

        expect(selectRootEventNode([b, a])).toBe(a);
        expect(selectRootEventNode([a, b])).toBe(a);
    });

    it('keeps the first node when lt and key are equal', () => {
        const first = messageNode(5n, 'msg-a', { hash: 'tx-1', account: raw(1) });
        const second = messageNode(5n, 'msg-a', { hash: 'tx-2', account: raw(2) });

        expect(selectRootEventNode([first, second])).toBe(first);
    });

    it('returns null without nodes', () => {
        expect(selectRootEventNode([])).toBeNull();
    });
});

describe('deriveActionId', () => {
    it('hashes the root message hash together with the block type', () => {
        const id = deriveActionId({
            btype: 'ton_transfer',
            eventNodes: [messageNode(100n, 'msg-1', { hash: 'tx-1', account: raw(1) })]
        });

        expect(id).toBe('DlGRexZfXZHe5/LDHunsQtBkogkUBwqSheRVbeBZO+E=');
    });

    it('uses the transaction hash of a tick-tock root', () => {
        const id = deriveActionId({ btype: 'call_contract', eventNodes: [tickTockNode(7n, 'tx-tt', raw(3))] });

        expect(id).toBe('hR33D5crpiORS8Cs7oTAHDSbD65kCStxzYG/OT079s0=');
    });

    it('hashes the block type alone when there are no event nodes', () => {
        expect(deriveActionId({ btype: 'ton_transfer', eventNodes: [] })).toBe('8cM0k2QO7+6TwvJEubLwUI2j/Fw+z/TVTGeW8SLDq6Y=');
    });

    it('differs per block type for the same root', () => {
        const nodes = [messageNode(1n, 'msg-1', null)];

        expect(deriveActionId({ btype: 'ton_transfer', eventNodes: nodes })).not.toBe(
            deriveActionId({ btype: 'call_contract', eventNodes: nodes })
        );
    });

    it('does not depend on event node order', () => {
        const a = messageNode(3n, 'msg-a', null);
        const b = messageNode(3n, 'msg-b', null);
        const c = messageNode(8n, 'msg-c', null);

        expect(deriveActionId({ btype: 'jetton_swap', eventNodes: [c, b, a] })).toBe(
            deriveActionId({ btype: 'jetton_swap', eventNodes: [a, b, c] })
        );
    });
});
