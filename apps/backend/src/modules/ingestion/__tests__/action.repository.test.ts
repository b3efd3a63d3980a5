/// <reference types="vitest" />

import { describe, it, expect, vi } from 'vitest';
import { ActionRepository, toActionDocument } from '../repositories/index.js';
import { blockToAction } from '../../actions/block-to-action.js';
import { account, createMockLogger, makeBlock } from '../../actions/__tests__/helpers.js';

function sampleAction() {
    return blockToAction(
        makeBlock('ton_transfer', {
            source: account(0x02),
            destination: account(0x03),
            value: 2n ** 70n,
            comment: null,
            encrypted: false
        }),
        'trace-1',
        createMockLogger()
    );
}

describe('toActionDocument', () => {
    it('stores logical times as decimal strings', () => {
        const updatedAt = new Date('2024-01-01T00:00:00Z');
        const action = sampleAction();

        const doc = toActionDocument(action, updatedAt);

        expect(doc.startLt).toBe('100');
        expect(doc.endLt).toBe('200');
        expect(doc.value).toBe('1180591620717411303424');
        expect(doc.updatedAt).toBe(updatedAt);
        expect(doc.accounts).toEqual(action.accounts);
        expect(doc.accounts).not.toBe(action.accounts);
    });
});

describe('ActionRepository', () => {
    it('upserts every action keyed by its id', async () => {
        const model = { bulkWrite: vi.fn().mockResolvedValue({}) };
        const repository = new ActionRepository(model);
        const action = sampleAction();

        await expect(repository.upsertMany([action])).resolves.toBe(1);

        expect(model.bulkWrite).toHaveBeenCalledWith(
            [
                {
                    updateOne: {
                        filter: { actionId: action.actionId },
                        update: { $set: expect.objectContaining({ actionId: action.actionId, traceId: 'trace-1' }) },
                        upsert: true
                    }
                }
            ],
            { ordered: false }
        );
    });

    it('skips the database for an empty list', async () => {
        const model = { bulkWrite: vi.fn() };

        await expect(new ActionRepository(model).upsertMany([])).resolves.toBe(0);
        expect(model.bulkWrite).not.toHaveBeenCalled();
    });
});
