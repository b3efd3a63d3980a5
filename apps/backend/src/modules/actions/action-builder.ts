import type { IAction, IBlockEnvelope, IncomingBlock, ILogger } from '@actionindex/types';
import { buildBaseAction } from './base-converter.js';
import { accountOf, isSameEventNode, txHashOf, uniquePresent } from './event-nodes.js';
import type { ActionPatch } from './normalizers/types.js';

/**
 * Immutable staging area for an action.
 *
 * `apply` layers a normalizer patch over the current fields and returns a new
 * builder; `build` aggregates accounts and transaction hashes and freezes the
 * record.
 *
 * @example
 * const action = ActionBuilder.fromBlock(block, traceId)
 *     .apply({ source: '0:AB..', value: '1000' })
 *     .build(block, logger);
 */
export class ActionBuilder {
    private constructor(private readonly draft: Readonly<IAction>) {}

    static fromBlock(block: IncomingBlock, traceId: string): ActionBuilder {
        return new ActionBuilder(buildBaseAction(block, traceId));
    }

    get actionId(): string {
        return this.draft.actionId;
    }

    apply(patch: ActionPatch): ActionBuilder {
        return new ActionBuilder({ ...this.draft, ...patch });
    }

    /**
     * Finish the action.
     *
     * Participants named by the patch join the node accounts. An initiating node
     * that lies outside the block contributes its transaction hash to
     * `extendedTxHashes` (empty string when it has none) and, unless it is a
     * tick-tock node, its account to `accounts`.
     *
     * @param block - Envelope the action was built from
     * @param logger - Receives the notice for initiating accounts outside the block
     */
    build(block: Pick<IBlockEnvelope, 'eventNodes' | 'initiatingEventNode'>, logger: ILogger): IAction {
        const { draft } = this;
        const accounts: Array<string | null> = [
            ...draft.accounts,
            draft.source,
            draft.sourceSecondary,
            draft.destination,
            draft.destinationSecondary
        ];
        const extendedTxHashes = [...draft.extendedTxHashes];

        const initiating = block.initiatingEventNode;
        if (initiating && !block.eventNodes.some(node => isSameEventNode(node, initiating))) {
            extendedTxHashes.push(txHashOf(initiating) ?? '');

            if (initiating.kind !== 'tick_tock') {
                const account = accountOf(initiating);
                if (account !== null && !accounts.includes(account)) {
                    logger.info(
                        { traceId: draft.traceId, actionId: draft.actionId, account },
                        'Initiating transaction account not among action accounts'
                    );
                }
                accounts.push(account);
            }
        }

        return Object.freeze({
            ...draft,
            accounts: uniquePresent(accounts),
            extendedTxHashes: uniquePresent(extendedTxHashes)
        });
    }
}
