/**
 * Manual matches: a reviewer links a bank row and a personal row the engine did not pair.
 */

import type { MatchResult, Transaction } from '../types/index.js';
import { INTELLIGENT_MATCH_CONFIDENCE } from '../types/index.js';
import { tierFor } from './classify.js';
import { describeMatch } from './reason.js';
import { fuzzyScore, isIntelligentMatch } from './score.js';
import type { ScoringConfig } from './types.js';

export interface ManualMatchTarget {
    bankIndex: number;
    personalIndex: number;
}

/**
 * Build a pending manual MatchResult.
 *
 * Confidence comes from the regular scorer, without the date window: the
 * reviewer has already chosen the pair.
 *
 * @throws RangeError when an index is out of range, the rows come from the
 *   wrong sources, or the personal row is already reconciled
 */
export function createManualMatch(
    bank: readonly Transaction[],
    personal: readonly Transaction[],
    target: ManualMatchTarget,
    config: ScoringConfig
): MatchResult {
    const { bankIndex, personalIndex } = target;

    if (bankIndex < 0 || bankIndex >= bank.length) {
        throw new RangeError(`Bank index ${bankIndex} out of range for ${bank.length} transactions`);
    }
    if (personalIndex < 0 || personalIndex >= personal.length) {
        throw new RangeError(`Personal index ${personalIndex} out of range for ${personal.length} transactions`);
    }

    const bankTxn = bank[bankIndex];
    const personalTxn = personal[personalIndex];

    if (bankTxn.source !== 'bank' || personalTxn.source !== 'personal') {
        throw new RangeError('Manual match needs a bank transaction and a personal transaction');
    }
    if (personalTxn.reconciled) {
        throw new RangeError(`Personal transaction ${personalTxn.txn_id} is already reconciled`);
    }

    const intelligent = isIntelligentMatch(bankTxn, personalTxn) ? INTELLIGENT_MATCH_CONFIDENCE : 0;
    const confidence = Math.max(intelligent, fuzzyScore(bankTxn, personalTxn, config).composite);

    return {
        bank_txn_id: bankTxn.txn_id,
        bank_index: bankIndex,
        personal_txn_id: personalTxn.txn_id,
        personal_index: personalIndex,
        confidence,
        tier: tierFor(confidence),
        strategy: 'manual',
        status: 'pending',
        reason: describeMatch(bankTxn, personalTxn, 'manual'),
    };
}
