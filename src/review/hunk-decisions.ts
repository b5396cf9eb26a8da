/**
 * Rebuilds content from hunks and per-hunk decisions
 */

import { ContractViolationError } from './errors';
import { DiffHunk, HunkDecision, HunkState, StatusCounts } from './types';

export type HunkDecisions = ReadonlyMap<string, HunkDecision>;

export const PENDING: HunkDecision = { status: 'pending' };
export const ACCEPTED: HunkDecision = { status: 'accepted' };
export const REJECTED: HunkDecision = { status: 'rejected' };

export function isChangedHunk(hunk: Pick<DiffHunk, 'kind'>): boolean {
	return hunk.kind !== 'unchanged';
}

export function isPendingHunk(hunk: HunkState): boolean {
	return isChangedHunk(hunk) && hunk.decision.status === 'pending';
}

/**
 * Produce the merged document from annotated hunks and their decisions.
 *
 * Pure: the same hunks and decisions always give the same string.
 * Throws ContractViolationError when a changed hunk has no terminal decision.
 */
export function applyHunkDecisions(hunks: readonly DiffHunk[], decisions: HunkDecisions): string {
	const segments: string[] = [];

	for (const hunk of hunks) {
		if (hunk.kind === 'unchanged') {
			segments.push(hunk.original);
			continue;
		}

		const decision = decisions.get(hunk.id);
		if (!decision || decision.status === 'pending') {
			throw new ContractViolationError(hunk.id);
		}

		switch (decision.status) {
			case 'accepted':
				// Accepting a removal emits nothing
				if (hunk.kind !== 'removed') segments.push(hunk.proposed);
				break;
			case 'rejected':
				// Rejecting an addition emits nothing
				if (hunk.kind !== 'added') segments.push(hunk.original);
				break;
			case 'revised':
				segments.push(decision.revisedText);
				break;
			default:
				return assertNever(decision);
		}
	}

	return segments.join('');
}

/**
 * Decision map keyed by hunk id, as held by a list of hunk states
 */
export function collectDecisions(hunks: readonly HunkState[]): Map<string, HunkDecision> {
	return new Map(hunks.map((hunk): [string, HunkDecision] => [hunk.id, hunk.decision]));
}

/**
 * Count changed hunks by status; unchanged hunks are not counted
 */
export function countStatuses(hunks: readonly HunkState[]): StatusCounts {
	const counts: StatusCounts = { pending: 0, accepted: 0, rejected: 0, revised: 0 };
	for (const hunk of hunks) {
		if (isChangedHunk(hunk)) {
			counts[hunk.decision.status]++;
		}
	}
	return counts;
}

export function assertNever(value: never): never {
	throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}
