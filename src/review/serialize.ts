/**
 * Flat records of sessions and hunks for presentation layers
 */

import { isPendingHunk } from './hunk-decisions';
import { EditSessionSnapshot, HunkKind, HunkState, HunkStatus, StatusCounts } from './types';

export interface SerializedHunk {
	id: string;
	kind: HunkKind;
	original: string;
	proposed: string;
	status: HunkStatus;
	revisedText: string | null;
	origStart: number | null;
	origEnd: number | null;
	newStart: number | null;
	newEnd: number | null;
}

export interface SerializedSession {
	editId: string;
	resourceId: string;
	baseVersion: number;
	summary: string | null;
	createdBy: string | null;
	createdAt: string;
	resolved: boolean;
	counts: StatusCounts;
	hunks: SerializedHunk[];
}

export function serializeHunk(hunk: Readonly<HunkState>): SerializedHunk {
	return {
		id: hunk.id,
		kind: hunk.kind,
		original: hunk.original,
		proposed: hunk.proposed,
		status: hunk.decision.status,
		revisedText: hunk.decision.status === 'revised' ? hunk.decision.revisedText : null,
		origStart: hunk.origStart,
		origEnd: hunk.origEnd,
		newStart: hunk.newStart,
		newEnd: hunk.newEnd,
	};
}

export function serializeSession(session: EditSessionSnapshot, counts: StatusCounts): SerializedSession {
	return {
		editId: session.id,
		resourceId: session.resourceId,
		baseVersion: session.baseVersion,
		summary: session.summary,
		createdBy: session.createdBy,
		createdAt: new Date(session.createdAt).toISOString(),
		resolved: !session.hunks.some(isPendingHunk),
		counts,
		hunks: session.hunks.map(serializeHunk),
	};
}

export function formatStatusSummary(counts: StatusCounts): string {
	return (
		`Status: ${counts.accepted} accepted, ${counts.rejected} rejected, ` +
		`${counts.revised} revised, ${counts.pending} pending.`
	);
}
