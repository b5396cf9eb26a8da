/**
 * Types for the edit review system
 */

/**
 * Classification of a contiguous span of a line diff
 */
export type HunkKind = 'unchanged' | 'added' | 'removed' | 'modified';

/**
 * Review status of a single hunk
 */
export type HunkStatus = 'pending' | 'accepted' | 'rejected' | 'revised';

/**
 * Terminal statuses a reviewer can move a hunk into
 */
export type HunkResolution = Exclude<HunkStatus, 'pending'>;

/**
 * A hunk as produced by the diff engine, before ids and ranges are assigned
 */
export interface RawHunk {
	kind: HunkKind;

	/** Original text (empty for 'added'); may be elided for unchanged hunks */
	original: string;

	/** Proposed text (empty for 'removed'); may be elided for unchanged hunks */
	proposed: string;

	/** True number of original lines, independent of any display elision */
	origLineCount: number;

	/** True number of proposed lines, independent of any display elision */
	newLineCount: number;
}

/**
 * A hunk with a positional id and 1-based inclusive line ranges
 */
export interface DiffHunk extends RawHunk {
	/** Stable identifier, e.g. 'h1', 'h2' */
	id: string;

	origStart: number | null;
	origEnd: number | null;
	newStart: number | null;
	newEnd: number | null;
}

/**
 * A reviewer's decision about one hunk
 */
export type HunkDecision =
	| { status: 'pending' }
	| { status: 'accepted' }
	| { status: 'rejected' }
	| { status: 'revised'; revisedText: string };

/**
 * A hunk fused with its current decision
 */
export interface HunkState extends DiffHunk {
	decision: HunkDecision;
}

/**
 * Number of changed hunks in each status
 */
export type StatusCounts = Record<HunkStatus, number>;

/**
 * A document in the authoritative resource store
 */
export interface Resource {
	id: string;
	version: number;
	content: string;
}

/**
 * A pending edit awaiting per-hunk review
 */
export interface EditSession {
	/** Opaque session id */
	readonly id: string;

	/** Resource the edit targets */
	readonly resourceId: string;

	/** Resource version at session creation; anchors the optimistic check */
	readonly baseVersion: number;

	/** Full, untruncated content before the edit */
	readonly originalContent: string;

	/** Full, untruncated content the edit proposes */
	readonly proposedContent: string;

	/** Human-readable change description */
	readonly summary: string | null;

	/** Epoch milliseconds from the store's clock */
	readonly createdAt: number;

	/** Identity of whoever proposed the edit */
	readonly createdBy: string | null;

	/** Hunk states in document order */
	hunks: HunkState[];

	/** Merged document; null until every changed hunk is decided */
	mergedContent: string | null;
}

/**
 * Copy of a session handed to callers. Changing it never reaches the store.
 */
export type EditSessionSnapshot = Readonly<Omit<EditSession, 'hunks'>> & {
	readonly hunks: ReadonlyArray<Readonly<HunkState>>;
};
