/**
 * In-memory storage and state machine for pending edit sessions.
 *
 * One store instance owns its session table; it is created by the hosting
 * process and handed to whatever needs it. Sessions live only as long as the
 * process does. A multi-instance deployment needs a shared store instead.
 */

import * as crypto from 'crypto';
import { annotateHunksWithIds, computeLineDiff } from './diff-hunks';
import {
	ContractViolationError,
	InvalidDecisionError,
	NotFoundError,
} from './errors';
import {
	ACCEPTED,
	PENDING,
	applyHunkDecisions,
	collectDecisions,
	countStatuses,
	isChangedHunk,
	isPendingHunk,
} from './hunk-decisions';
import { KeyedLock } from './session-lock';
import {
	DiffHunk,
	EditSession,
	EditSessionSnapshot,
	HunkDecision,
	HunkState,
	Resource,
	StatusCounts,
} from './types';

export type Clock = () => number;

export interface EditSessionStoreOptions {
	/** Epoch-millisecond clock, used for creation stamps and expiry */
	clock?: Clock;

	/** Session id factory */
	generateId?: () => string;

	/** When set, sessions older than this are treated as absent on lookup */
	sessionMaxAgeMs?: number;
}

export interface CreateSessionParams {
	resource: Resource;
	proposedContent: string;
	summary?: string | null;
	createdBy?: string | null;

	/**
	 * Annotated hunks to show the reviewer, possibly with elided unchanged text.
	 * Defaults to the untruncated diff of the resource content and the proposal.
	 */
	hunks?: readonly DiffHunk[];
}

export const DEFAULT_SESSION_MAX_AGE_MS = 60 * 60 * 1000;

function generateSessionId(): string {
	return crypto.randomUUID().replace(/-/g, '');
}

export class EditSessionStore {
	private readonly sessions = new Map<string, EditSession>();
	private readonly locks = new KeyedLock();
	private readonly clock: Clock;
	private readonly generateId: () => string;
	private readonly sessionMaxAgeMs: number | undefined;

	constructor(options: EditSessionStoreOptions = {}) {
		this.clock = options.clock ?? Date.now;
		this.generateId = options.generateId ?? generateSessionId;
		this.sessionMaxAgeMs = options.sessionMaxAgeMs;
	}

	create(params: CreateSessionParams): EditSessionSnapshot {
		const { resource, proposedContent } = params;
		const originalContent = resource.content;
		const fullHunks = annotateHunksWithIds(
			computeLineDiff(originalContent, proposedContent, { truncateUnchanged: false })
		);
		const displayHunks = params.hunks ?? fullHunks;
		assertSameShape(displayHunks, fullHunks);

		const session: EditSession = {
			id: this.generateId(),
			resourceId: resource.id,
			baseVersion: resource.version,
			originalContent,
			proposedContent,
			summary: params.summary ?? null,
			createdAt: this.clock(),
			createdBy: params.createdBy ?? null,
			// Unchanged hunks are implicitly accepted; changed hunks start pending
			hunks: displayHunks.map(hunk => ({
				...hunk,
				decision: isChangedHunk(hunk) ? PENDING : ACCEPTED,
			})),
			mergedContent: null,
		};
		session.mergedContent = reconstructContent(session);

		this.sessions.set(session.id, session);
		console.debug(
			`[EditSession] Created ${session.id} for ${session.resourceId}@v${session.baseVersion} ` +
			`(${session.hunks.length} hunks)`
		);
		return snapshotSession(session);
	}

	get(id: string): EditSessionSnapshot | undefined {
		const session = this.lookup(id);
		return session && snapshotSession(session);
	}

	require(id: string): EditSessionSnapshot {
		return snapshotSession(this.requireEntry(id));
	}

	has(id: string): boolean {
		return this.lookup(id) !== undefined;
	}

	get size(): number {
		return this.sessions.size;
	}

	/**
	 * Record a decision for one changed hunk and recompute the merged content.
	 * Serialized with every other locked operation on the same session.
	 */
	setHunkDecision(sessionId: string, hunkId: string, decision: HunkDecision): Promise<EditSessionSnapshot> {
		return this.withSessionLock(sessionId, () => {
			const session = this.requireEntry(sessionId);
			const target = session.hunks.find(hunk => hunk.id === hunkId);

			if (!target) {
				throw new NotFoundError(
					'hunk',
					hunkId,
					`Hunk '${hunkId}' not found in edit session '${sessionId}'`
				);
			}
			if (!isChangedHunk(target)) {
				throw new InvalidDecisionError(hunkId, `Hunk ${hunkId} is unchanged and cannot be decided`);
			}
			if (decision.status === 'pending') {
				throw new InvalidDecisionError(hunkId, `Hunk ${hunkId} cannot be returned to pending`);
			}

			this.updateHunks(session, hunk => (hunk.id === hunkId ? { ...hunk, decision: { ...decision } } : hunk));
			console.debug(`[EditSession] ${sessionId}: ${hunkId} -> ${decision.status}`);
			return snapshotSession(session);
		});
	}

	/**
	 * Decide every still-pending changed hunk at once
	 */
	resolveAll(sessionId: string, status: 'accepted' | 'rejected'): Promise<EditSessionSnapshot> {
		return this.withSessionLock(sessionId, () => {
			const session = this.requireEntry(sessionId);
			const decision: HunkDecision = { status };

			this.updateHunks(session, hunk => (isPendingHunk(hunk) ? { ...hunk, decision } : hunk));
			console.debug(`[EditSession] ${sessionId}: remaining hunks -> ${status}`);
			return snapshotSession(session);
		});
	}

	getPendingHunks(id: string): HunkState[] {
		return this.lookup(id)?.hunks.filter(isPendingHunk).map(copyHunk) ?? [];
	}

	getHunkCounts(id: string): StatusCounts {
		return countStatuses(this.lookup(id)?.hunks ?? []);
	}

	discard(id: string): EditSessionSnapshot | undefined {
		const session = this.sessions.get(id);
		if (session) {
			this.sessions.delete(id);
			console.debug(`[EditSession] Discarded ${id}`);
		}
		return session && snapshotSession(session);
	}

	/**
	 * Remove sessions older than maxAgeMs. Returns the number removed.
	 */
	cleanupExpired(maxAgeMs: number = this.sessionMaxAgeMs ?? DEFAULT_SESSION_MAX_AGE_MS): number {
		const now = this.clock();
		let removed = 0;

		for (const [id, session] of this.sessions) {
			if (now - session.createdAt > maxAgeMs) {
				this.sessions.delete(id);
				removed++;
			}
		}

		if (removed > 0) {
			console.debug(`[EditSession] Cleaned up ${removed} expired session(s)`);
		}
		return removed;
	}

	/**
	 * Run a task while holding the session's lock
	 */
	withSessionLock<T>(sessionId: string, task: () => T | Promise<T>): Promise<T> {
		return this.locks.run(sessionId, task);
	}

	private lookup(id: string): EditSession | undefined {
		const session = this.sessions.get(id);
		if (session && this.isExpired(session, this.clock())) {
			this.sessions.delete(id);
			console.debug(`[EditSession] Evicted expired session ${id}`);
			return undefined;
		}
		return session;
	}

	private requireEntry(id: string): EditSession {
		const session = this.lookup(id);
		if (!session) {
			throw new NotFoundError('session', id);
		}
		return session;
	}

	private updateHunks(session: EditSession, update: (hunk: HunkState) => HunkState): void {
		session.hunks = session.hunks.map(update);
		session.mergedContent = reconstructContent(session);
	}

	private isExpired(session: EditSession, now: number): boolean {
		return this.sessionMaxAgeMs !== undefined && now - session.createdAt > this.sessionMaxAgeMs;
	}
}

/**
 * Rebuild the merged document for a session from its full original and
 * proposed content. Returns null while any changed hunk is pending.
 *
 * The session's hunks may carry elided display text, so the diff is recomputed
 * untruncated and paired with the session's hunks by position. Ids stay the
 * ones issued at creation.
 */
export function reconstructContent(session: EditSessionSnapshot): string | null {
	if (session.hunks.some(isPendingHunk)) {
		return null;
	}

	const fullHunks = annotateHunksWithIds(
		computeLineDiff(session.originalContent, session.proposedContent, { truncateUnchanged: false })
	);
	assertSameShape(session.hunks, fullHunks);

	const pinned = fullHunks.map((hunk, index) => ({ ...hunk, id: session.hunks[index].id }));
	return applyHunkDecisions(pinned, collectDecisions(session.hunks));
}

function snapshotSession(session: EditSession): EditSessionSnapshot {
	return { ...session, hunks: session.hunks.map(copyHunk) };
}

function copyHunk(hunk: HunkState): HunkState {
	return { ...hunk, decision: { ...hunk.decision } };
}

function assertSameShape(hunks: readonly DiffHunk[], fullHunks: readonly DiffHunk[]): void {
	if (hunks.length !== fullHunks.length) {
		throw new ContractViolationError(
			hunks[0]?.id ?? '',
			`Expected ${fullHunks.length} hunks for this edit, got ${hunks.length}`
		);
	}
	hunks.forEach((hunk, index) => {
		if (hunk.kind !== fullHunks[index].kind) {
			throw new ContractViolationError(
				hunk.id,
				`Hunk ${hunk.id} is ${hunk.kind} but the edit has ${fullHunks[index].kind} at that position`
			);
		}
	});
}
