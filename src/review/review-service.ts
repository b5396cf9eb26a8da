import { ApplyEditOptions, ApplyEditResult, applyEditSession } from './apply-edit';
import { annotateHunksWithIds, computeLineDiff, truncateUnchangedForDisplay } from './diff-hunks';
import { EditSessionStore } from './edit-session-store';
import { NotFoundError } from './errors';
import { ACCEPTED, REJECTED, countStatuses, isPendingHunk } from './hunk-decisions';
import { ResourceStore } from './resource-store';
import { DEFAULT_SETTINGS, ReviewSettings } from './settings';
import { EditSessionSnapshot, HunkDecision, HunkState, StatusCounts } from './types';

export interface ProposeEditInput {
	resourceId: string;
	proposedContent: string;
	summary?: string | null;
	createdBy?: string | null;
}

export interface DecisionResult {
	session: EditSessionSnapshot;
	counts: StatusCounts;
}

export interface EditStatus extends DecisionResult {
	pending: HunkState[];
}

/**
 * Caller-facing review operations over a session store and a resource store
 */
export class EditReviewService {
	constructor(
		private readonly resources: ResourceStore,
		private readonly sessions: EditSessionStore,
		private readonly settings: ReviewSettings = DEFAULT_SETTINGS
	) {}

	/**
	 * Diff the proposal against the resource's current content and open a session
	 */
	async proposeEdit(input: ProposeEditInput): Promise<EditSessionSnapshot> {
		const resource = await this.resources.get(input.resourceId);

		// Annotate the untruncated diff so ranges are exact, then elide for display
		const annotated = annotateHunksWithIds(
			computeLineDiff(resource.content, input.proposedContent, { truncateUnchanged: false })
		);
		const hunks = this.settings.truncateUnchanged
			? truncateUnchangedForDisplay(annotated, this.settings.maxUnchangedLines)
			: annotated;

		return this.sessions.create({
			resource,
			proposedContent: input.proposedContent,
			summary: input.summary,
			createdBy: input.createdBy,
			hunks,
		});
	}

	async setHunkDecision(editId: string, hunkId: string, decision: HunkDecision): Promise<DecisionResult> {
		const session = await this.sessions.setHunkDecision(editId, hunkId, decision);
		return { session, counts: countStatuses(session.hunks) };
	}

	acceptHunk(editId: string, hunkId: string): Promise<DecisionResult> {
		return this.setHunkDecision(editId, hunkId, ACCEPTED);
	}

	rejectHunk(editId: string, hunkId: string): Promise<DecisionResult> {
		return this.setHunkDecision(editId, hunkId, REJECTED);
	}

	reviseHunk(editId: string, hunkId: string, revisedText: string): Promise<DecisionResult> {
		return this.setHunkDecision(editId, hunkId, { status: 'revised', revisedText });
	}

	async resolveAll(editId: string, status: 'accepted' | 'rejected'): Promise<DecisionResult> {
		const session = await this.sessions.resolveAll(editId, status);
		return { session, counts: countStatuses(session.hunks) };
	}

	getStatus(editId: string): EditStatus {
		const session = this.sessions.require(editId);
		return {
			session,
			counts: countStatuses(session.hunks),
			pending: session.hunks.filter(isPendingHunk),
		};
	}

	apply(editId: string, options?: ApplyEditOptions): Promise<ApplyEditResult> {
		return applyEditSession(this.sessions, this.resources, editId, options);
	}

	/**
	 * Drop a session, waiting for any in-flight decision or apply on it first
	 */
	discard(editId: string): Promise<EditSessionSnapshot> {
		return this.sessions.withSessionLock(editId, () => {
			const session = this.sessions.discard(editId);
			if (!session) {
				throw new NotFoundError('session', editId);
			}
			return session;
		});
	}
}
