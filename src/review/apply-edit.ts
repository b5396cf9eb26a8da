/**
 * Applies a fully reviewed edit session to its resource under an optimistic
 * version check.
 */

import { EditSessionStore, reconstructContent } from './edit-session-store';
import {
	ApplyCancelledError,
	ContractViolationError,
	UnresolvedHunksError,
	VersionConflictError,
} from './errors';
import { isPendingHunk } from './hunk-decisions';
import { ResourceStore } from './resource-store';
import { Resource } from './types';

export interface ApplyEditOptions {
	/** Aborting before the write leaves the session in place for a retry */
	signal?: AbortSignal;
}

export interface ApplyEditResult {
	resource: Resource;
	mergedContent: string;
}

export function applyEditSession(
	store: EditSessionStore,
	resources: ResourceStore,
	editId: string,
	options: ApplyEditOptions = {}
): Promise<ApplyEditResult> {
	const { signal } = options;

	return store.withSessionLock(editId, async () => {
		throwIfCancelled(editId, signal);
		const session = store.require(editId);

		const current = await resources.get(session.resourceId);
		if (current.version !== session.baseVersion) {
			console.warn(
				`[ApplyEdit] Version conflict for ${editId}: ` +
				`expected v${session.baseVersion}, found v${current.version}`
			);
			// A stale session can never be applied; drop it so it is not retried
			store.discard(editId);
			throw new VersionConflictError(session.baseVersion, current.version);
		}

		const pending = session.hunks.filter(isPendingHunk);
		if (pending.length > 0) {
			console.warn(`[ApplyEdit] ${editId} has ${pending.length} pending hunk(s)`);
			throw new UnresolvedHunksError(pending.map(hunk => hunk.id));
		}

		const mergedContent = session.mergedContent ?? reconstructContent(session);
		if (mergedContent === null) {
			throw new ContractViolationError('', `Edit session '${editId}' has no merged content`);
		}

		throwIfCancelled(editId, signal);

		let resource: Resource;
		try {
			resource = await resources.update(session.resourceId, mergedContent, session.baseVersion);
		} catch (error) {
			if (error instanceof VersionConflictError) {
				console.warn(`[ApplyEdit] Write rejected for ${editId}: ${error.message}`);
				store.discard(editId);
			}
			throw error;
		}

		store.discard(editId);
		console.debug(`[ApplyEdit] Applied ${editId} to ${resource.id}, now v${resource.version}`);
		return { resource, mergedContent };
	});
}

function throwIfCancelled(editId: string, signal: AbortSignal | undefined): void {
	if (signal?.aborted) {
		throw new ApplyCancelledError(editId);
	}
}
