/**
 * Error taxonomy for edit review operations.
 *
 * None of these are retried by the engine itself; re-proposing or re-diffing
 * is left to the caller.
 */

export type ReviewErrorCode =
	| 'NOT_FOUND'
	| 'VERSION_CONFLICT'
	| 'UNRESOLVED_HUNKS'
	| 'CONTRACT_VIOLATION'
	| 'INVALID_DECISION'
	| 'APPLY_CANCELLED';

export abstract class ReviewError extends Error {
	abstract readonly code: ReviewErrorCode;

	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

export type NotFoundEntity = 'session' | 'resource' | 'hunk';

export class NotFoundError extends ReviewError {
	readonly code = 'NOT_FOUND';

	constructor(
		readonly entity: NotFoundEntity,
		readonly id: string,
		message: string = defaultNotFoundMessage(entity, id)
	) {
		super(message);
	}
}

function defaultNotFoundMessage(entity: NotFoundEntity, id: string): string {
	switch (entity) {
		case 'session':
			return `Edit session '${id}' not found or expired`;
		case 'resource':
			return `Resource '${id}' not found`;
		case 'hunk':
			return `Hunk '${id}' not found`;
	}
}

/**
 * Optimistic-lock failure: the resource moved past the version the edit was based on
 */
export class VersionConflictError extends ReviewError {
	readonly code = 'VERSION_CONFLICT';

	constructor(readonly expected: number, readonly found: number) {
		super(
			`Resource was modified since the edit was proposed. ` +
			`Expected v${expected}, found v${found}.`
		);
	}
}

export class UnresolvedHunksError extends ReviewError {
	readonly code = 'UNRESOLVED_HUNKS';

	constructor(readonly hunkIds: string[]) {
		super(
			`There are ${hunkIds.length} pending change(s): ${hunkIds.join(', ')}. ` +
			'Accept, reject, or revise each change before applying.'
		);
	}

	get count(): number {
		return this.hunkIds.length;
	}
}

/**
 * The merger was handed a changed hunk without a terminal decision.
 * Callers check resolution first, so reaching this is a bug.
 */
export class ContractViolationError extends ReviewError {
	readonly code = 'CONTRACT_VIOLATION';

	constructor(readonly hunkId: string, message = `Hunk ${hunkId} is pending - cannot apply`) {
		super(message);
	}
}

export class InvalidDecisionError extends ReviewError {
	readonly code = 'INVALID_DECISION';

	constructor(readonly hunkId: string, message: string) {
		super(message);
	}
}

export class ApplyCancelledError extends ReviewError {
	readonly code = 'APPLY_CANCELLED';

	constructor(readonly editId: string) {
		super(`Apply of edit session '${editId}' was cancelled before writing`);
	}
}
