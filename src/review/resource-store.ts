import { NotFoundError, VersionConflictError } from './errors';
import { Resource } from './types';

/**
 * The authoritative store edits are applied to
 */
export interface ResourceStore {
	/** Throws NotFoundError when the resource does not exist */
	get(id: string): Promise<Resource>;

	/**
	 * Replace the content if the stored version still equals expectedVersion.
	 * Throws VersionConflictError otherwise.
	 */
	update(id: string, content: string, expectedVersion: number): Promise<Resource>;
}

/**
 * Process-local ResourceStore. Every successful update bumps the version by one.
 */
export class InMemoryResourceStore implements ResourceStore {
	private readonly resources = new Map<string, Resource>();

	seed(id: string, content: string, version = 1): Resource {
		const resource = { id, content, version };
		this.resources.set(id, resource);
		return { ...resource };
	}

	async get(id: string): Promise<Resource> {
		const resource = this.resources.get(id);
		if (!resource) {
			throw new NotFoundError('resource', id);
		}
		return { ...resource };
	}

	async update(id: string, content: string, expectedVersion: number): Promise<Resource> {
		const current = this.resources.get(id);
		if (!current) {
			throw new NotFoundError('resource', id);
		}
		if (current.version !== expectedVersion) {
			throw new VersionConflictError(expectedVersion, current.version);
		}

		const updated = { id, content, version: current.version + 1 };
		this.resources.set(id, updated);
		return { ...updated };
	}
}
