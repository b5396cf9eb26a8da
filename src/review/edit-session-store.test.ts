import { annotateHunksWithIds, computeLineDiff, truncateUnchangedForDisplay } from './diff-hunks';
import { EditSessionStore, reconstructContent } from './edit-session-store';
import { ContractViolationError, InvalidDecisionError, NotFoundError } from './errors';
import { ACCEPTED, REJECTED } from './hunk-decisions';
import { HunkDecision, Resource } from './types';

const numberedLines = (count: number) =>
	Array.from({ length: count }, (_, i) => `l${i + 1}\n`).join('');

describe('EditSessionStore', () => {
	let now: number;
	let store: EditSessionStore;
	let nextId: number;

	const resource: Resource = { id: 'note-1', version: 3, content: 'line1\nline2\nline3\n' };
	const proposed = 'line1\nCHANGED\nline3\n';

	beforeEach(() => {
		jest.spyOn(console, 'debug').mockImplementation(() => {});
		now = 1_000;
		nextId = 0;
		store = new EditSessionStore({
			clock: () => now,
			generateId: () => `edit-${++nextId}`,
		});
	});

	afterEach(() => {
		jest.restoreAllMocks();
	});

	describe('create', () => {
		it('should snapshot the resource and start changed hunks pending', () => {
			const session = store.create({
				resource,
				proposedContent: proposed,
				summary: 'Rename line two',
				createdBy: 'user-1',
			});

			expect(session).toMatchObject({
				id: 'edit-1',
				resourceId: 'note-1',
				baseVersion: 3,
				originalContent: resource.content,
				proposedContent: proposed,
				summary: 'Rename line two',
				createdBy: 'user-1',
				createdAt: 1_000,
				mergedContent: null,
			});
			expect(session.hunks.map(h => [h.id, h.kind, h.decision.status])).toEqual([
				['h1', 'unchanged', 'accepted'],
				['h2', 'modified', 'pending'],
				['h3', 'unchanged', 'accepted'],
			]);
			expect(store.size).toBe(1);
		});

		it('should default optional fields to null', () => {
			const session = store.create({ resource, proposedContent: proposed });

			expect(session.summary).toBeNull();
			expect(session.createdBy).toBeNull();
		});

		it('should resolve immediately when nothing changed', () => {
			const session = store.create({ resource, proposedContent: resource.content });

			expect(session.hunks).toHaveLength(1);
			expect(session.mergedContent).toBe(resource.content);
		});

		it('should reject hunks that do not belong to the edit', () => {
			const foreign = annotateHunksWithIds(computeLineDiff('x\n', 'y\n'));

			expect(() => store.create({ resource, proposedContent: proposed, hunks: foreign }))
				.toThrow(ContractViolationError);
			expect(store.size).toBe(0);
		});
	});

	describe('setHunkDecision', () => {
		it('should compute merged content once every changed hunk is decided', async () => {
			const { id } = store.create({ resource, proposedContent: proposed });

			const session = await store.setHunkDecision(id, 'h2', ACCEPTED);

			expect(session.hunks[1].decision).toEqual({ status: 'accepted' });
			expect(session.mergedContent).toBe(proposed);
		});

		it('should allow a decided hunk to be re-decided', async () => {
			const { id } = store.create({ resource, proposedContent: proposed });

			await store.setHunkDecision(id, 'h2', ACCEPTED);
			const session = await store.setHunkDecision(id, 'h2', REJECTED);

			expect(session.mergedContent).toBe(resource.content);
		});

		it('should apply revised text', async () => {
			const { id } = store.create({ resource, proposedContent: proposed });

			const session = await store.setHunkDecision(id, 'h2', { status: 'revised', revisedText: 'revised\n' });

			expect(session.mergedContent).toBe('line1\nrevised\nline3\n');
		});

		it('should keep merged content null while hunks are pending', async () => {
			const { id } = store.create({
				resource: { id: 'note-2', version: 1, content: 'a\nb\nc\nd\n' },
				proposedContent: 'a\nc\nd\ne\n',
			});

			const session = await store.setHunkDecision(id, 'h2', ACCEPTED);

			expect(session.mergedContent).toBeNull();
			expect(store.getPendingHunks(id).map(h => h.id)).toEqual(['h4']);
		});

		it('should refuse to return a hunk to pending', async () => {
			const { id } = store.create({ resource, proposedContent: proposed });
			await store.setHunkDecision(id, 'h2', ACCEPTED);

			await expect(store.setHunkDecision(id, 'h2', { status: 'pending' }))
				.rejects.toBeInstanceOf(InvalidDecisionError);
			expect(store.require(id).hunks[1].decision.status).toBe('accepted');
		});

		it('should refuse decisions on unchanged hunks', async () => {
			const { id } = store.create({ resource, proposedContent: proposed });

			await expect(store.setHunkDecision(id, 'h1', REJECTED)).rejects.toMatchObject({
				code: 'INVALID_DECISION',
				hunkId: 'h1',
			});
		});

		it('should report unknown hunks and sessions', async () => {
			const { id } = store.create({ resource, proposedContent: proposed });

			await expect(store.setHunkDecision(id, 'h9', ACCEPTED)).rejects.toMatchObject({
				entity: 'hunk',
				id: 'h9',
				message: `Hunk 'h9' not found in edit session '${id}'`,
			});
			await expect(store.setHunkDecision('missing', 'h1', ACCEPTED)).rejects.toMatchObject({
				entity: 'session',
				message: "Edit session 'missing' not found or expired",
			});
		});

		it('should rebuild from full content when hunks show elided text', async () => {
			const original = numberedLines(10) + 'old\n';
			const edited = numberedLines(10) + 'new\n';
			const display = truncateUnchangedForDisplay(
				annotateHunksWithIds(computeLineDiff(original, edited, { truncateUnchanged: false })),
				4
			);
			const { id } = store.create({
				resource: { id: 'long', version: 1, content: original },
				proposedContent: edited,
				hunks: display,
			});
			expect(store.require(id).hunks[0].original).toContain('... (6 lines unchanged) ...');

			const session = await store.setHunkDecision(id, 'h2', ACCEPTED);

			expect(session.mergedContent).toBe(edited);
		});

		it('should apply racing decisions in call order', async () => {
			const { id } = store.create({ resource, proposedContent: proposed });

			await Promise.all([
				store.setHunkDecision(id, 'h2', ACCEPTED),
				store.setHunkDecision(id, 'h2', REJECTED),
			]);

			expect(store.require(id).hunks[1].decision.status).toBe('rejected');
			expect(store.require(id).mergedContent).toBe(resource.content);
		});
	});

	describe('resolveAll', () => {
		it('should decide only the hunks that are still pending', async () => {
			const { id } = store.create({
				resource: { id: 'note-2', version: 1, content: 'a\nb\nc\nd\n' },
				proposedContent: 'a\nc\nd\ne\n',
			});
			await store.setHunkDecision(id, 'h2', REJECTED);

			const session = await store.resolveAll(id, 'accepted');

			expect(session.hunks[1].decision.status).toBe('rejected');
			expect(session.hunks[3].decision.status).toBe('accepted');
			expect(session.mergedContent).toBe('a\nb\nc\nd\ne\n');
		});
	});

	describe('counts and lookups', () => {
		it('should count changed hunks by status', async () => {
			const { id } = store.create({
				resource: { id: 'note-2', version: 1, content: 'a\nb\nc\nd\n' },
				proposedContent: 'a\nc\nd\ne\n',
			});
			await store.setHunkDecision(id, 'h4', { status: 'revised', revisedText: 'E\n' });

			expect(store.getHunkCounts(id)).toEqual({ pending: 1, accepted: 0, rejected: 0, revised: 1 });
		});

		it('should return zero counts and no pending hunks for unknown sessions', () => {
			expect(store.getHunkCounts('missing')).toEqual({ pending: 0, accepted: 0, rejected: 0, revised: 0 });
			expect(store.getPendingHunks('missing')).toEqual([]);
		});

		it('should throw NotFoundError from require', () => {
			expect(() => store.require('missing')).toThrow(NotFoundError);
		});
	});

	describe('returned sessions', () => {
		it('should be copies that cannot change the stored session', async () => {
			const { id } = store.create({ resource, proposedContent: proposed });
			const decided = await store.setHunkDecision(id, 'h2', ACCEPTED);

			const cache: { mergedContent: string | null } = decided;
			cache.mergedContent = 'INJECTED\n';
			const hunk: { decision: HunkDecision } = decided.hunks[1];
			hunk.decision = { status: 'pending' };

			const stored = store.require(id);
			expect(stored).not.toBe(decided);
			expect(stored.mergedContent).toBe(proposed);
			expect(stored.hunks[1].decision).toEqual({ status: 'accepted' });
			expect(store.getPendingHunks(id)).toEqual([]);
		});

		it('should not share decision objects with the caller', async () => {
			const { id } = store.create({ resource, proposedContent: proposed });
			const decision: { status: 'revised'; revisedText: string } = { status: 'revised', revisedText: 'mine\n' };
			await store.setHunkDecision(id, 'h2', decision);

			decision.revisedText = 'changed later\n';

			expect(store.require(id).hunks[1].decision).toEqual({ status: 'revised', revisedText: 'mine\n' });
			expect(store.require(id).mergedContent).toBe('line1\nmine\nline3\n');
		});
	});

	describe('discard', () => {
		it('should remove and return the session', () => {
			const session = store.create({ resource, proposedContent: proposed });

			expect(store.discard(session.id)).toEqual(session);
			expect(store.get(session.id)).toBeUndefined();
			expect(store.discard(session.id)).toBeUndefined();
		});
	});

	describe('expiry', () => {
		it('should remove sessions older than the max age', () => {
			const first = store.create({ resource, proposedContent: proposed });
			now = 2_000;
			const second = store.create({ resource, proposedContent: proposed });

			now = 1_000 + 60_001;
			expect(store.cleanupExpired(60_000)).toBe(1);
			expect(store.has(first.id)).toBe(false);
			expect(store.has(second.id)).toBe(true);
		});

		it('should treat expired sessions as missing when a max age is configured', () => {
			const expiring = new EditSessionStore({ clock: () => now, sessionMaxAgeMs: 500 });
			const session = expiring.create({ resource, proposedContent: proposed });

			now = 1_400;
			expect(expiring.get(session.id)).toEqual(session);

			now = 1_501;
			expect(expiring.get(session.id)).toBeUndefined();
			expect(expiring.size).toBe(0);
			expect(() => expiring.require(session.id)).toThrow(NotFoundError);
		});
	});

	describe('reconstructContent', () => {
		it('should return null while a changed hunk is pending', () => {
			const session = store.create({ resource, proposedContent: proposed });

			expect(reconstructContent(session)).toBeNull();
		});
	});
});
