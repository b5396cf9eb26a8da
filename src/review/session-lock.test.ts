import { KeyedLock } from './session-lock';

function deferred() {
	let resolve: () => void = () => {};
	const promise = new Promise<void>(r => {
		resolve = r;
	});
	return { promise, resolve };
}

describe('KeyedLock', () => {
	let lock: KeyedLock;

	beforeEach(() => {
		lock = new KeyedLock();
	});

	it('should run tasks for one key in call order', async () => {
		const gate = deferred();
		const order: string[] = [];

		const first = lock.run('edit-1', async () => {
			await gate.promise;
			order.push('first');
		});
		const second = lock.run('edit-1', () => {
			order.push('second');
		});

		gate.resolve();
		await Promise.all([first, second]);

		expect(order).toEqual(['first', 'second']);
	});

	it('should keep the chain going after a failure', async () => {
		const failed = lock.run('edit-1', () => {
			throw new Error('boom');
		});
		const next = lock.run('edit-1', () => 'ok');

		await expect(failed).rejects.toThrow('boom');
		await expect(next).resolves.toBe('ok');
	});

	it('should not make other keys wait', async () => {
		const gate = deferred();
		const blocked = lock.run('edit-1', () => gate.promise);

		await expect(lock.run('edit-2', () => 42)).resolves.toBe(42);

		gate.resolve();
		await blocked;
	});

	it('should report a key as locked until its last task settles', async () => {
		const gate = deferred();
		const task = lock.run('edit-1', () => gate.promise);

		expect(lock.isLocked('edit-1')).toBe(true);
		expect(lock.isLocked('edit-2')).toBe(false);

		gate.resolve();
		await task;

		expect(lock.isLocked('edit-1')).toBe(false);
	});
});
