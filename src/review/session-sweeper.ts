import { EditSessionStore } from './edit-session-store';
import { ReviewSettings } from './settings';

export interface SessionSweeperOptions {
	maxAgeMs: number;
	intervalMs: number;
}

/**
 * Periodically drops expired edit sessions. Housekeeping only: lookups
 * already treat expired sessions as missing when the store has a max age.
 */
export class SessionSweeper {
	private timer: ReturnType<typeof setInterval> | null = null;

	constructor(
		private readonly store: EditSessionStore,
		private readonly options: SessionSweeperOptions
	) {}

	/**
	 * Sweep every cleanupIntervalMs for sessions older than sessionMaxAgeMs
	 */
	static fromSettings(
		store: EditSessionStore,
		settings: Pick<ReviewSettings, 'sessionMaxAgeMs' | 'cleanupIntervalMs'>
	): SessionSweeper {
		return new SessionSweeper(store, {
			maxAgeMs: settings.sessionMaxAgeMs,
			intervalMs: settings.cleanupIntervalMs,
		});
	}

	start(): void {
		if (this.timer) return;

		this.timer = setInterval(() => this.sweep(), this.options.intervalMs);
		// Never keep the process alive just for housekeeping
		this.timer.unref?.();
		console.debug(`[SessionSweeper] Started, every ${this.options.intervalMs}ms`);
	}

	stop(): void {
		if (!this.timer) return;

		clearInterval(this.timer);
		this.timer = null;
		console.debug('[SessionSweeper] Stopped');
	}

	get running(): boolean {
		return this.timer !== null;
	}

	sweep(): number {
		return this.store.cleanupExpired(this.options.maxAgeMs);
	}
}
