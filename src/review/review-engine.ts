import { Clock, EditSessionStore } from './edit-session-store';
import { ResourceStore } from './resource-store';
import { EditReviewService } from './review-service';
import { SessionSweeper } from './session-sweeper';
import { ReviewSettings, loadSettingsFromEnv } from './settings';

export interface ReviewEngineOptions {
	/** Defaults to the REVIEW_* environment variables over the built-in defaults */
	settings?: ReviewSettings;
	clock?: Clock;
	generateId?: () => string;
}

export interface ReviewEngine {
	settings: ReviewSettings;
	sessions: EditSessionStore;
	service: EditReviewService;
	sweeper: SessionSweeper;
}

/**
 * Wire a session store, service and sweeper from one set of settings.
 * The sweeper is returned stopped.
 */
export function createReviewEngine(resources: ResourceStore, options: ReviewEngineOptions = {}): ReviewEngine {
	const settings = options.settings ?? loadSettingsFromEnv();
	const sessions = new EditSessionStore({
		clock: options.clock,
		generateId: options.generateId,
		sessionMaxAgeMs: settings.sessionMaxAgeMs,
	});

	return {
		settings,
		sessions,
		service: new EditReviewService(resources, sessions, settings),
		sweeper: SessionSweeper.fromSettings(sessions, settings),
	};
}
