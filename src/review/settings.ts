import { DEFAULT_MAX_UNCHANGED_LINES } from './diff-hunks';
import { DEFAULT_SESSION_MAX_AGE_MS } from './edit-session-store';

export interface ReviewSettings {
	/** Longest unchanged block shown in full to reviewers */
	maxUnchangedLines: number;

	/** Elide unchanged blocks longer than maxUnchangedLines in session hunks */
	truncateUnchanged: boolean;

	/** Age after which a pending session is considered expired */
	sessionMaxAgeMs: number;

	/** How often the sweeper removes expired sessions */
	cleanupIntervalMs: number;
}

export const DEFAULT_SETTINGS: ReviewSettings = {
	maxUnchangedLines: DEFAULT_MAX_UNCHANGED_LINES,
	truncateUnchanged: true,
	sessionMaxAgeMs: DEFAULT_SESSION_MAX_AGE_MS,
	cleanupIntervalMs: 5 * 60 * 1000,
};

export function resolveSettings(overrides: Partial<ReviewSettings> = {}): ReviewSettings {
	const settings: ReviewSettings = Object.assign({}, DEFAULT_SETTINGS, overrides);

	requirePositiveInteger('maxUnchangedLines', settings.maxUnchangedLines);
	requirePositiveInteger('sessionMaxAgeMs', settings.sessionMaxAgeMs);
	requirePositiveInteger('cleanupIntervalMs', settings.cleanupIntervalMs);

	return settings;
}

/**
 * Read overrides from REVIEW_* environment variables
 */
export function loadSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): ReviewSettings {
	const overrides: Partial<ReviewSettings> = {};

	const maxUnchangedLines = parseNumber('REVIEW_MAX_UNCHANGED_LINES', env.REVIEW_MAX_UNCHANGED_LINES);
	if (maxUnchangedLines !== undefined) overrides.maxUnchangedLines = maxUnchangedLines;

	const sessionMaxAgeMs = parseNumber('REVIEW_SESSION_MAX_AGE_MS', env.REVIEW_SESSION_MAX_AGE_MS);
	if (sessionMaxAgeMs !== undefined) overrides.sessionMaxAgeMs = sessionMaxAgeMs;

	const cleanupIntervalMs = parseNumber('REVIEW_CLEANUP_INTERVAL_MS', env.REVIEW_CLEANUP_INTERVAL_MS);
	if (cleanupIntervalMs !== undefined) overrides.cleanupIntervalMs = cleanupIntervalMs;

	const truncate = env.REVIEW_TRUNCATE_UNCHANGED;
	if (truncate !== undefined && truncate !== '') {
		overrides.truncateUnchanged = !['0', 'false', 'no', 'off'].includes(truncate.trim().toLowerCase());
	}

	return resolveSettings(overrides);
}

function parseNumber(name: string, raw: string | undefined): number | undefined {
	if (raw === undefined || raw.trim() === '') return undefined;
	const value = Number(raw);
	if (Number.isNaN(value)) {
		throw new RangeError(`${name} must be a number, got '${raw}'`);
	}
	return value;
}

function requirePositiveInteger(name: keyof ReviewSettings, value: number): void {
	if (!Number.isInteger(value) || value <= 0) {
		throw new RangeError(`${name} must be a positive integer, got ${value}`);
	}
}
