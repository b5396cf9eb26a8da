export * from './review/types';
export * from './review/errors';
export * from './review/diff-hunks';
export * from './review/hunk-decisions';
export * from './review/session-lock';
export * from './review/edit-session-store';
export * from './review/resource-store';
export * from './review/apply-edit';
export * from './review/review-service';
export * from './review/serialize';
export * from './review/settings';
export * from './review/session-sweeper';
export * from './review/review-engine';
export * from './mcp/types';
export * from './mcp/response-helpers';
export * from './mcp/review-tools';
export * from './shared/tool-registry';
