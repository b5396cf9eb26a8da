/**
 * Response helper utilities for consistent MCP tool response formatting
 */

import { ReviewError, ReviewErrorCode } from "../review/errors";

export interface ToolResponse<T = unknown> {
	content: Array<{
		type: "text";
		text: string;
	}>;
	structuredContent?: T;
}

export interface ErrorResponse {
	code: number;
	message: string;
}

/**
 * Format a tool response according to MCP protocol
 * @param data Text shown to the caller; anything but a string is JSON stringified
 * @param structuredContent Machine-readable payload for presentation layers
 */
export function formatToolResponse<T = unknown>(data: unknown, structuredContent?: T): ToolResponse<T> {
	const text = typeof data === "string"
		? data
		: data === undefined ? "undefined" : JSON.stringify(data);

	const response: ToolResponse<T> = { content: [{ type: "text", text }] };
	if (structuredContent !== undefined) {
		response.structuredContent = structuredContent;
	}
	return response;
}

/**
 * Format an error response according to MCP protocol
 */
export function formatErrorResponse(code: number, message: string): ErrorResponse {
	return {
		code,
		message
	};
}

/**
 * JSON-RPC error codes; the -320xx range is reserved for server-defined errors
 */
export const ErrorCodes = {
	INVALID_PARAMS: -32602,
	INTERNAL_ERROR: -32603,
	METHOD_NOT_FOUND: -32601,
	NOT_FOUND: -32001,
	VERSION_CONFLICT: -32002,
	UNRESOLVED_HUNKS: -32003,
	APPLY_CANCELLED: -32004,
} as const;

const REVIEW_ERROR_CODES: Record<ReviewErrorCode, number> = {
	NOT_FOUND: ErrorCodes.NOT_FOUND,
	VERSION_CONFLICT: ErrorCodes.VERSION_CONFLICT,
	UNRESOLVED_HUNKS: ErrorCodes.UNRESOLVED_HUNKS,
	CONTRACT_VIOLATION: ErrorCodes.INTERNAL_ERROR,
	INVALID_DECISION: ErrorCodes.INVALID_PARAMS,
	APPLY_CANCELLED: ErrorCodes.APPLY_CANCELLED,
};

/**
 * Map a thrown value onto an MCP error. Unknown failures become internal errors.
 */
export function formatReviewError(error: unknown, fallbackPrefix = "Unexpected error"): ErrorResponse {
	if (error instanceof ReviewError) {
		return formatErrorResponse(REVIEW_ERROR_CODES[error.code], error.message);
	}
	const message = error instanceof Error ? error.message : String(error);
	return formatErrorResponse(ErrorCodes.INTERNAL_ERROR, `${fallbackPrefix}: ${message}`);
}
