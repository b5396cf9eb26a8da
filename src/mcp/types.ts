import { ErrorResponse, ToolResponse } from "./response-helpers";

/**
 * What a tool handler sends back for one call: a result or an error, never both
 */
export type McpReply =
	| { result: ToolResponse; error?: undefined }
	| { error: ErrorResponse; result?: undefined };

export type McpReplyFunction = (reply: McpReply) => void;
