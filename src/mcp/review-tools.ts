import { McpReplyFunction } from "./types";
import { ToolArgs, ToolDefinition, ToolImplementation } from "../shared/tool-registry";
import { ErrorCodes, formatErrorResponse, formatReviewError, formatToolResponse } from "./response-helpers";
import { ReviewError } from "../review/errors";
import { DecisionResult, EditReviewService } from "../review/review-service";
import { formatStatusSummary, serializeSession } from "../review/serialize";

const EDIT_ID_PROPERTY = {
	type: "string",
	description: "ID of the pending edit session",
} as const;

const HUNK_ID_PROPERTY = {
	type: "string",
	description: "ID of the diff hunk (e.g. 'h1', 'h2')",
} as const;

// Edit review tool definitions
export const REVIEW_TOOL_DEFINITIONS: ToolDefinition[] = [
	{
		name: "proposeEdit",
		description: "Propose a full rewrite of a document and open a per-hunk review session",
		category: "edit-review",
		inputSchema: {
			type: "object",
			properties: {
				resourceId: {
					type: "string",
					description: "ID of the document to edit",
				},
				newContent: {
					type: "string",
					description: "Complete proposed content of the document",
				},
				summary: {
					type: "string",
					description: "Short human summary of the change",
				},
				createdBy: {
					type: "string",
					description: "Identity of whoever proposes the edit",
				},
			},
			required: ["resourceId", "newContent"],
		},
	},
	{
		name: "acceptHunk",
		description: "Accept one diff hunk of a pending edit",
		category: "edit-review",
		inputSchema: {
			type: "object",
			properties: { editId: EDIT_ID_PROPERTY, hunkId: HUNK_ID_PROPERTY },
			required: ["editId", "hunkId"],
		},
	},
	{
		name: "rejectHunk",
		description: "Reject one diff hunk of a pending edit",
		category: "edit-review",
		inputSchema: {
			type: "object",
			properties: { editId: EDIT_ID_PROPERTY, hunkId: HUNK_ID_PROPERTY },
			required: ["editId", "hunkId"],
		},
	},
	{
		name: "reviseHunk",
		description: "Replace one diff hunk of a pending edit with custom text",
		category: "edit-review",
		inputSchema: {
			type: "object",
			properties: {
				editId: EDIT_ID_PROPERTY,
				hunkId: HUNK_ID_PROPERTY,
				revisedText: {
					type: "string",
					description: "Replacement text used instead of the proposed change",
				},
			},
			required: ["editId", "hunkId", "revisedText"],
		},
	},
	{
		name: "resolveAllHunks",
		description: "Accept or reject every hunk of a pending edit that is still undecided",
		category: "edit-review",
		inputSchema: {
			type: "object",
			properties: {
				editId: EDIT_ID_PROPERTY,
				status: {
					type: "string",
					description: "Decision for the remaining hunks",
					enum: ["accepted", "rejected"],
				},
			},
			required: ["editId", "status"],
		},
	},
	{
		name: "getEditStatus",
		description: "Get the hunks and decision counts of a pending edit",
		category: "edit-review",
		inputSchema: {
			type: "object",
			properties: { editId: EDIT_ID_PROPERTY },
			required: ["editId"],
		},
	},
	{
		name: "applyEdit",
		description: "Write the reviewed edit to the document if it has not changed since the proposal",
		category: "edit-review",
		inputSchema: {
			type: "object",
			properties: { editId: EDIT_ID_PROPERTY },
			required: ["editId"],
		},
	},
	{
		name: "discardEdit",
		description: "Throw away a pending edit without writing it",
		category: "edit-review",
		inputSchema: {
			type: "object",
			properties: { editId: EDIT_ID_PROPERTY },
			required: ["editId"],
		},
	},
];

// Edit review tool implementations
export class ReviewTools {
	constructor(private service: EditReviewService) {}

	createImplementations(): ToolImplementation[] {
		return [
			{
				name: "proposeEdit",
				handler: async (args: ToolArgs, reply: McpReplyFunction) => {
					const resourceId = readString(args, "resourceId");
					const newContent = readString(args, "newContent");
					if (resourceId === undefined || newContent === undefined) {
						return reply({
							error: formatErrorResponse(
								ErrorCodes.INVALID_PARAMS,
								"resourceId and newContent are required"
							),
						});
					}

					try {
						const session = await this.service.proposeEdit({
							resourceId,
							proposedContent: newContent,
							summary: readString(args, "summary") ?? null,
							createdBy: readString(args, "createdBy") ?? null,
						});
						const { counts } = this.service.getStatus(session.id);
						const changes = counts.pending + counts.accepted + counts.rejected + counts.revised;
						return reply({
							result: formatToolResponse(
								`Proposed edit ${session.id} for ${resourceId}: ${changes} change(s) to review.`,
								serializeSession(session, counts)
							),
						});
					} catch (error) {
						return reply({ error: this.failure("proposeEdit", error, "Failed to propose edit") });
					}
				},
			},
			this.decisionTool("acceptHunk", (editId, hunkId) => this.service.acceptHunk(editId, hunkId), "Accepted"),
			this.decisionTool("rejectHunk", (editId, hunkId) => this.service.rejectHunk(editId, hunkId), "Rejected"),
			{
				name: "reviseHunk",
				handler: async (args: ToolArgs, reply: McpReplyFunction) => {
					const editId = readString(args, "editId");
					const hunkId = readString(args, "hunkId");
					const revisedText = readString(args, "revisedText");
					if (editId === undefined || hunkId === undefined || revisedText === undefined) {
						return reply({
							error: formatErrorResponse(
								ErrorCodes.INVALID_PARAMS,
								"editId, hunkId and revisedText are required"
							),
						});
					}

					try {
						const result = await this.service.reviseHunk(editId, hunkId, revisedText);
						return reply({ result: decisionResponse(`Revised hunk ${hunkId}.`, result) });
					} catch (error) {
						return reply({ error: this.failure("reviseHunk", error, "Failed to revise hunk") });
					}
				},
			},
			{
				name: "resolveAllHunks",
				handler: async (args: ToolArgs, reply: McpReplyFunction) => {
					const editId = readString(args, "editId");
					const status = readString(args, "status");
					if (editId === undefined || (status !== "accepted" && status !== "rejected")) {
						return reply({
							error: formatErrorResponse(
								ErrorCodes.INVALID_PARAMS,
								"editId is required and status must be 'accepted' or 'rejected'"
							),
						});
					}

					try {
						const result = await this.service.resolveAll(editId, status);
						return reply({
							result: decisionResponse(`Marked all remaining hunks ${status}.`, result),
						});
					} catch (error) {
						return reply({ error: this.failure("resolveAllHunks", error, "Failed to resolve hunks") });
					}
				},
			},
			{
				name: "getEditStatus",
				handler: async (args: ToolArgs, reply: McpReplyFunction) => {
					const editId = readString(args, "editId");
					if (editId === undefined) {
						return reply({ error: formatErrorResponse(ErrorCodes.INVALID_PARAMS, "editId is required") });
					}

					try {
						const { session, counts } = this.service.getStatus(editId);
						return reply({
							result: formatToolResponse(formatStatusSummary(counts), serializeSession(session, counts)),
						});
					} catch (error) {
						return reply({ error: this.failure("getEditStatus", error, "Failed to get edit status") });
					}
				},
			},
			{
				name: "applyEdit",
				handler: async (args: ToolArgs, reply: McpReplyFunction) => {
					const editId = readString(args, "editId");
					if (editId === undefined) {
						return reply({ error: formatErrorResponse(ErrorCodes.INVALID_PARAMS, "editId is required") });
					}

					try {
						const { resource } = await this.service.apply(editId);
						return reply({
							result: formatToolResponse(
								`Applied edit ${editId} to ${resource.id}. New version: v${resource.version}.`,
								{ success: true, editId, resource }
							),
						});
					} catch (error) {
						return reply({ error: this.failure("applyEdit", error, "Failed to apply edit") });
					}
				},
			},
			{
				name: "discardEdit",
				handler: async (args: ToolArgs, reply: McpReplyFunction) => {
					const editId = readString(args, "editId");
					if (editId === undefined) {
						return reply({ error: formatErrorResponse(ErrorCodes.INVALID_PARAMS, "editId is required") });
					}

					try {
						const session = await this.service.discard(editId);
						return reply({
							result: formatToolResponse(`Discarded edit ${editId}.`, {
								discarded: true,
								editId,
								resourceId: session.resourceId,
							}),
						});
					} catch (error) {
						return reply({ error: this.failure("discardEdit", error, "Failed to discard edit") });
					}
				},
			},
		];
	}

	private decisionTool(
		name: string,
		decide: (editId: string, hunkId: string) => Promise<DecisionResult>,
		verb: string
	): ToolImplementation {
		return {
			name,
			handler: async (args: ToolArgs, reply: McpReplyFunction) => {
				const editId = readString(args, "editId");
				const hunkId = readString(args, "hunkId");
				if (editId === undefined || hunkId === undefined) {
					return reply({
						error: formatErrorResponse(ErrorCodes.INVALID_PARAMS, "editId and hunkId are required"),
					});
				}

				try {
					const result = await decide(editId, hunkId);
					return reply({ result: decisionResponse(`${verb} hunk ${hunkId}.`, result) });
				} catch (error) {
					return reply({ error: this.failure(name, error, "Failed to update hunk") });
				}
			},
		};
	}

	private failure(tool: string, error: unknown, fallbackPrefix: string) {
		const response = formatReviewError(error, fallbackPrefix);
		if (error instanceof ReviewError) {
			console.warn(`[ReviewTools] ${tool}: ${response.message}`);
		} else {
			console.error(`[ReviewTools] ${tool} failed:`, error);
		}
		return response;
	}
}

function decisionResponse(prefix: string, { session, counts }: DecisionResult) {
	return formatToolResponse(`${prefix} ${formatStatusSummary(counts)}`, serializeSession(session, counts));
}

function readString(args: ToolArgs, key: string): string | undefined {
	const value = args[key];
	return typeof value === "string" ? value : undefined;
}
