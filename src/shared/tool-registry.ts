import { McpReplyFunction } from "../mcp/types";
import { ErrorCodes, formatErrorResponse } from "../mcp/response-helpers";

export interface JsonSchemaProperty {
	type: "string" | "number" | "boolean";
	description: string;
	enum?: string[];
}

export interface ToolDefinition {
	name: string;
	description: string;
	category: string;
	inputSchema: {
		type: "object";
		properties: Record<string, JsonSchemaProperty>;
		required?: string[];
	};
}

export type ToolArgs = Record<string, unknown>;

export interface ToolImplementation {
	name: string;
	handler: (args: ToolArgs, reply: McpReplyFunction) => Promise<void>;
}

interface RegisteredTool {
	definition: ToolDefinition;
	implementation: ToolImplementation;
}

/**
 * Pairs tool definitions with their handlers and dispatches calls by name
 */
export class ToolRegistry {
	private tools = new Map<string, RegisteredTool>();

	register(definitions: ToolDefinition[], implementations: ToolImplementation[]): void {
		for (const implementation of implementations) {
			const definition = definitions.find(d => d.name === implementation.name);
			if (!definition) {
				throw new Error(`No definition for tool implementation: ${implementation.name}`);
			}
			this.tools.set(implementation.name, { definition, implementation });
		}
	}

	getToolDefinitions(): ToolDefinition[] {
		return Array.from(this.tools.values(), tool => tool.definition);
	}

	has(name: string): boolean {
		return this.tools.has(name);
	}

	async call(name: string, args: unknown, reply: McpReplyFunction): Promise<void> {
		const tool = this.tools.get(name);
		if (!tool) {
			return reply({
				error: formatErrorResponse(ErrorCodes.METHOD_NOT_FOUND, `Unknown tool: ${name}`),
			});
		}
		await tool.implementation.handler(isToolArgs(args) ? args : {}, reply);
	}
}

function isToolArgs(value: unknown): value is ToolArgs {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}
