export type ToolCategory = "file" | "code" | "web_search" | "reference" | "notification" | "retrieval";

export type ToolPropertyType = "string" | "number" | "integer" | "boolean" | "array" | "object";

export type ToolPropertySchema = {
  type: ToolPropertyType;
  description?: string;
  items?: { type: ToolPropertyType };
  enum?: string[];
};

export type ToolInputSchema = {
  type: "object";
  required?: string[];
  properties: Record<string, ToolPropertySchema>;
};

export interface ToolContext {
  userId: string;
  /** Null in no-workspace mode. */
  workspaceId: string | null;
  /** Folder the file and code tools are confined to. */
  workspaceRoot: string;
  retrievalCount: number;
  signal?: AbortSignal;
}

export interface ToolHandlerResult {
  output: string;
  data?: unknown;
}

export type ToolHandler = (args: Record<string, unknown>, context: ToolContext) => Promise<ToolHandlerResult>;

export interface ToolDefinition {
  name: string;
  description: string;
  category: ToolCategory;
  inputSchema: ToolInputSchema;
  handler: ToolHandler;
}
