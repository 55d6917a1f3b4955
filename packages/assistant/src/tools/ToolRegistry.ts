import { RETRIEVAL_TOOL_NAME } from "@sidekick/shared";
import type { ProviderToolDefinition } from "../providers/ProviderTypes.js";
import type { ToolDefinition } from "./ToolTypes.js";

export interface ToolViewOptions {
  workspaceId: string | null;
  /** User-level allow list; empty means every registered tool. */
  userEnabledTools: string[];
  /** Workspace-level allow list; empty means every registered tool. */
  workspaceEnabledTools: string[];
  retrievalEnabled: boolean;
}

const allows = (allowList: string[], name: string): boolean => allowList.length === 0 || allowList.includes(name);

/**
 * The tools one exchange may call, fixed when the exchange starts.
 */
export class ToolRegistryView {
  private tools: Map<string, ToolDefinition>;

  constructor(tools: ToolDefinition[], readonly workspaceId: string | null) {
    this.tools = new Map(tools.map((tool) => [tool.name, tool]));
  }

  resolve(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  get hasRetrieval(): boolean {
    return this.tools.has(RETRIEVAL_TOOL_NAME);
  }

  describe(): ProviderToolDefinition[] {
    return Array.from(this.tools.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    }));
  }
}

export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  list(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  /**
   * Builds the view for one exchange. Retrieval is included only when a
   * workspace is selected and its retrieval switch is on; every other tool
   * must pass both allow lists.
   */
  createView(options: ToolViewOptions): ToolRegistryView {
    const selected = this.list().filter((tool) => {
      if (tool.category === "retrieval") {
        return options.workspaceId !== null && options.retrievalEnabled;
      }
      return allows(options.userEnabledTools, tool.name) && allows(options.workspaceEnabledTools, tool.name);
    });
    return new ToolRegistryView(selected, options.workspaceId);
  }
}
