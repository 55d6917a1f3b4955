import { SidekickError } from "@sidekick/shared";
import type {
  Provider,
  ProviderMessage,
  ProviderToolCall,
  ProviderToolDefinition,
  ProviderUsage,
} from "../providers/ProviderTypes.js";
import { runWithTimeout } from "./Timeouts.js";

export type Decision =
  | { kind: "final_answer"; content: string; usage?: ProviderUsage }
  | { kind: "tool_requests"; content: string; requests: ProviderToolCall[]; usage?: ProviderUsage };

export interface DecisionStepOptions {
  timeoutMs?: number;
  maxTokens?: number;
  temperature?: number;
}

/**
 * One model inference turned into a tagged decision. Empty content with no
 * tool calls is rejected as `malformed_decision`.
 */
export class DecisionStep {
  constructor(
    private provider: Provider,
    private options: DecisionStepOptions = {},
  ) {}

  async decide(
    systemContext: string,
    history: ProviderMessage[],
    tools: ProviderToolDefinition[],
  ): Promise<Decision> {
    const response = await runWithTimeout(
      (signal) =>
        this.provider.generate({
          messages: [{ role: "system", content: systemContext }, ...history],
          tools,
          toolChoice: tools.length ? "auto" : "none",
          maxTokens: this.options.maxTokens,
          temperature: this.options.temperature,
          signal,
        }),
      this.options.timeoutMs,
      () =>
        new SidekickError({
          code: "decision_timeout",
          message: `Model did not respond within ${this.options.timeoutMs} ms`,
        }),
    );

    const content = response.message.content ?? "";
    const calls = response.toolCalls ?? [];
    if (calls.length > 0) {
      const requests = calls.map((call, index) => ({
        id: call.id || `call_${index + 1}`,
        name: call.name,
        args: call.args,
      }));
      return { kind: "tool_requests", content, requests, usage: response.usage };
    }
    if (!content.trim()) {
      throw new SidekickError({
        code: "malformed_decision",
        message: "Model returned neither content nor tool calls",
      });
    }
    return { kind: "final_answer", content, usage: response.usage };
  }
}
