import { SidekickError, describeError, type ToolInvocationRequest, type ToolInvocationResult } from "@sidekick/shared";
import type { ToolRegistryView } from "../tools/ToolRegistry.js";
import type { ToolContext } from "../tools/ToolTypes.js";
import { validateArgs } from "../tools/ToolArgs.js";
import type { ExchangeLogger } from "./RunLogger.js";
import { runWithTimeout } from "./Timeouts.js";

export interface ToolDispatcherOptions {
  view: ToolRegistryView;
  context: ToolContext;
  maxCallsPerTurn: number;
  /** Budget shared by every dispatch of one exchange. */
  maxCallsPerExchange: number;
  /** Parallel invocations within one batch; 1 runs them in order. */
  concurrency?: number;
  timeoutMs?: number;
  maxOutputChars?: number;
  logger?: ExchangeLogger;
}

const failure = (request: ToolInvocationRequest, error: string): ToolInvocationResult => ({
  requestId: request.id,
  name: request.name,
  ok: false,
  error,
});

const truncate = (output: string, maxChars: number | undefined): string => {
  if (!maxChars || output.length <= maxChars) return output;
  return `${output.slice(0, maxChars)}\n...[truncated, ${output.length} chars total]`;
};

export class ToolDispatcher {
  private admitted = 0;

  constructor(private options: ToolDispatcherOptions) {}

  /** Requests admitted against the exchange budget so far. */
  get callsAdmitted(): number {
    return this.admitted;
  }

  /**
   * Executes a batch and returns one result per request, in request order.
   * Never throws: rejected, invalid and failing calls all come back as
   * failure results.
   */
  async dispatch(requests: ToolInvocationRequest[]): Promise<ToolInvocationResult[]> {
    const results: ToolInvocationResult[] = new Array(requests.length);
    const runnable: number[] = [];

    requests.forEach((request, index) => {
      if (index >= this.options.maxCallsPerTurn) {
        results[index] = failure(
          request,
          `Rejected: at most ${this.options.maxCallsPerTurn} tool calls are allowed per turn`,
        );
        return;
      }
      if (this.admitted >= this.options.maxCallsPerExchange) {
        results[index] = failure(
          request,
          `Rejected: the limit of ${this.options.maxCallsPerExchange} tool calls for this request has been reached`,
        );
        return;
      }
      this.admitted += 1;
      runnable.push(index);
    });

    const workerCount = Math.max(1, Math.min(this.options.concurrency ?? 1, runnable.length));
    let cursor = 0;
    const worker = async (): Promise<void> => {
      while (cursor < runnable.length) {
        const index = runnable[cursor];
        cursor += 1;
        results[index] = await this.invoke(requests[index]);
      }
    };
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    for (const [index, result] of results.entries()) {
      await this.logResult(requests[index], result);
    }
    return results;
  }

  private async invoke(request: ToolInvocationRequest): Promise<ToolInvocationResult> {
    const tool = this.options.view.resolve(request.name);
    if (!tool) {
      return failure(request, `Tool not available in this workspace: ${request.name}`);
    }

    const checked = validateArgs(request.args, tool.inputSchema);
    if (!checked.ok) {
      return failure(request, checked.error);
    }

    try {
      const result = await runWithTimeout(
        (signal) => tool.handler(checked.args, { ...this.options.context, signal }),
        this.options.timeoutMs,
        () =>
          new SidekickError({
            code: "tool_timeout",
            message: `Tool ${request.name} timed out after ${this.options.timeoutMs} ms`,
          }),
      );
      const output = truncate(result.output, this.options.maxOutputChars);
      return result.data === undefined
        ? { requestId: request.id, name: request.name, ok: true, output }
        : { requestId: request.id, name: request.name, ok: true, output, data: result.data };
    } catch (error) {
      return failure(request, describeError(error));
    }
  }

  private async logResult(request: ToolInvocationRequest, result: ToolInvocationResult): Promise<void> {
    if (!this.options.logger) return;
    try {
      await this.options.logger.log("tool_call", {
        id: request.id,
        name: request.name,
        ok: result.ok,
        error: result.ok ? undefined : result.error,
      });
    } catch (error) {
      console.warn(`sidekick: could not write tool log: ${describeError(error)}`);
    }
  }
}
