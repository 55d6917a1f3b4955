import { randomUUID } from "node:crypto";
import {
  KeyedLock,
  describeError,
  isSidekickError,
  pairKey,
  type ConversationTurn,
  type ToolInvocationRequest,
  type WorkspaceConfig,
  type WorkspaceStore,
} from "@sidekick/shared";
import type { Provider, ProviderUsage } from "../providers/ProviderTypes.js";
import type { ToolRegistry } from "../tools/ToolRegistry.js";
import { DecisionStep, type Decision } from "./DecisionStep.js";
import { toProviderMessages } from "./HistoryMapper.js";
import type { ExchangeLogger } from "./RunLogger.js";
import { buildSystemContext } from "./SystemContext.js";
import { ToolDispatcher } from "./ToolDispatcher.js";

export interface LoopLimits {
  maxIterations: number;
  maxToolCallsPerTurn: number;
  maxToolCallsPerExchange: number;
  decisionTimeoutMs?: number;
  toolTimeoutMs?: number;
  toolConcurrency: number;
  historyWindow: number;
  maxToolOutputChars?: number;
}

export interface ControlLoopOptions {
  store: WorkspaceStore;
  provider: Provider;
  tools: ToolRegistry;
  limits: LoopLimits;
  /** Tools the user allows everywhere; empty allows all. */
  userEnabledTools: string[];
  /** Settings used when no workspace is selected. */
  noWorkspaceConfig: WorkspaceConfig;
  resolveWorkspaceRoot: (userId: string, workspaceId: string | null) => string;
  createLogger?: (exchangeId: string) => ExchangeLogger;
  persona?: string;
  maxTokens?: number;
  temperature?: number;
  now?: () => number;
}

export type ExchangeStatus =
  | "answered"
  | "iteration_limit"
  | "protocol_violation"
  | "inference_failed"
  | "history_unavailable";

export interface ExchangeOutcome {
  exchangeId: string;
  status: ExchangeStatus;
  answer: string;
  iterations: number;
  toolCallsExecuted: number;
  /** Turns produced by this exchange, user turn first. */
  turns: ConversationTurn[];
  persisted: boolean;
  persistenceError?: string;
  usage?: ProviderUsage;
}

export const degradedAnswer = (status: Exclude<ExchangeStatus, "answered">, detail: string): string => {
  switch (status) {
    case "iteration_limit":
      return `I could not complete this request within the allotted ${detail} steps. Try narrowing it down or asking again.`;
    case "protocol_violation":
      return "I could not complete this request because the model returned an empty response.";
    case "inference_failed":
      return `I could not complete this request because the model was unavailable (${detail}).`;
    case "history_unavailable":
      return `I could not load this conversation's history, so the request was not processed (${detail}).`;
  }
};

const addUsage = (totals: ProviderUsage | undefined, usage: ProviderUsage | undefined): ProviderUsage | undefined => {
  if (!usage) return totals;
  const next: ProviderUsage = { ...totals };
  if (usage.inputTokens !== undefined) next.inputTokens = (next.inputTokens ?? 0) + usage.inputTokens;
  if (usage.outputTokens !== undefined) next.outputTokens = (next.outputTokens ?? 0) + usage.outputTokens;
  if (usage.totalTokens !== undefined) next.totalTokens = (next.totalTokens ?? 0) + usage.totalTokens;
  return next;
};

/**
 * Drives the decision step and the tool dispatcher for one user message at a
 * time per (user, workspace) pair, then writes the exchange back through the
 * workspace store.
 */
export class ControlLoop {
  private sessions = new KeyedLock();
  private decisionStep: DecisionStep;
  private now: () => number;

  constructor(private options: ControlLoopOptions) {
    this.decisionStep = new DecisionStep(options.provider, {
      timeoutMs: options.limits.decisionTimeoutMs,
      maxTokens: options.maxTokens,
      temperature: options.temperature,
    });
    this.now = options.now ?? Date.now;
  }

  async respond(message: string, workspaceId: string | null, userId: string): Promise<ExchangeOutcome> {
    return this.sessions.withLock(pairKey(userId, workspaceId), () => this.exchange(message, workspaceId, userId));
  }

  private async exchange(message: string, workspaceId: string | null, userId: string): Promise<ExchangeOutcome> {
    const exchangeId = randomUUID();
    const logger = this.options.createLogger?.(exchangeId);
    const log = async (type: string, data: Record<string, unknown>): Promise<void> => {
      if (!logger) return;
      try {
        await logger.log(type, data);
      } catch (error) {
        console.warn(`sidekick: could not write exchange log: ${describeError(error)}`);
      }
    };
    await log("exchange_start", { userId, workspaceId });

    let history: ConversationTurn[];
    let config: WorkspaceConfig;
    try {
      const snapshot = await this.options.store.load(userId, workspaceId);
      history = snapshot.history;
      config = snapshot.config ?? { ...this.options.noWorkspaceConfig, retrievalEnabled: false };
    } catch (error) {
      const detail = describeError(error);
      await log("exchange_end", { status: "history_unavailable", error: detail });
      return {
        exchangeId,
        status: "history_unavailable",
        answer: degradedAnswer("history_unavailable", detail),
        iterations: 0,
        toolCallsExecuted: 0,
        turns: [],
        persisted: false,
        persistenceError: detail,
      };
    }

    const { limits } = this.options;
    const view = this.options.tools.createView({
      workspaceId,
      userEnabledTools: this.options.userEnabledTools,
      workspaceEnabledTools: config.enabledTools,
      retrievalEnabled: config.retrievalEnabled,
    });
    const systemContext = buildSystemContext({ workspaceId, config, view, persona: this.options.persona });
    const dispatcher = new ToolDispatcher({
      view,
      context: {
        userId,
        workspaceId,
        workspaceRoot: this.options.resolveWorkspaceRoot(userId, workspaceId),
        retrievalCount: config.retrievalCount,
      },
      maxCallsPerTurn: limits.maxToolCallsPerTurn,
      maxCallsPerExchange: limits.maxToolCallsPerExchange,
      concurrency: limits.toolConcurrency,
      timeoutMs: limits.toolTimeoutMs,
      maxOutputChars: limits.maxToolOutputChars,
      logger,
    });

    const working = [...history];
    const turns: ConversationTurn[] = [];
    const push = (turn: ConversationTurn): void => {
      working.push(turn);
      turns.push(turn);
    };
    push({ role: "user", content: message, ts: this.now() });

    let status: ExchangeStatus | undefined;
    let answer = "";
    let iterations = 0;
    let failedDecisions = 0;
    let lastFailure = "";
    let usage: ProviderUsage | undefined;
    const tools = view.describe();

    while (status === undefined && iterations < limits.maxIterations) {
      iterations += 1;
      let decision: Decision;
      try {
        decision = await this.decisionStep.decide(
          systemContext,
          toProviderMessages(working, limits.historyWindow),
          tools,
        );
      } catch (error) {
        lastFailure = describeError(error);
        await log("decision_failed", { iteration: iterations, error: lastFailure });
        if (isSidekickError(error, "malformed_decision")) {
          status = "protocol_violation";
          answer = degradedAnswer(status, lastFailure);
          break;
        }
        failedDecisions += 1;
        continue;
      }

      usage = addUsage(usage, decision.usage);
      await log("provider_response", {
        iteration: iterations,
        kind: decision.kind,
        toolCalls: decision.kind === "tool_requests" ? decision.requests.map((call) => call.name) : [],
        usage: decision.usage,
      });

      if (decision.kind === "final_answer") {
        status = "answered";
        answer = decision.content;
        break;
      }

      const turnIndex = working.length;
      const requests: ToolInvocationRequest[] = decision.requests.map((call) => ({ ...call, turnIndex }));
      push({ role: "assistant", content: decision.content, ts: this.now(), toolCalls: requests });
      const results = await dispatcher.dispatch(requests);
      for (const result of results) {
        push({
          role: "tool",
          content: result.ok ? result.output : `ERROR: ${result.error}`,
          ts: this.now(),
          result,
        });
      }
    }

    if (status === undefined) {
      status = failedDecisions === iterations ? "inference_failed" : "iteration_limit";
      answer = degradedAnswer(status, status === "inference_failed" ? lastFailure : String(limits.maxIterations));
    }
    push({ role: "assistant", content: answer, ts: this.now() });

    let persisted = true;
    let persistenceError: string | undefined;
    try {
      await this.options.store.append(userId, workspaceId, turns);
    } catch (error) {
      persisted = false;
      persistenceError = describeError(error);
    }

    await log("exchange_end", {
      status,
      iterations,
      toolCallsExecuted: dispatcher.callsAdmitted,
      persisted,
      persistenceError,
      usage,
    });

    return {
      exchangeId,
      status,
      answer,
      iterations,
      toolCallsExecuted: dispatcher.callsAdmitted,
      turns,
      persisted,
      persistenceError,
      usage,
    };
  }
}
