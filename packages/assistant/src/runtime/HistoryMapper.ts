import type { ConversationTurn } from "@sidekick/shared";
import type { ProviderMessage } from "../providers/ProviderTypes.js";

/**
 * Keeps the last `windowSize` turns without starting on a tool result whose
 * request was cut off.
 */
export const windowHistory = (history: ConversationTurn[], windowSize: number): ConversationTurn[] => {
  if (windowSize <= 0 || history.length <= windowSize) return history;
  let start = history.length - windowSize;
  while (start < history.length && history[start].role === "tool") {
    start += 1;
  }
  return history.slice(start);
};

export const toProviderMessage = (turn: ConversationTurn): ProviderMessage => {
  switch (turn.role) {
    case "user":
      return { role: "user", content: turn.content };
    case "assistant":
      return turn.toolCalls?.length
        ? {
            role: "assistant",
            content: turn.content,
            toolCalls: turn.toolCalls.map((call) => ({ id: call.id, name: call.name, args: call.args })),
          }
        : { role: "assistant", content: turn.content };
    case "tool":
      return {
        role: "tool",
        content: turn.content,
        toolCallId: turn.result.requestId,
        name: turn.result.name,
      };
  }
};

export const toProviderMessages = (history: ConversationTurn[], windowSize: number): ProviderMessage[] =>
  windowHistory(history, windowSize).map(toProviderMessage);
