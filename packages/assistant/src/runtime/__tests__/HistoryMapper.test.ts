import test from "node:test";
import assert from "node:assert/strict";
import type { ConversationTurn } from "@sidekick/shared";
import { toProviderMessages, windowHistory } from "../HistoryMapper.js";

const HISTORY: ConversationTurn[] = [
  { role: "user", content: "list my notes", ts: 1 },
  {
    role: "assistant",
    content: "",
    ts: 2,
    toolCalls: [{ id: "t1", name: "list_files", args: { path: "." }, turnIndex: 1 }],
  },
  {
    role: "tool",
    content: "notes.md",
    ts: 3,
    result: { requestId: "t1", name: "list_files", ok: true, output: "notes.md" },
  },
  { role: "assistant", content: "You have notes.md.", ts: 4 },
];

test("turns map to provider messages with tool linkage", { concurrency: false }, () => {
  assert.deepEqual(toProviderMessages(HISTORY, 10), [
    { role: "user", content: "list my notes" },
    {
      role: "assistant",
      content: "",
      toolCalls: [{ id: "t1", name: "list_files", args: { path: "." } }],
    },
    { role: "tool", content: "notes.md", toolCallId: "t1", name: "list_files" },
    { role: "assistant", content: "You have notes.md." },
  ]);
});

test("the window never starts on an orphaned tool result", { concurrency: false }, () => {
  const windowed = windowHistory(HISTORY, 2);
  assert.deepEqual(
    windowed.map((turn) => turn.ts),
    [4],
  );
});

test("a window larger than the history keeps everything", { concurrency: false }, () => {
  assert.equal(windowHistory(HISTORY, 4).length, 4);
  assert.equal(windowHistory(HISTORY, 0).length, 4);
});
