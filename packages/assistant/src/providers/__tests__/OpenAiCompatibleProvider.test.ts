import test from "node:test";
import assert from "node:assert/strict";
import { OpenAiCompatibleProvider } from "../OpenAiCompatibleProvider.js";
import type { ProviderRequest } from "../ProviderTypes.js";
import { isObject } from "../../tools/ToolArgs.js";
import { jsonResponse, withFetch } from "../../tools/__tests__/FetchStub.js";

type FetchHandler = (url: string, body: string) => unknown;

const withStubbedFetch = (handler: FetchHandler, fn: () => Promise<void>, status = 200): Promise<void> =>
  withFetch((request) => jsonResponse(handler(request.url, request.body), status), fn);

const parseBody = (body: string): Record<string, unknown> | undefined => {
  const parsed: unknown = JSON.parse(body);
  return isObject(parsed) ? parsed : undefined;
};

test("OpenAiCompatibleProvider returns message content", { concurrency: false }, async () => {
  let requestedUrl = "";
  await withStubbedFetch(
    (url) => {
      requestedUrl = url;
      return {
        choices: [{ message: { role: "assistant", content: "hello" } }],
        usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 },
      };
    },
    async () => {
      const provider = new OpenAiCompatibleProvider({
        model: "test-model",
        baseUrl: "http://127.0.0.1:9999/v1",
      });
      const request: ProviderRequest = {
        messages: [{ role: "user", content: "hi" }],
      };

      const result = await provider.generate(request);
      assert.equal(result.message.content, "hello");
      assert.equal(result.toolCalls, undefined);
      assert.deepEqual(result.usage, { inputTokens: 3, outputTokens: 2, totalTokens: 5 });
    },
  );
  assert.equal(requestedUrl, "http://127.0.0.1:9999/v1/chat/completions");
});

test("OpenAiCompatibleProvider parses tool calls", { concurrency: false }, async () => {
  await withStubbedFetch(
    () => ({
      choices: [
        {
          message: {
            role: "assistant",
            content: null,
            tool_calls: [
              {
                id: "call_1",
                type: "function",
                function: {
                  name: "read_file",
                  arguments: "{\"path\":\"notes.md\"}",
                },
              },
            ],
          },
        },
      ],
    }),
    async () => {
      const provider = new OpenAiCompatibleProvider({ model: "test-model", baseUrl: "http://127.0.0.1:9999/v1/" });
      const result = await provider.generate({ messages: [{ role: "user", content: "read file" }] });
      assert.equal(result.message.content, "");
      assert.equal(result.toolCalls?.length, 1);
      assert.equal(result.toolCalls?.[0].name, "read_file");
      assert.deepEqual(result.toolCalls?.[0].args, { path: "notes.md" });
      assert.deepEqual(result.message.toolCalls, result.toolCalls);
    },
  );
});

test("OpenAiCompatibleProvider sends tools and tool-call history", { concurrency: false }, async () => {
  let received: Record<string, unknown> | undefined;
  await withStubbedFetch(
    (_, body) => {
      received = parseBody(body);
      return { choices: [{ message: { role: "assistant", content: "done" } }] };
    },
    async () => {
      const provider = new OpenAiCompatibleProvider({
        model: "test-model",
        apiKey: "test-key",
        baseUrl: "http://127.0.0.1:9999/v1/",
      });
      await provider.generate({
        messages: [
          { role: "user", content: "hi" },
          {
            role: "assistant",
            content: "",
            toolCalls: [{ id: "call_1", name: "web_search", args: { query: "pasta" } }],
          },
          { role: "tool", content: "results", toolCallId: "call_1", name: "web_search" },
        ],
        tools: [{ name: "web_search", description: "Search", inputSchema: { type: "object" } }],
        toolChoice: "auto",
        temperature: 0.2,
      });
    },
  );

  assert.equal(received?.model, "test-model");
  assert.equal(received?.temperature, 0.2);
  assert.equal(received?.tool_choice, "auto");
  assert.deepEqual(received?.tools, [
    { type: "function", function: { name: "web_search", description: "Search", parameters: { type: "object" } } },
  ]);
  const messages = received?.messages;
  assert.ok(Array.isArray(messages));
  assert.deepEqual(messages[1], {
    role: "assistant",
    content: "",
    tool_calls: [{ id: "call_1", type: "function", function: { name: "web_search", arguments: "{\"query\":\"pasta\"}" } }],
  });
  assert.deepEqual(messages[2], { role: "tool", content: "results", name: "web_search", tool_call_id: "call_1" });
});

test("OpenAiCompatibleProvider omits tool_choice without tools", { concurrency: false }, async () => {
  let received: Record<string, unknown> | undefined;
  await withStubbedFetch(
    (_, body) => {
      received = parseBody(body);
      return { choices: [{ message: { role: "assistant", content: "ok" } }] };
    },
    async () => {
      const provider = new OpenAiCompatibleProvider({ model: "test-model" });
      await provider.generate({ messages: [{ role: "user", content: "hi" }], toolChoice: "auto" });
    },
  );
  assert.equal(received?.tools, undefined);
  assert.equal(received?.tool_choice, undefined);
});

test("OpenAiCompatibleProvider surfaces HTTP errors", { concurrency: false }, async () => {
  await withStubbedFetch(
    () => ({ error: "rate limited" }),
    async () => {
      const provider = new OpenAiCompatibleProvider({ model: "test-model" });
      await assert.rejects(
        () => provider.generate({ messages: [{ role: "user", content: "hi" }] }),
        /OpenAI-compatible error 429/,
      );
    },
    429,
  );
});
