import test from "node:test";
import assert from "node:assert/strict";
import { createNotificationTool } from "../notification/NotificationTool.js";
import type { ToolContext } from "../ToolTypes.js";
import { jsonResponse, withFetch } from "./FetchStub.js";

const context: ToolContext = { userId: "u1", workspaceId: null, workspaceRoot: "/tmp/unused", retrievalCount: 4 };

test("send_notification posts a form to the push service", { concurrency: false }, async () => {
  const tool = createNotificationTool({ token: "test-token", user: "test-user", baseUrl: "http://push.test/1/messages.json" });
  await withFetch(
    () => jsonResponse({ status: 1 }),
    async (requests) => {
      const result = await tool.handler({ message: "Dinner is ready" }, context);
      assert.equal(result.output, "Notification sent");
      const form = new URLSearchParams(requests[0].body);
      assert.equal(form.get("token"), "test-token");
      assert.equal(form.get("user"), "test-user");
      assert.equal(form.get("message"), "Dinner is ready");
      assert.equal(requests[0].headers.get("content-type"), "application/x-www-form-urlencoded");
    },
  );
});

test("send_notification surfaces rejected requests", { concurrency: false }, async () => {
  const tool = createNotificationTool({ token: "test-token", user: "test-user" });
  await withFetch(
    () => new Response("invalid token", { status: 400 }),
    async () => {
      await assert.rejects(() => tool.handler({ message: "hi" }, context), {
        message: "Notification failed (400): invalid token",
      });
    },
  );
});
