import type { ToolDefinition } from "../ToolTypes.js";
import { stringArg } from "../ToolArgs.js";

export interface NotificationOptions {
  token: string;
  user: string;
  baseUrl?: string;
}

const DEFAULT_PUSHOVER_URL = "https://api.pushover.net/1/messages.json";

export const createNotificationTool = (options: NotificationOptions): ToolDefinition => ({
  name: "send_notification",
  description: "Send a push notification to the user.",
  category: "notification",
  inputSchema: {
    type: "object",
    required: ["message"],
    properties: {
      message: { type: "string" },
    },
  },
  handler: async (args, context) => {
    const message = stringArg(args, "message");
    const response = await fetch(options.baseUrl ?? DEFAULT_PUSHOVER_URL, {
      method: "POST",
      headers: { "content-type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({ token: options.token, user: options.user, message }).toString(),
      signal: context.signal,
    });
    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Notification failed (${response.status}): ${body}`);
    }
    return { output: "Notification sent", data: { delivered: true } };
  },
});
