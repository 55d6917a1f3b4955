import type {
  Provider,
  ProviderConfig,
  ProviderMessage,
  ProviderRequest,
  ProviderResponse,
  ProviderToolCall,
} from "./ProviderTypes.js";

interface OpenAiToolCall {
  id: string;
  type: "function";
  function: {
    name: string;
    arguments: string;
  };
}

interface OpenAiResponse {
  choices: Array<{
    message: {
      role: string;
      content?: string | null;
      tool_calls?: OpenAiToolCall[];
    };
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}

const parseToolArgs = (raw: string): unknown => {
  if (!raw.trim()) return {};
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
};

const normalizeBaseUrl = (baseUrl?: string): string => {
  const root = baseUrl ?? "https://api.openai.com/v1";
  return root.endsWith("/") ? root : `${root}/`;
};

const toWireMessage = (message: ProviderMessage): Record<string, unknown> => ({
  role: message.role,
  content: message.content,
  name: message.name,
  tool_call_id: message.toolCallId,
  tool_calls: message.toolCalls?.length
    ? message.toolCalls.map((call) => ({
        id: call.id,
        type: "function",
        function: {
          name: call.name,
          arguments: typeof call.args === "string" ? call.args : JSON.stringify(call.args ?? {}),
        },
      }))
    : undefined,
});

export class OpenAiCompatibleProvider implements Provider {
  name = "openai-compatible";

  constructor(private config: ProviderConfig) {}

  async generate(request: ProviderRequest): Promise<ProviderResponse> {
    const baseUrl = normalizeBaseUrl(this.config.baseUrl);
    const url = new URL("chat/completions", baseUrl).toString();

    const headers: Record<string, string> = {
      "content-type": "application/json",
    };
    if (this.config.apiKey) {
      headers.authorization = `Bearer ${this.config.apiKey}`;
    }

    const tools = request.tools?.length
      ? request.tools.map((tool) => ({
          type: "function",
          function: {
            name: tool.name,
            description: tool.description,
            parameters: tool.inputSchema ?? { type: "object", properties: {} },
          },
        }))
      : undefined;

    const body = {
      model: this.config.model,
      messages: request.messages.map(toWireMessage),
      tools,
      tool_choice: tools ? request.toolChoice : undefined,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
    };

    const controller = new AbortController();
    const timeoutMs = this.config.timeoutMs ?? 60_000;
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const forwardAbort = () => controller.abort();
    request.signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const response = await fetch(url, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorBody = await response.text();
        throw new Error(`OpenAI-compatible error ${response.status}: ${errorBody}`);
      }

      const raw = (await response.json()) as OpenAiResponse;
      const choice = raw.choices?.[0]?.message;
      if (!choice) {
        throw new Error("OpenAI-compatible response missing choices");
      }

      const toolCalls: ProviderToolCall[] | undefined = choice.tool_calls?.map((call) => ({
        id: call.id,
        name: call.function.name,
        args: parseToolArgs(call.function.arguments),
      }));

      return {
        message: {
          role: "assistant",
          content: choice.content ?? "",
          toolCalls,
        },
        toolCalls,
        usage: raw.usage
          ? {
              inputTokens: raw.usage.prompt_tokens,
              outputTokens: raw.usage.completion_tokens,
              totalTokens: raw.usage.total_tokens,
            }
          : undefined,
        raw,
      };
    } finally {
      clearTimeout(timeout);
      request.signal?.removeEventListener("abort", forwardAbort);
    }
  }
}
