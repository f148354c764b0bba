import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { ModelClient, ModelToolCall, ModelTurn, ModelTurnRequest } from "../agent/turn-orchestrator.js";
import type { ChatTurn } from "../types.js";
import type { ProviderConfig, ProviderId } from "./config.js";
import { ProtocolViolationError } from "./errors.js";

/** Replies to every turn with a single `finish`. Used when no real provider is configured. */
export class MockModelClient implements ModelClient {
  readonly id = "mock";

  async requestTurn(): Promise<ModelTurn> {
    return {
      commentary: "Mock provider: no changes made. Configure OPENAI_API_KEY or OPENROUTER_API_KEY for generation.",
      toolCalls: [{ id: `call_${randomUUID()}`, name: "finish", arguments: { summary: "No changes (mock provider)." } }]
    };
  }
}

type ChatMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: OpenAIToolCall[] }
  | { role: "tool"; tool_call_id: string; content: string };

interface OpenAIToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z
            .array(
              z.object({
                id: z.string().min(1),
                type: z.literal("function").optional(),
                function: z.object({
                  name: z.string().min(1),
                  arguments: z.string().default("{}")
                })
              })
            )
            .optional()
        })
      })
    )
    .min(1)
});

const toolArgumentsSchema = z.record(z.string(), z.unknown());

/** Chat turns as OpenAI-style messages; tool-role turns become user messages. */
export function toChatMessages(systemPrompt: string, history: readonly ChatTurn[]): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: "system", content: systemPrompt }];

  for (const turn of history) {
    if (turn.role === "user" || turn.role === "tool") {
      messages.push({ role: "user", content: turn.commentary });
      continue;
    }

    messages.push({
      role: "assistant",
      content: turn.commentary || null,
      ...(turn.toolCalls.length
        ? {
            tool_calls: turn.toolCalls.map((call) => ({
              id: call.id,
              type: "function" as const,
              function: { name: call.name, arguments: JSON.stringify(call.arguments) }
            }))
          }
        : {})
    });

    for (const call of turn.toolCalls) {
      messages.push({
        role: "tool",
        tool_call_id: call.id,
        content: JSON.stringify(call.result)
      });
    }
  }

  return messages;
}

export function parseCompletion(payload: unknown): ModelTurn {
  const parsed = completionSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ProtocolViolationError(`Malformed completion payload: ${parsed.error.issues[0]?.message ?? "invalid"}.`);
  }

  const message = parsed.data.choices[0].message;
  const toolCalls: ModelToolCall[] = (message.tool_calls ?? []).map((call) => {
    let raw: unknown;
    try {
      raw = JSON.parse(call.function.arguments || "{}");
    } catch {
      throw new ProtocolViolationError(`Tool call '${call.function.name}' has arguments that are not valid JSON.`);
    }

    const args = toolArgumentsSchema.safeParse(raw);
    if (!args.success) {
      throw new ProtocolViolationError(`Tool call '${call.function.name}' arguments must be a JSON object.`);
    }

    return { id: call.id, name: call.function.name, arguments: args.data };
  });

  return { toolCalls, commentary: message.content ?? "" };
}

export class OpenAICompatibleModelClient implements ModelClient {
  readonly id: ProviderId;
  private readonly baseUrl: string;

  constructor(
    private readonly config: ProviderConfig,
    private readonly fetchImpl: typeof fetch = fetch
  ) {
    if (!config.apiKey) {
      throw new Error(`Provider '${config.id}' has no API key.`);
    }
    this.id = config.id;
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
  }

  async requestTurn(request: ModelTurnRequest): Promise<ModelTurn> {
    const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.config.apiKey ?? ""}`
      },
      body: JSON.stringify({
        model: this.config.model,
        temperature: 0.2,
        messages: toChatMessages(request.systemPrompt, request.history),
        tools: request.tools.map((tool) => ({
          type: "function",
          function: { name: tool.name, description: tool.description, parameters: tool.parameters }
        })),
        tool_choice: "auto"
      }),
      signal: request.signal
    });

    if (!response.ok) {
      const details = await response.text();
      throw new Error(`Provider request failed (${response.status}): ${details.slice(0, 2_000)}`);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new ProtocolViolationError("Provider returned a body that is not JSON.");
    }

    return parseCompletion(payload);
  }
}

export class ProviderRegistry {
  private readonly clients = new Map<ProviderId, ModelClient>();

  constructor(
    providers: ProviderConfig[],
    private readonly defaultProviderId: ProviderId,
    fetchImpl: typeof fetch = fetch
  ) {
    this.clients.set("mock", new MockModelClient());

    for (const provider of providers) {
      if (provider.id !== "mock") {
        this.clients.set(provider.id, new OpenAICompatibleModelClient(provider, fetchImpl));
      }
    }
  }

  list(): ProviderId[] {
    return Array.from(this.clients.keys());
  }

  get(providerId: ProviderId = this.defaultProviderId): ModelClient {
    const client = this.clients.get(providerId);
    if (!client) {
      throw new Error(`Provider '${providerId}' is not configured.`);
    }
    return client;
  }
}
