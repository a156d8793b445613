import { randomUUID } from "node:crypto";
import type OpenAI from "openai";
import type { Message as OllamaMessage, Ollama } from "ollama";
import { z } from "zod";
import { createServiceError } from "../errors";
import type { AgentTool, ChatMessage, GenerateResult, LlmProvider, LlmResponse, ThinkingModel, ToolCall } from "./types";

export interface CompletionClients {
    openai?: OpenAI;
    ollama?: Ollama;
    lmStudioHost?: string;
}

export async function generateText(
    clients: CompletionClients,
    inputs: {
        provider: LlmProvider;
        model: string;
        promptOrMessages: string | ChatMessage[];
        thinking: ThinkingModel;
        tools: AgentTool[];
    }
): Promise<LlmResponse> {
    const messages: ChatMessage[] = typeof inputs.promptOrMessages === "string"
        ? [{ role: "user", content: inputs.promptOrMessages }]
        : inputs.promptOrMessages;
    if (messages.length === 0) {
        throw new Error("Either prompt or messages must be provided");
    }

    const result = await chatComplete(clients, inputs.provider, { model: inputs.model, messages, tools: inputs.tools });
    return parseLlmResponse({ ...result, provider: inputs.provider, model: inputs.model, thinking: inputs.thinking });
}

export function parseLlmResponse(response: GenerateResult): LlmResponse {
    /**
     * <think>
     * ...
     * </think>
     */
    const thoughts = response.text.match(/<think>(.*?)<\/think>/s);
    const reply = response.text.replace(/<think>.*?<\/think>/s, "").trim();
    if (thoughts && response.thinking?.isReasoningModel && response.thinking.logReasoning) {
        console.log("Reasoning process:", thoughts[1]);
    }

    return { thoughts: thoughts?.[1]?.trim() ?? null, reply, toolCalls: response.toolCalls };
}

type ChatArgs = { model: string; messages: ChatMessage[]; tools: AgentTool[] };
type ChatCompletion = { text: string; toolCalls: ToolCall[] };

function chatComplete(clients: CompletionClients, provider: LlmProvider, args: ChatArgs): Promise<ChatCompletion> {
    switch (provider) {
        case "openai":
            return openAIChatComplete(clients, args);
        case "ollama":
            return ollamaChatComplete(clients, args);
        case "lmstudio":
            return lmStudioChatComplete(clients, args);
    }
}

const ArgsSchema = z.record(z.unknown());

function parseToolArguments(raw: string | undefined): Record<string, unknown> {
    if (!raw) return {};
    try {
        const parsed = ArgsSchema.safeParse(JSON.parse(raw));
        return parsed.success ? parsed.data : {};
    } catch {
        return {};
    }
}

function toOpenAIMessages(messages: ChatMessage[]): OpenAI.Chat.Completions.ChatCompletionMessageParam[] {
    return messages.map((message): OpenAI.Chat.Completions.ChatCompletionMessageParam => {
        switch (message.role) {
            case "assistant":
                return message.tool_calls?.length
                    ? {
                        role: "assistant",
                        content: message.content,
                        tool_calls: message.tool_calls.map((call) => ({
                            id: call.id,
                            type: "function",
                            function: { name: call.name, arguments: JSON.stringify(call.args) },
                        })),
                    }
                    : { role: "assistant", content: message.content };
            case "tool":
                return { role: "tool", content: message.content, tool_call_id: message.tool_call_id };
            case "system":
                return { role: "system", content: message.content };
            case "user":
                return { role: "user", content: message.content };
        }
    });
}

async function openAIChatComplete(clients: CompletionClients, { model, messages, tools }: ChatArgs): Promise<ChatCompletion> {
    if (!clients.openai) throw new Error("OpenAI client not configured");
    const completion = await clients.openai.chat.completions.create({
        model,
        messages: toOpenAIMessages(messages),
        ...(tools.length ? { tools } : {}),
    });
    const message = completion.choices[0]?.message;
    const toolCalls: ToolCall[] = (message?.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        args: parseToolArguments(call.function.arguments),
    }));
    return { text: message?.content ?? "", toolCalls };
}

async function ollamaChatComplete(clients: CompletionClients, { model, messages, tools }: ChatArgs): Promise<ChatCompletion> {
    if (!clients.ollama) throw new Error("Ollama client not configured");
    const chatMessages: OllamaMessage[] = messages.map((message) =>
        message.role === "assistant" && message.tool_calls?.length
            ? {
                role: "assistant",
                content: message.content,
                tool_calls: message.tool_calls.map((call) => ({ function: { name: call.name, arguments: call.args } })),
            }
            : { role: message.role, content: message.content }
    );

    try {
        const res = await clients.ollama.chat({ model, tools, messages: chatMessages, stream: false });
        const toolCalls: ToolCall[] = (res.message.tool_calls ?? []).map((call) => ({
            id: `call_${randomUUID()}`,
            name: call.function.name,
            args: ArgsSchema.catch({}).parse(call.function.arguments),
        }));
        return { text: res.message.content ?? "", toolCalls };
    } catch (er) {
        throw createServiceError("Chat request failed", "Ollama", er);
    }
}

const LmStudioResponseSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({
                    content: z.string().nullable().optional(),
                    tool_calls: z
                        .array(
                            z.object({
                                id: z.string(),
                                function: z.object({ name: z.string(), arguments: z.string().optional() }),
                            })
                        )
                        .optional(),
                }),
            })
        )
        .default([]),
});

// Direct LM Studio caller (no SDK wrappers) to avoid schema mismatches
async function lmStudioChatComplete(clients: CompletionClients, { model, messages, tools }: ChatArgs): Promise<ChatCompletion> {
    if (!clients.lmStudioHost) throw new Error("LM Studio host not configured");
    const url = clients.lmStudioHost.replace(/\/$/, "") + "/v1/chat/completions";
    const res = await fetch(url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ model, messages: toOpenAIMessages(messages), tools: tools.length ? tools : undefined }),
    });
    const json: unknown = await res.json();
    if (!res.ok) {
        throw createServiceError(`Request failed with ${res.status} ${res.statusText}`, "LM Studio", JSON.stringify(json));
    }

    const parsed = LmStudioResponseSchema.parse(json);
    const message = parsed.choices[0]?.message;
    const toolCalls: ToolCall[] = (message?.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        args: parseToolArguments(call.function.arguments),
    }));
    return { text: message?.content ?? "", toolCalls };
}
