import type { AssistantToolDeclaration } from "../config";

export type LlmProvider = "openai" | "ollama" | "lmstudio";

export type ToolCall = { id: string; name: string; args: Record<string, unknown> };

export type ChatMessage =
    | { role: "system" | "user"; content: string }
    | { role: "assistant"; content: string; tool_calls?: ToolCall[] }
    | { role: "tool"; content: string; tool_call_id: string; name: string };

export type ThinkingModel = {
    isReasoningModel?: boolean;
    logReasoning: boolean;
};

export type ParameterDefinition = {
    type: "string" | "number" | "boolean";
    description: string;
    enum?: string[];
};

export type AgentTool = {
    type: "function";
    function: {
        name: string;
        description: string;
        parameters: {
            type: "object";
            properties: Record<string, ParameterDefinition>;
            required: string[];
        };
    };
};

export interface GenerateResult {
    provider: LlmProvider;
    model: string;
    text: string;
    thinking?: ThinkingModel;
    toolCalls: ToolCall[];
}

export interface LlmResponse {
    thoughts: string | null;
    reply: string;
    toolCalls: ToolCall[];
}

export type RunStatus =
    | "queued"
    | "in_progress"
    | "requires_action"
    | "cancelling"
    | "cancelled"
    | "failed"
    | "completed"
    | "incomplete"
    | "expired";

export interface PersonaDefinition {
    name: string;
    instructions: string;
    model: string;
    tools: AssistantToolDeclaration[];
}

export interface ThreadMessage {
    role: "user" | "assistant";
    text: string;
}

/**
 * The slice of the remote assistants service the conversation session needs.
 */
export interface AssistantsBackend {
    retrieveAssistant(assistantId: string, signal?: AbortSignal): Promise<{ id: string }>;
    createAssistant(persona: PersonaDefinition, signal?: AbortSignal): Promise<{ id: string }>;
    retrieveThread(threadId: string, signal?: AbortSignal): Promise<{ id: string }>;
    createThread(signal?: AbortSignal): Promise<{ id: string }>;
    addUserMessage(threadId: string, content: string, signal?: AbortSignal): Promise<void>;
    startRun(threadId: string, assistantId: string, instructions: string, signal?: AbortSignal): Promise<{ id: string; status: RunStatus }>;
    getRun(threadId: string, runId: string, signal?: AbortSignal): Promise<{ id: string; status: RunStatus }>;
    cancelRun(threadId: string, runId: string): Promise<void>;
    latestMessage(threadId: string, signal?: AbortSignal): Promise<ThreadMessage | null>;
}
