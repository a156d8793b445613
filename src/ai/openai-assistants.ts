import type OpenAI from "openai";
import type { AssistantsBackend, PersonaDefinition, ThreadMessage } from "./types";

/**
 * AssistantsBackend over the OpenAI Assistants (beta) endpoints.
 */
export class OpenAIAssistantsBackend implements AssistantsBackend {
    constructor(private readonly client: OpenAI) {}

    async retrieveAssistant(assistantId: string, signal?: AbortSignal) {
        const assistant = await this.client.beta.assistants.retrieve(assistantId, { signal });
        return { id: assistant.id };
    }

    async createAssistant(persona: PersonaDefinition, signal?: AbortSignal) {
        const assistant = await this.client.beta.assistants.create(
            {
                name: persona.name,
                instructions: persona.instructions,
                model: persona.model,
                tools: persona.tools,
            },
            { signal }
        );
        return { id: assistant.id };
    }

    async retrieveThread(threadId: string, signal?: AbortSignal) {
        const thread = await this.client.beta.threads.retrieve(threadId, { signal });
        return { id: thread.id };
    }

    async createThread(signal?: AbortSignal) {
        const thread = await this.client.beta.threads.create({}, { signal });
        return { id: thread.id };
    }

    async addUserMessage(threadId: string, content: string, signal?: AbortSignal) {
        await this.client.beta.threads.messages.create(threadId, { role: "user", content }, { signal });
    }

    async startRun(threadId: string, assistantId: string, instructions: string, signal?: AbortSignal) {
        const run = await this.client.beta.threads.runs.create(threadId, { assistant_id: assistantId, instructions }, { signal });
        return { id: run.id, status: run.status };
    }

    async getRun(threadId: string, runId: string, signal?: AbortSignal) {
        const run = await this.client.beta.threads.runs.retrieve(threadId, runId, { signal });
        return { id: run.id, status: run.status };
    }

    async cancelRun(threadId: string, runId: string) {
        await this.client.beta.threads.runs.cancel(threadId, runId);
    }

    async latestMessage(threadId: string, signal?: AbortSignal): Promise<ThreadMessage | null> {
        const page = await this.client.beta.threads.messages.list(threadId, { order: "desc", limit: 1 }, { signal });
        const latest = page.data[0];
        if (!latest) return null;

        const text = latest.content
            .map((block) => (block.type === "text" ? block.text.value : ""))
            .filter(Boolean)
            .join("\n");

        return { role: latest.role, text };
    }
}
