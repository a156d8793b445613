import { setTimeout as sleep } from "node:timers/promises";
import { describeError, err, isAbortError, ok, type Outcome } from "../errors";
import type { AssistantsBackend, PersonaDefinition, RunStatus } from "./types";

export interface SessionState {
    assistantId: string | null;
    threadId: string | null;
}

export interface ConversationSessionOptions {
    persona: PersonaDefinition;
    /** Previously created assistant to reuse, when it can still be retrieved. */
    configuredAssistantId?: string | null;
    userName: string;
    /** Phrase that switches the orchestrator into command mode; mentioned in the run instructions. */
    commandTrigger: string;
    pollIntervalMs: number;
    runTimeoutMs: number;
    state?: SessionState;
    /** Fired when a cached thread could not be retrieved and a fresh one replaced it. */
    onThreadReplaced?: (previousThreadId: string, threadId: string) => void;
}

const FAILED_RUN_STATUSES: ReadonlySet<RunStatus> = new Set(["failed", "cancelled", "expired", "incomplete", "requires_action"]);

export class ConversationSession {
    readonly state: SessionState;

    constructor(
        private readonly backend: AssistantsBackend,
        private readonly options: ConversationSessionOptions
    ) {
        this.state = options.state ?? { assistantId: null, threadId: null };
    }

    async ensureAssistant(signal?: AbortSignal): Promise<Outcome<string>> {
        if (this.state.assistantId) return ok(this.state.assistantId);

        const { configuredAssistantId, persona } = this.options;
        if (configuredAssistantId) {
            try {
                const assistant = await this.backend.retrieveAssistant(configuredAssistantId, signal);
                console.log(`Using existing assistant with ID: ${assistant.id}`);
                this.state.assistantId = assistant.id;
                return ok(assistant.id);
            } catch (error) {
                if (signal?.aborted) throw error;
                console.error(`Error retrieving assistant: ${describeError(error)}`);
            }
        }

        try {
            const assistant = await this.backend.createAssistant(persona, signal);
            console.log(`New assistant created with ID: ${assistant.id}`);
            this.state.assistantId = assistant.id;
            return ok(assistant.id);
        } catch (error) {
            if (signal?.aborted) throw error;
            console.error(`Error creating assistant: ${describeError(error)}`);
            return err("initialization", describeError(error));
        }
    }

    /**
     * Returns the cached thread when it still exists, otherwise a new one.
     * Null means no thread could be created for this turn.
     */
    async ensureThread(signal?: AbortSignal): Promise<string | null> {
        const previous = this.state.threadId;
        if (previous) {
            try {
                await this.backend.retrieveThread(previous, signal);
                return previous;
            } catch (error) {
                if (signal?.aborted) throw error;
                console.error(`Error retrieving thread: ${describeError(error)}`);
            }
        }

        try {
            const thread = await this.backend.createThread(signal);
            this.state.threadId = thread.id;
            console.log(`New thread created with ID: ${thread.id}`);
            if (previous) this.options.onThreadReplaced?.(previous, thread.id);
            return thread.id;
        } catch (error) {
            if (signal?.aborted) throw error;
            console.error(`Error creating thread: ${describeError(error)}`);
            this.state.threadId = null;
            return null;
        }
    }

    async submitAndAwait(threadId: string, assistantId: string, query: string, signal?: AbortSignal): Promise<Outcome<string>> {
        const { userName, commandTrigger, pollIntervalMs, runTimeoutMs } = this.options;

        try {
            await this.backend.addUserMessage(threadId, query, signal);

            const instructions = `Remember to address the user as ${userName} and maintain your friendly, supportive demeanor.
If the user wants to start a command session on their computer, inform them to say '${commandTrigger}'.`;
            const run = await this.backend.startRun(threadId, assistantId, instructions, signal);

            const deadline = Date.now() + runTimeoutMs;
            for (;;) {
                const { status } = await this.backend.getRun(threadId, run.id, signal);
                if (status === "completed") break;
                if (FAILED_RUN_STATUSES.has(status)) {
                    return err("run", `Run failed with status: ${status}`);
                }
                if (Date.now() >= deadline) {
                    await this.cancelQuietly(threadId, run.id);
                    return err("timeout", `Run timed out after ${Math.round(runTimeoutMs / 1000)} seconds`);
                }
                await sleep(pollIntervalMs, undefined, { signal });
            }

            const latest = await this.backend.latestMessage(threadId, signal);
            if (latest && latest.role === "assistant") {
                return ok(latest.text);
            }
            return ok(`I'm sorry, ${userName}, I didn't receive a response. How else can I assist you?`);
        } catch (error) {
            if (signal?.aborted || isAbortError(error)) throw error;
            console.error(`Error in submitAndAwait: ${describeError(error)}`);
            return err("remote", describeError(error));
        }
    }

    /**
     * Sends one transcribed query through the thread and always resolves to something speakable.
     */
    async reply(query: string, signal?: AbortSignal): Promise<string> {
        const { userName } = this.options;
        const assistantId = this.state.assistantId;
        if (!assistantId) {
            return "The assistant is not initialized. Cannot process the request.";
        }

        const threadId = await this.ensureThread(signal);
        if (!threadId) {
            return "Failed to create or retrieve a thread. Cannot process the request.";
        }

        const outcome = await this.submitAndAwait(threadId, assistantId, query, signal);
        if (outcome.ok) return outcome.value;
        if (outcome.kind === "run" || outcome.kind === "timeout") return outcome.detail;
        return `I'm sorry, ${userName}, I encountered an error while processing your request. How can I help you differently?`;
    }

    private async cancelQuietly(threadId: string, runId: string) {
        try {
            await this.backend.cancelRun(threadId, runId);
        } catch (error) {
            console.error(`Failed to cancel run ${runId}: ${describeError(error)}`);
        }
    }
}
