import type { AssistantsBackend, PersonaDefinition, RunStatus, ThreadMessage } from "../src/ai/types";
import type { VoiceChannel } from "../src/audio/voice-channel";
import type { Voice } from "../src/config";
import { ok, type Outcome } from "../src/errors";

type Heard = Outcome<string | null> | string | null;

/**
 * Voice channel that replays a fixed list of utterances and records everything said.
 * Once the script runs out it aborts `controller` so a loop under test always ends.
 */
export class ScriptedVoice implements VoiceChannel {
    readonly spoken: Array<{ text: string; voice: Voice }> = [];
    listens = 0;

    constructor(
        private readonly script: Heard[],
        private readonly controller?: AbortController
    ) {}

    async listen(): Promise<Outcome<string | null>> {
        this.listens++;
        if (this.script.length === 0) {
            this.controller?.abort();
            return ok(null);
        }
        const next = this.script.shift();
        if (next === undefined || next === null) return ok(null);
        return typeof next === "string" ? ok(next) : next;
    }

    async say(text: string, voice: Voice): Promise<void> {
        this.spoken.push({ text, voice });
    }

    get texts(): string[] {
        return this.spoken.map((entry) => entry.text);
    }
}

export class FakeAssistantsBackend implements AssistantsBackend {
    readonly calls: string[] = [];
    readonly messages: Array<{ threadId: string; content: string }> = [];
    readonly runInstructions: string[] = [];
    readonly cancelled: string[] = [];
    readonly personas: PersonaDefinition[] = [];

    statuses: RunStatus[] = ["queued", "in_progress", "completed"];
    latest: ThreadMessage | null = { role: "assistant", text: "Hello from the assistant" };
    failRetrieveAssistant = false;
    failCreateAssistant = false;
    failRetrieveThread = false;
    failCreateThread = false;
    failAddMessage = false;
    onGetRun?: () => void;

    private threads = 0;
    private runs = 0;

    async retrieveAssistant(assistantId: string) {
        this.calls.push(`retrieveAssistant:${assistantId}`);
        if (this.failRetrieveAssistant) throw new Error("No assistant found");
        return { id: assistantId };
    }

    async createAssistant(persona: PersonaDefinition) {
        this.calls.push("createAssistant");
        this.personas.push(persona);
        if (this.failCreateAssistant) throw new Error("quota exceeded");
        return { id: "asst_new" };
    }

    async retrieveThread(threadId: string) {
        this.calls.push(`retrieveThread:${threadId}`);
        if (this.failRetrieveThread) throw new Error("No thread found");
        return { id: threadId };
    }

    async createThread() {
        this.calls.push("createThread");
        if (this.failCreateThread) throw new Error("service unavailable");
        this.threads++;
        return { id: `thread_${this.threads}` };
    }

    async addUserMessage(threadId: string, content: string) {
        this.calls.push("addUserMessage");
        if (this.failAddMessage) throw new Error("connection reset");
        this.messages.push({ threadId, content });
    }

    async startRun(_threadId: string, _assistantId: string, instructions: string) {
        this.calls.push("startRun");
        this.runInstructions.push(instructions);
        this.runs++;
        return { id: `run_${this.runs}`, status: "queued" as const };
    }

    async getRun(_threadId: string, runId: string) {
        this.calls.push("getRun");
        this.onGetRun?.();
        const status = this.statuses.length > 1 ? this.statuses.shift() : this.statuses[0];
        return { id: runId, status: status ?? "completed" };
    }

    async cancelRun(_threadId: string, runId: string) {
        this.cancelled.push(runId);
    }

    async latestMessage() {
        this.calls.push("latestMessage");
        return this.latest;
    }
}
