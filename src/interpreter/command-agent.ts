import { platform } from "node:os";
import type { AgentTool, ChatMessage, LlmResponse, ToolCall } from "../ai/types";
import { normalizePhrase } from "../session/phrases";
import { formatShellResult, runShellCommand, type CommandRunner } from "./shell";

export type CompleteFn = (messages: ChatMessage[], tools: AgentTool[]) => Promise<LlmResponse>;

export interface CommandAgentOptions {
    complete: CompleteFn;
    /** Run requested commands without asking the user first. */
    autoRun: boolean;
    runCommand?: CommandRunner;
    maxSteps?: number;
    /** Messages kept after the system prompt; older exchanges are dropped whole. */
    maxHistory?: number;
    systemPrompt?: string;
}

export const SHELL_TOOL: AgentTool = {
    type: "function",
    function: {
        name: "run_shell_command",
        description: "Run a shell command on the user's computer and return its exit code, stdout and stderr.",
        parameters: {
            type: "object",
            properties: {
                command: { type: "string", description: "The command line to execute." },
            },
            required: ["command"],
        },
    },
};

const AFFIRMATIVE = new Set(["yes", "yeah", "yep", "sure", "ok", "okay", "confirm", "run it", "do it", "go ahead", "yes please", "yes run it"]);

export function isAffirmative(text: string): boolean {
    return AFFIRMATIVE.has(normalizePhrase(text));
}

function defaultSystemPrompt() {
    return `You are a command-execution agent running on the user's ${platform()} computer, in ${process.cwd()}.
Requests reach you as transcribed speech. Carry them out with the run_shell_command tool, one step at a time, and check each result before going on.
Your replies are read aloud: answer in one or two plain sentences, without markdown or long listings.`;
}

/**
 * Stateful agent behind command mode. History accumulates across every call to chat().
 */
export class CommandAgent {
    private readonly messages: ChatMessage[];
    private readonly complete: CompleteFn;
    private readonly autoRun: boolean;
    private readonly runCommand: CommandRunner;
    private readonly maxSteps: number;
    private readonly maxHistory: number;
    private pending: ToolCall[] = [];

    constructor(options: CommandAgentOptions) {
        this.complete = options.complete;
        this.autoRun = options.autoRun;
        this.runCommand = options.runCommand ?? ((command) => runShellCommand(command));
        this.maxSteps = options.maxSteps ?? 6;
        this.maxHistory = Math.max(1, options.maxHistory ?? 40);
        this.messages = [{ role: "system", content: options.systemPrompt ?? defaultSystemPrompt() }];
    }

    get history(): readonly ChatMessage[] {
        return this.messages;
    }

    get awaitingConfirmation(): boolean {
        return this.pending.length > 0;
    }

    async chat(input: string): Promise<string> {
        if (this.pending.length) {
            const calls = this.pending;
            this.pending = [];
            if (isAffirmative(input)) {
                await this.executeAll(calls);
                return this.step();
            }
            for (const call of calls) {
                this.pushToolResult(call, "The user declined to run this command.");
            }
        }

        this.messages.push({ role: "user", content: input });
        this.trimHistory();
        return this.step();
    }

    /**
     * Declines whatever is still waiting for confirmation, so a later "yes" cannot run it.
     */
    endSession(): void {
        for (const call of this.pending) {
            this.pushToolResult(call, "The user declined to run this command.");
        }
        this.pending = [];
    }

    // Cuts only at a user message so every tool result keeps the assistant call it answers.
    private trimHistory() {
        let start = -1;
        for (let i = 1; i < this.messages.length; i++) {
            if (this.messages[i]?.role !== "user") continue;
            start = i;
            if (this.messages.length - i <= this.maxHistory) break;
        }
        if (start > 1) this.messages.splice(1, start - 1);
    }

    private async step(): Promise<string> {
        for (let i = 0; i < this.maxSteps; i++) {
            const response = await this.complete([...this.messages], [SHELL_TOOL]);
            this.messages.push(
                response.toolCalls.length
                    ? { role: "assistant", content: response.reply, tool_calls: response.toolCalls }
                    : { role: "assistant", content: response.reply }
            );

            if (!response.toolCalls.length) {
                return response.reply || "Done.";
            }

            if (!this.autoRun) {
                this.pending = response.toolCalls;
                return `I would like to run: ${response.toolCalls.map(describeCall).join(", then ")}. Say yes to run it.`;
            }

            await this.executeAll(response.toolCalls);
        }

        return "I stopped after too many steps. Tell me how you would like to continue.";
    }

    private async executeAll(calls: ToolCall[]) {
        for (const call of calls) {
            const command = commandOf(call);
            if (call.name !== SHELL_TOOL.function.name || command === null) {
                this.pushToolResult(call, `Unknown tool call: ${call.name}`);
                continue;
            }

            console.log(`Running command: ${command}`);
            const result = await this.runCommand(command);
            this.pushToolResult(call, formatShellResult(result));
        }
    }

    private pushToolResult(call: ToolCall, content: string) {
        this.messages.push({ role: "tool", content, tool_call_id: call.id, name: call.name });
    }
}

function commandOf(call: ToolCall): string | null {
    const command = call.args["command"];
    return typeof command === "string" && command.trim() ? command.trim() : null;
}

function describeCall(call: ToolCall): string {
    return commandOf(call) ?? call.name;
}
