import { beforeEach, describe, expect, it, vi } from "vitest";
import type { LlmResponse } from "../src/ai/types";
import { err } from "../src/errors";
import { CommandAgent, type CompleteFn } from "../src/interpreter/command-agent";
import type { CommandRunner } from "../src/interpreter/shell";
import { COMMAND_SESSION_ENDED, runCommandSession } from "../src/session/command-session";
import { ScriptedVoice } from "./fakes";

const ENTERING = "Entering command mode. Say 'Exit Interpreter' to end the session.";

function createAgent(reply = "Done.") {
    return { chat: vi.fn(async (_input: string) => reply), endSession: vi.fn() };
}

describe("runCommandSession", () => {
    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => {});
        vi.spyOn(console, "error").mockImplementation(() => {});
    });

    it("should announce itself and end on the exit phrase", async () => {
        const voice = new ScriptedVoice(["Exit Interpreter"]);
        const agent = createAgent();

        const result = await runCommandSession({ voice, agent, exitPhrase: "Exit Interpreter", speakerVoice: "onyx" });

        expect(result).toBe(COMMAND_SESSION_ENDED);
        expect(agent.chat).not.toHaveBeenCalled();
        expect(agent.endSession).toHaveBeenCalledTimes(1);
        expect(voice.spoken).toEqual([
            { text: ENTERING, voice: "onyx" },
            { text: "Exiting command mode.", voice: "onyx" },
        ]);
    });

    it("should forward each utterance to the agent and speak its answer", async () => {
        const voice = new ScriptedVoice(["what's in this folder", "exit interpreter."]);
        const agent = createAgent("Two files and a directory.");

        await runCommandSession({ voice, agent, exitPhrase: "Exit Interpreter", speakerVoice: "onyx" });

        expect(agent.chat).toHaveBeenCalledWith("what's in this folder");
        expect(voice.texts).toEqual([ENTERING, "Two files and a directory.", "Exiting command mode."]);
        expect(console.log).toHaveBeenCalledWith("Command agent:", "Two files and a directory.");
    });

    it("should keep listening when nothing was heard", async () => {
        const voice = new ScriptedVoice([null, "Exit Interpreter"]);
        const agent = createAgent();

        await runCommandSession({ voice, agent, exitPhrase: "Exit Interpreter", speakerVoice: "onyx" });

        expect(agent.chat).not.toHaveBeenCalled();
        expect(console.log).toHaveBeenCalledWith("No input detected. Waiting for your command in command mode.");
    });

    it("should ask again when listening fails", async () => {
        const voice = new ScriptedVoice([err("capture", "Microphone capture failed: device busy"), "Exit Interpreter"]);

        await runCommandSession({ voice, agent: createAgent(), exitPhrase: "Exit Interpreter", speakerVoice: "onyx" });

        expect(voice.texts).toEqual([ENTERING, "Sorry, I couldn't hear that. Please say it again.", "Exiting command mode."]);
    });

    it("should speak agent errors and stay in the session", async () => {
        const voice = new ScriptedVoice(["format the disk", "list files", "Exit Interpreter"]);
        const agent = {
            chat: vi
                .fn(async (_input: string) => "a.txt")
                .mockRejectedValueOnce(new Error("model unavailable")),
            endSession: vi.fn(),
        };

        await runCommandSession({ voice, agent, exitPhrase: "Exit Interpreter", speakerVoice: "onyx" });

        expect(voice.texts).toEqual([
            ENTERING,
            "Error in command agent: model unavailable",
            "a.txt",
            "Exiting command mode.",
        ]);
    });

    it("should stop when the signal is aborted", async () => {
        const controller = new AbortController();
        const voice = new ScriptedVoice([], controller);
        const agent = createAgent();

        const result = await runCommandSession({
            voice,
            agent,
            exitPhrase: "Exit Interpreter",
            speakerVoice: "onyx",
            signal: controller.signal,
        });

        expect(result).toBe(COMMAND_SESSION_ENDED);
        expect(voice.texts).toEqual([ENTERING]);
        expect(agent.chat).not.toHaveBeenCalled();
        expect(agent.endSession).toHaveBeenCalledTimes(1);
    });

    it("should not carry an unconfirmed command into the next session", async () => {
        const proposal: LlmResponse = {
            thoughts: null,
            reply: "",
            toolCalls: [{ id: "call_1", name: "run_shell_command", args: { command: "rm -rf ~/old" } }],
        };
        const complete = vi
            .fn<CompleteFn>(async () => ({ thoughts: null, reply: "There is nothing waiting to run.", toolCalls: [] }))
            .mockResolvedValueOnce(proposal);
        const runCommand = vi.fn<CommandRunner>(async () => ({ exitCode: 0, stdout: "", stderr: "", timedOut: false }));
        const agent = new CommandAgent({ complete, autoRun: false, runCommand, systemPrompt: "Run commands." });

        const first = new ScriptedVoice(["clean up", "Exit Interpreter"]);
        await runCommandSession({ voice: first, agent, exitPhrase: "Exit Interpreter", speakerVoice: "onyx" });
        const second = new ScriptedVoice(["yes", "Exit Interpreter"]);
        await runCommandSession({ voice: second, agent, exitPhrase: "Exit Interpreter", speakerVoice: "onyx" });

        expect(first.texts[1]).toBe("I would like to run: rm -rf ~/old. Say yes to run it.");
        expect(runCommand).not.toHaveBeenCalled();
        expect(second.texts[1]).toBe("There is nothing waiting to run.");
        expect(agent.history[3]).toEqual({
            role: "tool",
            content: "The user declined to run this command.",
            tool_call_id: "call_1",
            name: "run_shell_command",
        });
        expect(agent.history[4]).toEqual({ role: "user", content: "yes" });
    });
});
