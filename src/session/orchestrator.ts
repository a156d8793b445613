import { setTimeout as sleep } from "node:timers/promises";
import type { VoiceChannel } from "../audio/voice-channel";
import type { Voice } from "../config";
import { describeError, isAbortError, type Outcome } from "../errors";
import { runCommandSession, type CommandChat } from "./command-session";
import { classifyUtterance, type Mode, type TriggerPhrases } from "./phrases";

export interface Conversation {
    ensureAssistant(signal?: AbortSignal): Promise<Outcome<string>>;
    reply(query: string, signal?: AbortSignal): Promise<string>;
}

export interface VoiceAssistantOptions {
    userName: string;
    assistantName: string;
    model: string;
    phrases: TriggerPhrases & { commandExit: string };
    assistantVoice: Voice;
    commandVoice: Voice;
    turnPauseMs: number;
}

export type ShutdownReason = "exit" | "interrupt" | "initialization-failed";

type ModeHandler = (utterance: string, signal: AbortSignal) => Promise<string>;

/**
 * Top-level turn-taking loop: listen, classify, dispatch to the active mode, speak.
 */
export class VoiceAssistant {
    private mode: Mode = "conversation";
    private readonly handlers: Record<Mode, ModeHandler>;

    constructor(
        private readonly voice: VoiceChannel,
        private readonly conversation: Conversation,
        private readonly commandAgent: CommandChat,
        private readonly options: VoiceAssistantOptions
    ) {
        this.handlers = {
            "conversation": (utterance, signal) => this.conversation.reply(utterance, signal),
            "command-execution": (_utterance, signal) =>
                runCommandSession({
                    voice: this.voice,
                    agent: this.commandAgent,
                    exitPhrase: this.options.phrases.commandExit,
                    speakerVoice: this.options.commandVoice,
                    signal,
                }),
        };
    }

    get currentMode(): Mode {
        return this.mode;
    }

    async run(signal: AbortSignal): Promise<ShutdownReason> {
        const { userName, assistantName, model } = this.options;

        console.log(`Initializing ${assistantName}, ${userName}'s personal AI companion...`);
        console.log(`Using model: ${model}`);

        try {
            const assistant = await this.conversation.ensureAssistant(signal);
            if (!assistant.ok) {
                console.error("Failed to initialize assistant. Exiting.");
                return "initialization-failed";
            }
            await this.respond(`Hey ${userName}! What's up!`);

            while (!signal.aborted) {
                try {
                    const done = await this.turn(signal);
                    if (done) return "exit";
                } catch (error) {
                    if (signal.aborted || isAbortError(error)) break;
                    const detail = describeError(error);
                    console.error(`An error occurred: ${detail}. ${assistantName} is ready to assist with something else.`);
                    await this.voice.say(`An error occurred: ${detail}. I'm ready to assist with something else.`, this.options.assistantVoice);
                    await this.pause(signal);
                } finally {
                    this.mode = "conversation";
                }
            }
        } catch (error) {
            if (!signal.aborted && !isAbortError(error)) throw error;
        }

        console.log(`\nThank you for chatting with ${assistantName}. Goodbye, ${userName}!`);
        await this.voice.say(`Thank you for chatting with me. Goodbye, ${userName}!`, this.options.assistantVoice);
        return "interrupt";
    }

    /**
     * One listen/dispatch/speak cycle. Resolves true when the user asked to leave.
     */
    private async turn(signal: AbortSignal): Promise<boolean> {
        const { userName, phrases, assistantName } = this.options;

        const heard = await this.voice.listen(signal);
        if (!heard.ok) {
            console.error(`Listening failed: ${heard.detail}`);
            await this.voice.say(`Sorry ${userName}, I couldn't make that out. Could you say it again?`, this.options.assistantVoice);
            await this.pause(signal);
            return false;
        }
        if (heard.value === null) {
            console.log("No input detected. Waiting for your command.");
            return false;
        }

        const utterance = heard.value;
        const intent = classifyUtterance(utterance, phrases);
        if (intent.kind === "exit") {
            await this.respond(`Goodbye, ${userName}! Have a great day.`);
            return true;
        }

        console.log(`${userName}: ${utterance}`);

        this.mode = intent.mode;
        const reply = await this.handlers[intent.mode](intent.text, signal);
        if (signal.aborted) return false;

        console.log(`${assistantName}: ${reply}`);
        await this.voice.say(reply, this.options.assistantVoice);
        await this.pause(signal);
        return false;
    }

    /** Gives the speaker time to finish before the microphone opens again. */
    private async pause(signal: AbortSignal) {
        await sleep(this.options.turnPauseMs, undefined, { signal });
    }

    private async respond(text: string) {
        console.log(`${this.options.assistantName}: ${text}`);
        await this.voice.say(text, this.options.assistantVoice);
    }
}
