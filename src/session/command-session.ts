import type { VoiceChannel } from "../audio/voice-channel";
import type { Voice } from "../config";
import { describeError } from "../errors";
import { matchesPhrase } from "./phrases";

export interface CommandChat {
    chat(input: string): Promise<string>;
    /** Called when the session ends, by exit phrase or interrupt. */
    endSession(): void;
}

export interface CommandSessionOptions {
    voice: VoiceChannel;
    agent: CommandChat;
    exitPhrase: string;
    speakerVoice: Voice;
    signal?: AbortSignal;
}

export const COMMAND_SESSION_ENDED = "Command session ended.";

/**
 * Forwards every utterance to the command agent until the exit phrase is heard.
 * Returns the message the orchestrator speaks when control comes back to it.
 */
export async function runCommandSession({ voice, agent, exitPhrase, speakerVoice, signal }: CommandSessionOptions): Promise<string> {
    console.log(`Starting command session. Say '${exitPhrase}' to end the session.`);
    await voice.say(`Entering command mode. Say '${exitPhrase}' to end the session.`, speakerVoice);

    try {
        while (!signal?.aborted) {
            const heard = await voice.listen(signal);
            if (!heard.ok) {
                console.error(`Listening failed in command mode: ${heard.detail}`);
                await voice.say("Sorry, I couldn't hear that. Please say it again.", speakerVoice);
                continue;
            }
            if (heard.value === null) {
                console.log("No input detected. Waiting for your command in command mode.");
                continue;
            }

            const command = heard.value;
            if (matchesPhrase(command, exitPhrase)) {
                await voice.say("Exiting command mode.", speakerVoice);
                return COMMAND_SESSION_ENDED;
            }

            try {
                const response = await agent.chat(command);
                console.log("Command agent:", response);
                await voice.say(response, speakerVoice);
            } catch (error) {
                if (signal?.aborted) break;
                const message = `Error in command agent: ${describeError(error)}`;
                console.error(message);
                await voice.say(message, speakerVoice);
            }
        }
    } finally {
        agent.endSession();
    }

    return COMMAND_SESSION_ENDED;
}
