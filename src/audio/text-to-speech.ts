import { writeFile } from "node:fs/promises";
import type OpenAI from "openai";
import type { Voice } from "../config";
import { createServiceError } from "../errors";
import { playAudio } from "./play-audio";
import { withRetry, withTempFile } from "./utils";

export type SpeechSynthesizer = (text: string, voice: Voice) => Promise<Buffer>;
export type AudioPlayer = (filePath: string) => Promise<void>;

/**
 * Synthesizer backed by the OpenAI speech endpoint; returns MP3 bytes.
 */
export function createOpenAISynthesizer(client: OpenAI, model: string): SpeechSynthesizer {
    return async (text, voice) => {
        try {
            const response = await client.audio.speech.create({
                model,
                voice,
                input: text,
                response_format: "mp3",
            });
            return Buffer.from(await response.arrayBuffer());
        } catch (error) {
            throw createServiceError("Speech synthesis failed", "OpenAI TTS", error, "synthesis");
        }
    };
}

/**
 * Synthesizes `text`, plays it, and removes the temporary MP3 afterwards.
 */
export async function textToSpeech({
    text,
    voice,
    synthesize,
    play = playAudio
}: {
    text: string;
    voice: Voice;
    synthesize: SpeechSynthesizer;
    play?: AudioPlayer;
}): Promise<void> {
    const audioBuffer = await synthesize(text, voice);

    await withTempFile("speech", ".mp3", async (filePath) => {
        await writeFile(filePath, audioBuffer);
        await withRetry(() => play(filePath), {
            baseDelay: 500,
            exponentialBackoff: true,
            maxAttempts: 3,
            context: `Playing audio from ${filePath}`
        });
    });
}
