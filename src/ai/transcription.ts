import { execFile } from "node:child_process";
import { createReadStream, existsSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { promisify } from "node:util";
import type OpenAI from "openai";
import { z } from "zod";
import { createServiceError } from "../errors";
import { removeFile } from "../audio/utils";

/** Turns a WAV file into text. An empty string means nothing intelligible was said. */
export type Transcriber = (audioFilePath: string, signal?: AbortSignal) => Promise<string>;

export function createOpenAITranscriber(client: OpenAI, model: string): Transcriber {
    return async (audioFilePath, signal) => {
        try {
            const transcription = await client.audio.transcriptions.create(
                { file: createReadStream(audioFilePath), model, response_format: "json" },
                { signal }
            );
            return transcription.text.trim();
        } catch (error) {
            if (signal?.aborted) throw error;
            throw createServiceError("Failed to transcribe audio", "OpenAI STT", error, "transcription");
        }
    };
}

const WhisperOutputSchema = z.object({
    text: z.string().default(""),
});

const execFileAsync = promisify(execFile);

/**
 * Runs the local `whisper` CLI and reads the JSON it writes next to the temp dir.
 */
export function createWhisperCliTranscriber({
    model,
    language,
    temperature = 0.3
}: {
    model: string;
    language: string;
    temperature?: number;
}): Transcriber {
    return async (audioFilePath, signal) => {
        const outputDir = tmpdir();
        const inputFileName = path.basename(audioFilePath, path.extname(audioFilePath));
        const outputJsonPath = path.join(outputDir, `${inputFileName}.json`);

        const whisperArgs = [
            audioFilePath,
            "--model", model,
            "--language", language,
            "--output_format", "json",
            "--output_dir", outputDir,
            "--temperature", String(temperature),
        ];

        try {
            await execFileAsync("whisper", whisperArgs, { timeout: 300_000, signal });
        } catch (error) {
            if (signal?.aborted) throw error;
            throw createServiceError("Failed to run Whisper", "Whisper STT", error, "transcription");
        }

        if (!existsSync(outputJsonPath)) {
            throw createServiceError("Whisper did not produce output", "Whisper STT", undefined, "transcription");
        }

        try {
            const output = WhisperOutputSchema.parse(JSON.parse(readFileSync(outputJsonPath, "utf8")));
            return output.text.trim();
        } catch (error) {
            throw createServiceError("Whisper wrote unreadable output", "Whisper STT", error, "transcription");
        } finally {
            removeFile(outputJsonPath);
        }
    };
}
