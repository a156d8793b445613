import type { Transcriber } from "../ai/transcription";
import { describeError, err, ok, type Outcome } from "../errors";
import type { CapturedUtterance } from "./record-audio";
import { withRetry, withTempFile } from "./utils";
import { writeWavFile } from "./write-wav";

/**
 * Writes the captured phrase to a temporary WAV, transcribes it and deletes the file.
 * Resolves ok(null) when the service heard nothing intelligible.
 */
export async function transcribeUtterance(
    utterance: CapturedUtterance,
    transcribe: Transcriber,
    { maxAttempts = 2, signal }: { maxAttempts?: number; signal?: AbortSignal } = {}
): Promise<Outcome<string | null>> {
    try {
        return await withTempFile<Outcome<string | null>>("utterance", ".wav", async (audioFilePath) => {
            writeWavFile({ ...utterance, outputPath: audioFilePath });

            const startTime = Date.now();
            const text = await withRetry(() => transcribe(audioFilePath, signal), {
                maxAttempts,
                baseDelay: 500,
                context: "Transcription",
                shouldRetry: () => !signal?.aborted,
            });
            const processingTime = (Date.now() - startTime) / 1000;
            console.log(`Time to transcribe audio: ${processingTime.toFixed(2)} seconds`);

            if (!text) {
                console.log("No speech detected or transcription failed.");
                return ok(null);
            }
            console.log(`Transcribed audio: ${text}`);
            return ok(text);
        });
    } catch (error) {
        if (signal?.aborted) throw error;
        return err("transcription", describeError(error));
    }
}
