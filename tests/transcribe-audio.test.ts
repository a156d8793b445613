import { existsSync } from "node:fs";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Transcriber } from "../src/ai/transcription";
import { transcribeUtterance } from "../src/audio/transcribe-audio";

const utterance = { frames: [new Int16Array(160).fill(500)], sampleRate: 16000 };

describe("transcribeUtterance", () => {
    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => {});
        vi.spyOn(console, "error").mockImplementation(() => {});
    });

    it("should transcribe a WAV written for the call and delete it afterwards", async () => {
        const seen: Array<{ path: string; existed: boolean }> = [];
        const transcribe: Transcriber = async (audioFilePath) => {
            seen.push({ path: audioFilePath, existed: existsSync(audioFilePath) });
            return "turn on the lights";
        };

        const result = await transcribeUtterance(utterance, transcribe);

        expect(result).toEqual({ ok: true, value: "turn on the lights" });
        expect(seen).toHaveLength(1);
        expect(seen[0]?.existed).toBe(true);
        expect(seen[0]?.path.endsWith(".wav")).toBe(true);
        expect(existsSync(seen[0]?.path ?? "")).toBe(false);
    });

    it("should report silence as no input", async () => {
        const result = await transcribeUtterance(utterance, async () => "");

        expect(result).toEqual({ ok: true, value: null });
        expect(console.log).toHaveBeenCalledWith("No speech detected or transcription failed.");
    });

    it("should turn a failing service into a transcription failure", async () => {
        const transcribe = vi.fn<Transcriber>(async () => {
            throw new Error("service unavailable");
        });

        const result = await transcribeUtterance(utterance, transcribe, { maxAttempts: 1 });

        expect(result).toEqual({ ok: false, kind: "transcription", detail: "service unavailable" });
        expect(transcribe).toHaveBeenCalledTimes(1);
    });

    it("should retry once before giving up", async () => {
        const transcribe = vi
            .fn<Transcriber>(async () => "hello")
            .mockRejectedValueOnce(new Error("connection reset"));

        const result = await transcribeUtterance(utterance, transcribe);

        expect(result).toEqual({ ok: true, value: "hello" });
        expect(transcribe).toHaveBeenCalledTimes(2);
    });
});
