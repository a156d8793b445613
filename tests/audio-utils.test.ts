import { existsSync, writeFileSync } from "node:fs";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { findExec, getPlatformAudioPlayers, getPlayerArgs } from "../src/audio/audio-player-utils";
import { withRetry, withTempFile } from "../src/audio/utils";
import { encodeWav } from "../src/audio/write-wav";

describe("withRetry", () => {
    beforeEach(() => {
        vi.spyOn(console, "error").mockImplementation(() => {});
    });

    it("should retry until the operation succeeds", async () => {
        const operation = vi
            .fn(async () => "played")
            .mockRejectedValueOnce(new Error("busy"))
            .mockRejectedValueOnce(new Error("busy"));

        const result = await withRetry(operation, { maxAttempts: 3, baseDelay: 0 });

        expect(result).toBe("played");
        expect(operation).toHaveBeenCalledTimes(3);
    });

    it("should rethrow the last error once attempts run out", async () => {
        const operation = vi
            .fn(async (): Promise<string> => {
                throw new Error("second");
            })
            .mockRejectedValueOnce(new Error("first"));

        await expect(withRetry(operation, { maxAttempts: 2, baseDelay: 0 })).rejects.toThrow("second");
        expect(console.error).toHaveBeenCalledWith("Error occurred during operation (attempt 1):", "first");
    });

    it("should stop early when the error is not worth retrying", async () => {
        const operation = vi.fn(async (): Promise<string> => {
            throw new Error("bad request");
        });

        await expect(
            withRetry(operation, { maxAttempts: 5, baseDelay: 0, shouldRetry: () => false })
        ).rejects.toThrow("bad request");
        expect(operation).toHaveBeenCalledTimes(1);
    });
});

describe("withTempFile", () => {
    it("should remove the file after use", async () => {
        let used = "";
        await withTempFile("speech", ".mp3", async (filePath) => {
            used = filePath;
            writeFileSync(filePath, "audio");
        });

        expect(used).toMatch(/speech_.*\.mp3$/);
        expect(existsSync(used)).toBe(false);
    });

    it("should remove the file when use throws", async () => {
        let used = "";
        await expect(
            withTempFile("speech", ".mp3", async (filePath) => {
                used = filePath;
                writeFileSync(filePath, "audio");
                throw new Error("playback failed");
            })
        ).rejects.toThrow("playback failed");

        expect(existsSync(used)).toBe(false);
    });
});

describe("encodeWav", () => {
    it("should write a mono 16-bit PCM header and the joined samples", () => {
        const wav = encodeWav({ frames: [Int16Array.from([1, 2]), Int16Array.from([3])], sampleRate: 16000 });

        expect(wav.toString("ascii", 0, 4)).toBe("RIFF");
        expect(wav.toString("ascii", 8, 12)).toBe("WAVE");
        expect(wav.readUInt16LE(22)).toBe(1);
        expect(wav.readUInt32LE(24)).toBe(16000);
        expect(wav.readUInt16LE(34)).toBe(16);
        expect(wav.readUInt32LE(40)).toBe(6);
        expect([wav.readInt16LE(44), wav.readInt16LE(46), wav.readInt16LE(48)]).toEqual([1, 2, 3]);
    });
});

describe("audio players", () => {
    it("should prefer afplay on macOS", () => {
        expect(getPlatformAudioPlayers("darwin")[0]).toBe("afplay");
    });

    it("should fall back to the generic list on Linux", () => {
        expect(getPlatformAudioPlayers("linux")).toEqual(["ffplay", "mpg123", "mpg321", "mplayer", "cvlc", "play"]);
    });

    it.each([
        ["ffplay", ["-nodisp", "-autoexit", "-loglevel", "quiet", "a.mp3"]],
        ["mpg123", ["-q", "a.mp3"]],
        ["mplayer", ["-really-quiet", "a.mp3"]],
        ["cvlc", ["--play-and-exit", "--quiet", "a.mp3"]],
        ["afplay", ["a.mp3"]],
    ])("should build %s arguments", (player, args) => {
        expect(getPlayerArgs(player, "a.mp3")).toEqual(args);
    });

    it("should pick the first available player", () => {
        expect(findExec(["ffplay", "mpg123", "mplayer"], (command) => command !== "ffplay")).toBe("mpg123");
    });

    it("should return null when nothing is installed", () => {
        expect(findExec(["ffplay"], () => false)).toBeNull();
    });

    it("should reject an empty list", () => {
        expect(() => findExec([])).toThrow("Commands must be a non-empty array.");
    });
});
