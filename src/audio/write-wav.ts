import { writeFileSync } from "node:fs";
import { WaveFile } from "wavefile";

/**
 * Joins recorder frames into one mono 16-bit PCM WAV buffer.
 */
export function encodeWav({
    frames,
    sampleRate
}: {
    frames: Int16Array[];
    sampleRate: number;
}): Buffer {
    const totalSamples = frames.reduce((total, frame) => total + frame.length, 0);
    const audioData = new Int16Array(totalSamples);

    let offset = 0;
    for (const frame of frames) {
        audioData.set(frame, offset);
        offset += frame.length;
    }

    const wav = new WaveFile();
    wav.fromScratch(1, sampleRate, "16", audioData);

    return Buffer.from(wav.toBuffer());
}

export function writeWavFile({
    frames,
    sampleRate,
    outputPath
}: {
    frames: Int16Array[];
    sampleRate: number;
    outputPath: string;
}) {
    writeFileSync(outputPath, encodeWav({ frames, sampleRate }));
    return outputPath;
}
