import { PvRecorder } from "@picovoice/pvrecorder-node";
import { SpeechDetector } from "./speech-detector";

/** The parts of PvRecorder the capture loop relies on. */
export interface FrameSource {
    readonly sampleRate: number;
    start(): void;
    read(): Promise<Int16Array>;
    stop(): void;
    release(): void;
    getSelectedDevice(): string;
}

export type RecorderFactory = (frameLength: number, deviceIndex: number) => FrameSource;

export interface CapturedUtterance {
    frames: Int16Array[];
    sampleRate: number;
}

type CaptureParams = {
    timeoutSeconds: number;
    phraseTimeLimitSeconds: number;
    deviceIndex?: number;
    frameLength?: number;
    signal?: AbortSignal;
    createRecorder?: RecorderFactory;
};

const createPvRecorder: RecorderFactory = (frameLength, deviceIndex) => new PvRecorder(frameLength, deviceIndex);

/**
 * Records one phrase from the microphone with PicoVoice's PvRecorder.
 * Resolves null when nobody spoke before the timeout or the signal was aborted.
 */
export async function captureUtterance({
    timeoutSeconds,
    phraseTimeLimitSeconds,
    deviceIndex = -1,
    frameLength = 512,
    signal,
    createRecorder = createPvRecorder
}: CaptureParams): Promise<CapturedUtterance | null> {
    const recorder = createRecorder(frameLength, deviceIndex);
    const detector = new SpeechDetector({
        sampleRate: recorder.sampleRate,
        frameLength,
        timeoutSeconds,
        phraseTimeLimitSeconds,
    });

    try {
        console.log(`Using device: ${recorder.getSelectedDevice()}`);
        recorder.start();
        console.log("Listening for speech...");

        while (!detector.finished && !signal?.aborted) {
            const frame = await recorder.read();
            const before = detector.current;
            if (detector.push(frame) === "speaking" && before !== "speaking") {
                console.log("Speech detected.");
            }
        }

        recorder.stop();
    } finally {
        recorder.release();
    }

    if (signal?.aborted) return null;
    if (detector.current === "timeout") {
        console.log("No speech detected within the timeout period.");
        return null;
    }

    console.log("Processing...");
    return { frames: detector.frames(), sampleRate: recorder.sampleRate };
}
