export type DetectorState = "calibrating" | "waiting" | "speaking" | "complete" | "timeout";

export interface SpeechDetectorOptions {
    sampleRate: number;
    frameLength: number;
    /** Seconds to wait for speech to start before giving up. */
    timeoutSeconds: number;
    /** Longest phrase to record once speech has started. */
    phraseTimeLimitSeconds: number;
    /** Seconds of silence that end a phrase. */
    pauseThresholdSeconds?: number;
    /** Audio kept from before the speech onset. */
    preRollSeconds?: number;
    /** Ambient noise sampled at the start to set the energy threshold. */
    calibrationSeconds?: number;
    energyRatio?: number;
    minEnergyThreshold?: number;
}

export function frameEnergy(frame: Int16Array): number {
    if (frame.length === 0) return 0;
    let sum = 0;
    for (const sample of frame) sum += sample * sample;
    return Math.sqrt(sum / frame.length);
}

/**
 * Energy-based end-of-speech detector fed one recorder frame at a time.
 *
 * Starts by sampling ambient noise to pick its threshold, then waits for a frame
 * above it. Once speech starts, the phrase ends after a run of quiet frames or when
 * the phrase limit is reached.
 */
export class SpeechDetector {
    private state: DetectorState = "calibrating";
    private threshold = 0;
    private calibrationEnergy = 0;
    private calibrated = 0;
    private waited = 0;
    private silent = 0;
    private spoken = 0;
    private readonly preRoll: Int16Array[] = [];
    private readonly phrase: Int16Array[] = [];

    private readonly calibrationFrames: number;
    private readonly timeoutFrames: number;
    private readonly phraseLimitFrames: number;
    private readonly pauseFrames: number;
    private readonly preRollFrames: number;
    private readonly energyRatio: number;
    private readonly minEnergyThreshold: number;

    constructor(options: SpeechDetectorOptions) {
        const toFrames = (seconds: number) => Math.ceil((seconds * options.sampleRate) / options.frameLength);
        this.calibrationFrames = toFrames(options.calibrationSeconds ?? 0.5);
        this.timeoutFrames = toFrames(options.timeoutSeconds);
        this.phraseLimitFrames = toFrames(options.phraseTimeLimitSeconds);
        this.pauseFrames = Math.max(1, toFrames(options.pauseThresholdSeconds ?? 0.8));
        this.preRollFrames = toFrames(options.preRollSeconds ?? 0.5);
        this.energyRatio = options.energyRatio ?? 1.5;
        this.minEnergyThreshold = options.minEnergyThreshold ?? 300;
        if (this.calibrationFrames === 0) {
            this.threshold = this.minEnergyThreshold;
            this.state = "waiting";
        }
    }

    get current(): DetectorState {
        return this.state;
    }

    get finished(): boolean {
        return this.state === "complete" || this.state === "timeout";
    }

    get energyThreshold(): number {
        return this.threshold;
    }

    push(frame: Int16Array): DetectorState {
        const energy = frameEnergy(frame);

        switch (this.state) {
            case "calibrating":
                this.calibrationEnergy += energy;
                this.calibrated++;
                if (this.calibrated >= this.calibrationFrames) {
                    const ambient = this.calibrationEnergy / this.calibrated;
                    this.threshold = Math.max(this.minEnergyThreshold, ambient * this.energyRatio);
                    this.state = "waiting";
                }
                break;

            case "waiting":
                if (energy > this.threshold) {
                    this.phrase.push(...this.preRoll, frame);
                    this.preRoll.length = 0;
                    this.spoken = 1;
                    this.state = "speaking";
                    break;
                }
                this.waited++;
                this.preRoll.push(frame);
                if (this.preRoll.length > this.preRollFrames) this.preRoll.shift();
                if (this.waited >= this.timeoutFrames) this.state = "timeout";
                break;

            case "speaking":
                this.phrase.push(frame);
                this.spoken++;
                this.silent = energy > this.threshold ? 0 : this.silent + 1;
                if (this.silent >= this.pauseFrames || this.spoken >= this.phraseLimitFrames) {
                    this.state = "complete";
                }
                break;

            default:
                break;
        }

        return this.state;
    }

    /**
     * Frames of the detected phrase, pre-roll included. Empty unless speech was heard.
     */
    frames(): Int16Array[] {
        return this.state === "timeout" ? [] : [...this.phrase];
    }
}
