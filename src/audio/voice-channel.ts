import type { Transcriber } from "../ai/transcription";
import type { Voice } from "../config";
import { describeError, err, ok, type Outcome } from "../errors";
import { captureUtterance, type CapturedUtterance, type RecorderFactory } from "./record-audio";
import { textToSpeech, type AudioPlayer, type SpeechSynthesizer } from "./text-to-speech";
import { transcribeUtterance } from "./transcribe-audio";

/**
 * Spoken input and output as the session loops see them.
 */
export interface VoiceChannel {
    /** ok(null) when no speech was heard or nothing could be recognized. */
    listen(signal?: AbortSignal): Promise<Outcome<string | null>>;
    /** Never rejects: playback problems are logged and the session carries on. */
    say(text: string, voice: Voice): Promise<void>;
}

export interface MicrophoneVoiceChannelOptions {
    timeoutSeconds: number;
    phraseTimeLimitSeconds: number;
    deviceIndex: number;
    transcribe: Transcriber;
    synthesize: SpeechSynthesizer;
    play?: AudioPlayer;
    createRecorder?: RecorderFactory;
}

export class MicrophoneVoiceChannel implements VoiceChannel {
    constructor(private readonly options: MicrophoneVoiceChannelOptions) {}

    async listen(signal?: AbortSignal): Promise<Outcome<string | null>> {
        let utterance: CapturedUtterance | null;
        try {
            utterance = await captureUtterance({
                timeoutSeconds: this.options.timeoutSeconds,
                phraseTimeLimitSeconds: this.options.phraseTimeLimitSeconds,
                deviceIndex: this.options.deviceIndex,
                createRecorder: this.options.createRecorder,
                signal,
            });
        } catch (error) {
            return err("capture", `Microphone capture failed: ${describeError(error)}`);
        }

        if (!utterance) return ok(null);
        return transcribeUtterance(utterance, this.options.transcribe, { signal });
    }

    async say(text: string, voice: Voice): Promise<void> {
        try {
            await textToSpeech({
                text,
                voice,
                synthesize: this.options.synthesize,
                play: this.options.play,
            });
        } catch (error) {
            console.error(`Error in say: ${describeError(error)}`);
        }
    }
}
