import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

export const DEFAULT_INSTRUCTIONS = `You are a warm, upbeat personal AI companion who talks with the user by voice.
Everything the user says reaches you as a transcript of their speech, so read it with common sense and ask again when something is unclear.
Your replies are converted to audio: speak conversationally and succinctly, and keep them free of markdown, lists, code blocks and special characters.`;

const VOICES = ["alloy", "echo", "fable", "onyx", "nova", "shimmer"] as const;
export type Voice = (typeof VOICES)[number];

const booleanFlag = z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .transform((value) => value === "true" || value === "1" || value === "yes");

const AssistantToolSchema = z.discriminatedUnion("type", [
    z.object({ type: z.literal("code_interpreter") }),
    z.object({ type: z.literal("file_search") }),
    z.object({
        type: z.literal("function"),
        function: z.object({
            name: z.string().min(1),
            description: z.string().optional(),
            parameters: z.record(z.unknown()).optional(),
        }),
    }),
]);

export type AssistantToolDeclaration = z.infer<typeof AssistantToolSchema>;

const jsonText = z.string().transform((raw, ctx): unknown => {
    try {
        return JSON.parse(raw);
    } catch (error) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}` });
        return z.NEVER;
    }
});

const EnvSchema = z.object({
    OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
    OPENAI_MODEL: z.string().min(1).default("gpt-4o"),
    USER_NAME: z.string().min(1).default("User"),
    ASSISTANT_ID: z.string().min(1).optional(),
    ASSISTANT_NAME: z.string().min(1).default("Athena"),
    ASSISTANT_INSTRUCTIONS: z.string().min(1).default(DEFAULT_INSTRUCTIONS),
    ASSISTANT_TOOLS: jsonText.pipe(z.array(AssistantToolSchema)).default('[{"type":"code_interpreter"}]'),
    ASSISTANT_VOICE: z.enum(VOICES).default("nova"),
    COMMAND_VOICE: z.enum(VOICES).default("onyx"),
    TTS_MODEL: z.string().min(1).default("tts-1"),
    STT_PROVIDER: z.enum(["openai", "whisper-cli"]).default("openai"),
    STT_MODEL: z.string().min(1).default("whisper-1"),
    WHISPER_MODEL: z.enum(["tiny", "base", "small", "medium", "large"]).default("small"),
    STT_LANGUAGE: z.string().min(1).default("en"),
    SPEECH_RECOGNITION_TIMEOUT: z.coerce.number().positive().default(5),
    SPEECH_RECOGNITION_PHRASE_TIME_LIMIT: z.coerce.number().positive().default(15),
    AUDIO_DEVICE_INDEX: z.coerce.number().int().min(-1).default(-1),
    RUN_POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(1000),
    RUN_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
    TURN_PAUSE_MS: z.coerce.number().int().nonnegative().default(1000),
    INTERPRETER_AUTO_RUN: booleanFlag.default("false"),
    INTERPRETER_PROVIDER: z.enum(["openai", "ollama", "lmstudio"]).default("openai"),
    INTERPRETER_MODEL: z.string().min(1).optional(),
    OLLAMA_HOST: z.string().url().optional(),
    LM_STUDIO_HOST: z.string().url().optional(),
    COMMAND_MODE_TRIGGER: z.string().min(1).default("Start Open Interpreter"),
    COMMAND_MODE_EXIT: z.string().min(1).default("Exit Interpreter"),
});

export interface AppConfig {
    openai: { apiKey: string; model: string };
    userName: string;
    assistant: {
        id: string | null;
        name: string;
        instructions: string;
        tools: AssistantToolDeclaration[];
        voice: Voice;
    };
    speech: {
        ttsModel: string;
        sttProvider: "openai" | "whisper-cli";
        sttModel: string;
        whisperModel: "tiny" | "base" | "small" | "medium" | "large";
        language: string;
    };
    capture: {
        timeoutSeconds: number;
        phraseTimeLimitSeconds: number;
        deviceIndex: number;
    };
    run: { pollIntervalMs: number; timeoutMs: number };
    turnPauseMs: number;
    interpreter: {
        autoRun: boolean;
        provider: "openai" | "ollama" | "lmstudio";
        model: string;
        voice: Voice;
        ollamaHost?: string;
        lmStudioHost?: string;
    };
    phrases: {
        exitWords: readonly string[];
        commandTrigger: string;
        commandExit: string;
    };
}

export const EXIT_WORDS = ["exit", "quit", "goodbye"] as const;

/**
 * Reads the process environment once and validates it. Empty strings are treated as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""));
    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
        throw new Error(`Invalid configuration: ${issues}`);
    }
    const vars = parsed.data;

    return {
        openai: { apiKey: vars.OPENAI_API_KEY, model: vars.OPENAI_MODEL },
        userName: vars.USER_NAME,
        assistant: {
            id: vars.ASSISTANT_ID ?? null,
            name: vars.ASSISTANT_NAME,
            instructions: vars.ASSISTANT_INSTRUCTIONS,
            tools: vars.ASSISTANT_TOOLS,
            voice: vars.ASSISTANT_VOICE,
        },
        speech: {
            ttsModel: vars.TTS_MODEL,
            sttProvider: vars.STT_PROVIDER,
            sttModel: vars.STT_MODEL,
            whisperModel: vars.WHISPER_MODEL,
            language: vars.STT_LANGUAGE,
        },
        capture: {
            timeoutSeconds: vars.SPEECH_RECOGNITION_TIMEOUT,
            phraseTimeLimitSeconds: vars.SPEECH_RECOGNITION_PHRASE_TIME_LIMIT,
            deviceIndex: vars.AUDIO_DEVICE_INDEX,
        },
        run: { pollIntervalMs: vars.RUN_POLL_INTERVAL_MS, timeoutMs: vars.RUN_TIMEOUT_MS },
        turnPauseMs: vars.TURN_PAUSE_MS,
        interpreter: {
            autoRun: vars.INTERPRETER_AUTO_RUN,
            provider: vars.INTERPRETER_PROVIDER,
            model: vars.INTERPRETER_MODEL ?? vars.OPENAI_MODEL,
            voice: vars.COMMAND_VOICE,
            ollamaHost: vars.OLLAMA_HOST,
            lmStudioHost: vars.LM_STUDIO_HOST,
        },
        phrases: {
            exitWords: EXIT_WORDS,
            commandTrigger: vars.COMMAND_MODE_TRIGGER,
            commandExit: vars.COMMAND_MODE_EXIT,
        },
    };
}
