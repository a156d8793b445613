import { Ollama } from "ollama";
import OpenAI from "openai";
import {
    ConversationSession,
    OpenAIAssistantsBackend,
    createOpenAITranscriber,
    createWhisperCliTranscriber,
    generateText,
} from "./ai";
import { createOpenAISynthesizer } from "./audio/text-to-speech";
import { MicrophoneVoiceChannel } from "./audio/voice-channel";
import { loadConfig } from "./config";
import { CommandAgent } from "./interpreter/command-agent";
import { VoiceAssistant } from "./session/orchestrator";

async function main() {
    const config = loadConfig();
    const client = new OpenAI({ apiKey: config.openai.apiKey });

    const conversation = new ConversationSession(new OpenAIAssistantsBackend(client), {
        persona: {
            name: config.assistant.name,
            instructions: config.assistant.instructions,
            model: config.openai.model,
            tools: config.assistant.tools,
        },
        configuredAssistantId: config.assistant.id,
        userName: config.userName,
        commandTrigger: config.phrases.commandTrigger,
        pollIntervalMs: config.run.pollIntervalMs,
        runTimeoutMs: config.run.timeoutMs,
        onThreadReplaced: (previous, current) => {
            console.warn(`Thread ${previous} is no longer available; continuing in ${current} without the earlier conversation.`);
        },
    });

    const { interpreter } = config;
    const clients = {
        openai: client,
        ollama: new Ollama(interpreter.ollamaHost ? { host: interpreter.ollamaHost } : {}),
        lmStudioHost: interpreter.lmStudioHost,
    };
    const commandAgent = new CommandAgent({
        autoRun: interpreter.autoRun,
        complete: (messages, tools) =>
            generateText(clients, {
                provider: interpreter.provider,
                model: interpreter.model,
                promptOrMessages: messages,
                thinking: { isReasoningModel: interpreter.provider !== "openai", logReasoning: false },
                tools,
            }),
    });

    const voice = new MicrophoneVoiceChannel({
        timeoutSeconds: config.capture.timeoutSeconds,
        phraseTimeLimitSeconds: config.capture.phraseTimeLimitSeconds,
        deviceIndex: config.capture.deviceIndex,
        transcribe: config.speech.sttProvider === "whisper-cli"
            ? createWhisperCliTranscriber({ model: config.speech.whisperModel, language: config.speech.language })
            : createOpenAITranscriber(client, config.speech.sttModel),
        synthesize: createOpenAISynthesizer(client, config.speech.ttsModel),
    });

    const assistant = new VoiceAssistant(voice, conversation, commandAgent, {
        userName: config.userName,
        assistantName: config.assistant.name,
        model: config.openai.model,
        phrases: config.phrases,
        assistantVoice: config.assistant.voice,
        commandVoice: interpreter.voice,
        turnPauseMs: config.turnPauseMs,
    });

    const controller = new AbortController();
    process.once("SIGINT", () => controller.abort());

    const reason = await assistant.run(controller.signal);
    process.exitCode = reason === "initialization-failed" ? 1 : 0;
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
