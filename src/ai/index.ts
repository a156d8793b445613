export { generateText, parseLlmResponse } from "./completions";
export type { CompletionClients } from "./completions";
export { ConversationSession } from "./assistant-session";
export type { ConversationSessionOptions, SessionState } from "./assistant-session";
export { OpenAIAssistantsBackend } from "./openai-assistants";
export { createOpenAITranscriber, createWhisperCliTranscriber } from "./transcription";
export type { Transcriber } from "./transcription";
export type * from "./types";
