export type Mode = "conversation" | "command-execution";

export type Intent =
    | { kind: "exit" }
    | { kind: "dispatch"; mode: Mode; text: string };

export interface TriggerPhrases {
    exitWords: readonly string[];
    commandTrigger: string;
}

/**
 * Lower-cases and trims an utterance, dropping the trailing punctuation transcription tends to add.
 */
export function normalizePhrase(text: string): string {
    return text.trim().toLowerCase().replace(/[.!?,;:]+$/, "").trim();
}

export function matchesPhrase(text: string, phrase: string): boolean {
    return normalizePhrase(text) === normalizePhrase(phrase);
}

export function classifyUtterance(text: string, phrases: TriggerPhrases): Intent {
    if (phrases.exitWords.some((word) => matchesPhrase(text, word))) {
        return { kind: "exit" };
    }
    if (matchesPhrase(text, phrases.commandTrigger)) {
        return { kind: "dispatch", mode: "command-execution", text };
    }
    return { kind: "dispatch", mode: "conversation", text };
}
