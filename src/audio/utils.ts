import { randomUUID } from "node:crypto";
import { existsSync, unlinkSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";

export async function withRetry<T>(
    operation: () => Promise<T>,
    config: {
        maxAttempts: number,
        baseDelay: number,
        exponentialBackoff?: boolean,
        context?: string,
        shouldRetry?: (error: unknown) => boolean
    }
): Promise<T> {
    const { maxAttempts, baseDelay, exponentialBackoff = true, context = "operation", shouldRetry = () => true } = config;

    let lastError: unknown = new Error(`${context} was not attempted`);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            return await operation();
        } catch (error) {
            lastError = error;
            console.error(`Error occurred during ${context} (attempt ${attempt}):`, error instanceof Error ? error.message : error);
            if (!shouldRetry(error)) break;
        }

        if (attempt < maxAttempts) {
            const delay = exponentialBackoff ? baseDelay * Math.pow(2, attempt - 1) : baseDelay;
            await sleep(delay);
        }
    }

    throw lastError;
}

function tempFilePath(prefix: string, extension: string): string {
    return path.join(tmpdir(), `${prefix}_${Date.now()}_${randomUUID()}${extension}`);
}

export function removeFile(filePath: string): void {
    try {
        if (existsSync(filePath)) {
            unlinkSync(filePath);
        }
    } catch (error) {
        console.error(`Failed to delete temp file ${filePath}:`, error);
    }
}

/**
 * Hands a fresh temp path to `use` and deletes whatever was written there afterwards,
 * whether `use` resolved or threw.
 */
export async function withTempFile<T>(
    prefix: string,
    extension: string,
    use: (filePath: string) => Promise<T>
): Promise<T> {
    const filePath = tempFilePath(prefix, extension);
    try {
        return await use(filePath);
    } finally {
        removeFile(filePath);
    }
}
