import { exec } from "node:child_process";

export interface ShellResult {
    exitCode: number;
    stdout: string;
    stderr: string;
    timedOut: boolean;
}

export type CommandRunner = (command: string) => Promise<ShellResult>;

const MAX_OUTPUT_CHARS = 4000;

export function runShellCommand(
    command: string,
    { cwd = process.cwd(), timeoutMs = 60_000 }: { cwd?: string; timeoutMs?: number } = {}
): Promise<ShellResult> {
    return new Promise((resolve) => {
        exec(command, { cwd, timeout: timeoutMs, maxBuffer: 10 * 1024 * 1024, encoding: "utf8" }, (error, stdout, stderr) => {
            resolve({
                exitCode: error ? (typeof error.code === "number" ? error.code : 1) : 0,
                stdout,
                stderr,
                timedOut: error?.killed === true,
            });
        });
    });
}

/**
 * Renders a command result as the tool message the model reads back.
 */
export function formatShellResult(result: ShellResult): string {
    const sections = [`exit code: ${result.exitCode}${result.timedOut ? " (timed out)" : ""}`];
    if (result.stdout.trim()) sections.push(`stdout:\n${result.stdout.trim()}`);
    if (result.stderr.trim()) sections.push(`stderr:\n${result.stderr.trim()}`);

    const text = sections.join("\n");
    return text.length > MAX_OUTPUT_CHARS
        ? `${text.slice(0, MAX_OUTPUT_CHARS)}\n[output truncated]`
        : text;
}
