import { execSync } from "node:child_process";
import { platform } from "node:os";

/**
 * Find the first executable command from a list of commands
 */
export function findExec(commands: string[], isAvailable: (command: string) => boolean = isExecutable): string | null {
    if (!Array.isArray(commands) || commands.length === 0) {
        throw new Error("Commands must be a non-empty array.");
    }

    return commands.find((command) => isAvailable(command)) ?? null;
}

function isExecutable(command: string): boolean {
    try {
        execSync(findCommand(command), { stdio: "ignore", timeout: 2000 });
        return true;
    } catch {
        return false;
    }
}

function findCommand(command: string): string {
    return /^win/.test(platform()) ? `where ${command}` : `command -v ${command}`;
}

/**
 * MP3-capable command line players, in order of preference, for a platform.
 */
export function getPlatformAudioPlayers(platformName: NodeJS.Platform = platform()): string[] {
    if (platformName === "win32") {
        return ["ffplay", "mpg123", "mplayer"];
    } else if (platformName === "darwin") {
        return ["afplay", "ffplay", "mpg123", "mplayer"];
    }
    return ["ffplay", "mpg123", "mpg321", "mplayer", "cvlc", "play"];
}

/**
 * Arguments that make a player render one file and exit without a window.
 */
export function getPlayerArgs(player: string, filePath: string): string[] {
    switch (player) {
        case "ffplay":
            return ["-nodisp", "-autoexit", "-loglevel", "quiet", filePath];
        case "mpg123":
        case "mpg321":
        case "play":
            return ["-q", filePath];
        case "mplayer":
            return ["-really-quiet", filePath];
        case "cvlc":
            return ["--play-and-exit", "--quiet", filePath];
        default:
            return [filePath];
    }
}

let cachedPlayer: string | null = null;

/**
 * Get the first suitable audio player command for the current platform.
 */
export function getAudioPlayer(): string {
    if (cachedPlayer) return cachedPlayer;

    const players = getPlatformAudioPlayers();
    const player = findExec(players);

    if (!player) {
        const platformName = platform();
        let errorMsg = `No suitable audio player found on the system (${platformName}). `;
        if (platformName === "linux") {
            errorMsg += "Try installing: sudo apt install ffmpeg mpg123 or sudo yum install ffmpeg mpg123";
        } else if (platformName === "darwin") {
            errorMsg += "afplay should ship with macOS; alternatively brew install ffmpeg";
        } else {
            errorMsg += "Install ffmpeg and make sure ffplay is on PATH.";
        }
        throw new Error(errorMsg);
    }

    cachedPlayer = player;
    return player;
}
