import { spawn } from "node:child_process";
import { getAudioPlayer, getPlayerArgs } from "./audio-player-utils";

export async function playAudio(filePath: string): Promise<void> {
    if (!filePath) throw new Error("Audio filepath is required for playback");

    const audioPlayer = getAudioPlayer();

    return new Promise((resolve, reject) => {
        const player = spawn(audioPlayer, getPlayerArgs(audioPlayer, filePath), { stdio: "ignore" });

        player.on("close", (code) => {
            if (code === 0) {
                resolve();
            } else {
                reject(new Error(`Audio playback failed with code: ${code}`));
            }
        });

        player.on("error", (err) => {
            reject(new Error(`Audio playback error: ${err.message}`));
        });
    });
}
