import { spawn } from "node:child_process";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { nanoid } from "nanoid";

export const TRANSCODE_SAMPLE_RATE = 44100;
export const TRANSCODE_CHANNELS = 2;
/** Characters of ffmpeg's stderr kept for the error message. */
export const STDERR_TAIL_CHARS = 4096;

/** Append `chunk` to `text`, keeping only the last `limit` characters. */
export function appendTail(text: string, chunk: string, limit: number = STDERR_TAIL_CHARS): string {
    const joined = text + chunk;
    return joined.length > limit ? joined.slice(joined.length - limit) : joined;
}

export type TranscodedFile = {
    wavPath: string;
    /** Removes the temporary directory holding `wavPath`. */
    cleanup(): Promise<void>;
};

export function ffmpegPath(env: NodeJS.ProcessEnv = process.env): string {
    return env.FFMPEG_PATH ?? "ffmpeg";
}

/**
 * Transcode any container ffmpeg understands to a 44.1 kHz stereo WAV in a
 * fresh temporary directory. The caller owns the result and must `cleanup()`.
 */
export async function transcodeToWav(inputPath: string, binary: string = ffmpegPath()): Promise<TranscodedFile> {
    const dir = await mkdtemp(path.join(tmpdir(), "gap-scan-"));
    const wavPath = path.join(dir, `${nanoid(8)}.wav`);
    const cleanup = () => rm(dir, { recursive: true, force: true });

    try {
        await new Promise<void>((resolve, reject) => {
            const args = [
                "-nostdin",
                "-loglevel",
                "error",
                "-i",
                inputPath,
                "-ar",
                String(TRANSCODE_SAMPLE_RATE),
                "-ac",
                String(TRANSCODE_CHANNELS),
                wavPath,
            ];
            const processHandle = spawn(binary, args, { stdio: ["ignore", "ignore", "pipe"] });

            let stderr = "";
            processHandle.stderr.on("data", (chunk: Buffer) => {
                stderr = appendTail(stderr, chunk.toString());
            });
            processHandle.on("error", reject);
            processHandle.on("close", (code) => {
                if (code === 0) {
                    resolve();
                } else {
                    reject(new Error(`ffmpeg exited with code ${code}${stderr ? `: ${stderr.trim()}` : ""}`));
                }
            });
        });
    } catch (err) {
        await cleanup();
        throw err;
    }

    return { wavPath, cleanup };
}
