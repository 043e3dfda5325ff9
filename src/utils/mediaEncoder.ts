import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface MediaEncoder {
    run(args: string[]): Promise<void>;
}

/** Runs the ffmpeg executable; stderr is kept for the error message. */
export class FfmpegEncoder implements MediaEncoder {
    constructor(private binary = 'ffmpeg') {}

    async run(args: string[]): Promise<void> {
        console.log(`[DEBUG] Executing: ${this.binary} ${args.join(' ')}`);
        try {
            await execFileAsync(this.binary, ['-hide_banner', '-loglevel', 'error', '-y', ...args], {
                maxBuffer: 16 * 1024 * 1024,
            });
        } catch (error) {
            const stderr = typeof error === 'object' && error !== null && 'stderr' in error ? String(error.stderr).trim() : '';
            const reason = stderr || (error instanceof Error ? error.message : String(error));
            throw new Error(`${this.binary} failed: ${reason.split('\n').slice(-3).join(' | ')}`, { cause: error });
        }
    }
}
