/**
 * Microphone capture through an ffmpeg child process.
 *
 * ffmpeg writes raw s16le/24 kHz/mono PCM to stdout; the byte stream is cut into
 * fixed-size frames and handed to the caller.
 */

import { ChildProcess, spawn } from 'child_process';
import { AudioRecorder, BYTES_PER_SAMPLE, RealtimeStreamOptions, SAMPLE_RATE } from '../types.js';

const START_STABILITY_DELAY_MS = 300;

function describeMicError(raw: string): string {
    const detail = raw.trim();

    if (/Operation not permitted|not authorized|Permission denied/i.test(detail)) {
        return 'Microphone permission denied. Grant the terminal microphone access and try again.';
    }

    if (/Input\/output error|No such file|device not found|could not find|Unknown input format/i.test(detail)) {
        return 'Microphone input device is unavailable. Check MIC_INPUT_FORMAT and MIC_INPUT_DEVICE.';
    }

    if (detail) {
        return `Microphone capture failed: ${detail}`;
    }

    return 'Microphone capture failed. Verify ffmpeg is installed and the microphone is accessible.';
}

export class FfmpegRecorder implements AudioRecorder {
    private process: ChildProcess | null = null;
    private pending: Buffer = Buffer.alloc(0);
    private frameBytes: number = 0;
    private onChunk: ((chunk: Buffer) => void) | null = null;

    constructor(
        private readonly inputFormat: string,
        private readonly inputDevice: string,
        private readonly sampleRate: number = SAMPLE_RATE,
    ) {}

    isRecording(): boolean {
        return this.process !== null;
    }

    async startStreaming(options: RealtimeStreamOptions): Promise<void> {
        if (this.process) {
            throw new Error('Recorder is already active');
        }

        this.onChunk = options.onChunk;
        this.pending = Buffer.alloc(0);
        this.frameBytes = Math.max(
            BYTES_PER_SAMPLE,
            Math.floor((this.sampleRate * options.chunkDurationMs) / 1000) * BYTES_PER_SAMPLE,
        );

        const args = [
            '-hide_banner',
            '-loglevel', 'error',
            '-f', this.inputFormat,
            '-i', this.inputDevice,
            '-ac', '1',
            '-ar', String(this.sampleRate),
            '-f', 's16le',
            '-acodec', 'pcm_s16le',
            'pipe:1',
        ];

        const ffmpeg = spawn('ffmpeg', args, { stdio: ['ignore', 'pipe', 'pipe'] });
        let stderrLog = '';
        let settled = false;

        ffmpeg.on('close', () => {
            if (this.process === ffmpeg) {
                this.process = null;
            }
        });

        ffmpeg.stderr.on('data', (chunk: Buffer) => {
            stderrLog += chunk.toString();
        });

        ffmpeg.stdout.on('data', (chunk: Buffer) => {
            this.handleAudioData(chunk);
        });

        await new Promise<void>((resolve, reject) => {
            ffmpeg.once('error', (error) => {
                if (settled) return;
                settled = true;
                reject(error);
            });

            ffmpeg.once('spawn', () => {
                setTimeout(() => {
                    if (settled) return;

                    if (ffmpeg.exitCode !== null) {
                        settled = true;
                        reject(new Error(describeMicError(stderrLog)));
                        return;
                    }

                    this.process = ffmpeg;
                    settled = true;
                    resolve();
                }, START_STABILITY_DELAY_MS);
            });

            ffmpeg.once('close', (code) => {
                if (settled) return;
                settled = true;
                reject(new Error(describeMicError(`${stderrLog}\nexit code=${code}`)));
            });
        });

        console.log(`[FfmpegRecorder] Recording from ${this.inputFormat}:${this.inputDevice} (${this.sampleRate} Hz, ${this.frameBytes} bytes/frame)`);
    }

    async stop(): Promise<void> {
        const current = this.process;
        if (!current) {
            return;
        }

        await new Promise<void>((resolve, reject) => {
            current.once('close', (code) => {
                this.process = null;
                // 255 is ffmpeg's exit code after SIGINT
                if (code === 0 || code === 255 || code === null) {
                    resolve();
                    return;
                }
                reject(new Error(`ffmpeg exited with code ${code}`));
            });

            current.once('error', (error) => {
                this.process = null;
                reject(error);
            });

            current.kill('SIGINT');
        });

        this.pending = Buffer.alloc(0);
        this.onChunk = null;
        console.log('[FfmpegRecorder] Recording stopped');
    }

    private handleAudioData(data: Buffer): void {
        if (!this.onChunk || data.length === 0) {
            return;
        }

        this.pending = this.pending.length === 0 ? data : Buffer.concat([this.pending, data]);

        while (this.pending.length >= this.frameBytes) {
            const frame = this.pending.subarray(0, this.frameBytes);
            this.pending = this.pending.subarray(this.frameBytes);

            try {
                this.onChunk(frame);
            } catch (error) {
                console.warn('[FfmpegRecorder] Frame callback failed:', error);
            }
        }
    }
}
