/**
 * Speaker output through an ffplay child process.
 *
 * PCM chunks are piped into ffplay's stdin. stop() kills the process so playback
 * halts at once; the next play() starts a fresh one.
 */

import { ChildProcessByStdio, spawn } from 'child_process';
import { Readable, Writable } from 'stream';
import { IAudioPlayer, SAMPLE_RATE } from '../types.js';

type PlayerProcess = ChildProcessByStdio<Writable, null, Readable>;

export class FfplayPlayer implements IAudioPlayer {
    private process: PlayerProcess | null = null;
    private stderrLog: string = '';

    constructor(private readonly sampleRate: number = SAMPLE_RATE) {}

    async play(chunk: Buffer): Promise<void> {
        const player = this.process ?? this.spawnPlayer();
        const stdin = player.stdin;

        if (stdin.destroyed || !stdin.writable) {
            return;
        }

        await new Promise<void>((resolve) => {
            const flushed = stdin.write(chunk, (error) => {
                if (error && this.process === player) {
                    console.warn('[FfplayPlayer] Write failed:', error.message);
                }
            });
            if (flushed) {
                resolve();
                return;
            }
            // Backpressure: ffplay consumes at real-time speed
            const done = (): void => {
                stdin.off('drain', done);
                stdin.off('close', done);
                resolve();
            };
            stdin.once('drain', done);
            stdin.once('close', done);
        });
    }

    stop(): void {
        const player = this.process;
        if (!player) {
            return;
        }
        this.process = null;
        player.stdin.destroy();
        player.kill('SIGKILL');
    }

    async close(): Promise<void> {
        const player = this.process;
        if (!player) {
            return;
        }
        this.process = null;

        await new Promise<void>((resolve) => {
            player.once('close', () => resolve());
            // Let ffplay finish what it already has
            player.stdin.end();
        });
    }

    private spawnPlayer(): PlayerProcess {
        const args = [
            '-hide_banner',
            '-loglevel', 'error',
            '-nodisp',
            '-autoexit',
            '-f', 's16le',
            '-ar', String(this.sampleRate),
            '-ch_layout', 'mono',
            '-i', 'pipe:0',
        ];

        const player = spawn('ffplay', args, { stdio: ['pipe', 'ignore', 'pipe'] });
        this.stderrLog = '';

        player.stderr.on('data', (data: Buffer) => {
            this.stderrLog += data.toString();
        });

        player.stdin.on('error', (error) => {
            // EPIPE after stop() is expected
            if (this.process === player) {
                console.warn('[FfplayPlayer] stdin error:', error.message);
            }
        });

        player.on('error', (error) => {
            console.error('[FfplayPlayer] Failed to start ffplay:', error.message);
            if (this.process === player) {
                this.process = null;
            }
        });

        player.on('close', (code) => {
            if (this.process === player) {
                this.process = null;
                if (code !== 0 && code !== null) {
                    console.warn(`[FfplayPlayer] ffplay exited with code ${code}: ${this.stderrLog.trim()}`);
                }
            }
        });

        this.process = player;
        return player;
    }
}
