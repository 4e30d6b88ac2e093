/**
 * Test doubles for the process boundary and the console.
 */
import {
    Writable,
} from 'stream';
import type {
    CommandRunner,
    StepResult,
} from '../shell';

/**
 * Records command lines instead of running them.
 * Lines listed in `results` end that way; everything else exits with 0.
 */
export class FakeRunner implements CommandRunner {
    readonly commands: string[] = [];
    private readonly results: Map<string, StepResult>;

    constructor(results: Record<string, number | NodeJS.Signals> = {}) {
        this.results = new Map();
        for (const [command, result] of Object.entries(results)) {
            this.results.set(command, typeof result === 'number'
                ? { code: result, signal: null }
                : { code: null, signal: result });
        }
    }

    async run(command: string): Promise<StepResult> {
        this.commands.push(command);
        return this.results.get(command) || { code: 0, signal: null };
    }
}

/**
 * Writable stream that keeps everything written to it.
 */
export class MemoryStream extends Writable {
    private readonly chunks: string[] = [];

    _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        this.chunks.push(chunk.toString());
        callback();
    }

    text(): string {
        return this.chunks.join('');
    }
}
