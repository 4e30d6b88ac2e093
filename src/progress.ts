/**
 * @module
 * Console reporting. Everything goes to stderr; stdout belongs to the commands.
 */
import tty = require('tty');

/**
 * Console reporter.
 */
export interface Reporter {
    /** Echo a command line before it runs. */
    echo(command: string): void;
    /** Announce the start of plan entry `index` (zero-based) of `total`. Shown in verbose mode only. */
    recipe(index: number, total: number, name: string): void;
    /** Report an error, with optional detail lines. */
    error(message: string, details?: readonly string[]): void;
}

class ConsoleReporter implements Reporter {
    private readonly stream: NodeJS.WritableStream;
    private readonly verbose: boolean;
    private readonly color: boolean;

    constructor(stream: NodeJS.WritableStream, verbose: boolean) {
        this.stream = stream;
        this.verbose = verbose;
        this.color = stream instanceof tty.WriteStream && stream.isTTY && !process.env.NO_COLOR;
    }

    echo(command: string): void {
        this.stream.write(`${this.paint('1', command)}\n`);
    }

    recipe(index: number, total: number, name: string): void {
        if (this.verbose)
            this.stream.write(`${this.paint('2', `[${index + 1}/${total}] ${name}`)}\n`);
    }

    error(message: string, details?: readonly string[]): void {
        this.stream.write(`${this.paint('31', 'error')}: ${message}\n`);
        for (const line of details || [])
            this.stream.write(`  ${line}\n`);
    }

    private paint(sgr: string, text: string): string {
        return this.color ? `\x1b[${sgr}m${text}\x1b[0m` : text;
    }
}

/**
 * Create a reporter writing to `stream`, stderr by default.
 */
export function createReporter(stream?: NodeJS.WritableStream, verbose: boolean = false): Reporter {
    if (!stream)
        stream = process.stderr;
    return new ConsoleReporter(stream, verbose);
}
