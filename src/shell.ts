/**
 * @module
 * Runs command lines as child processes.
 */
import childProcess = require('child_process');
import os = require('os');

/**
 * How a command line ended.
 */
export interface StepResult {
    /** Exit code, `null` if the process was killed by a signal. */
    code: number | null;
    signal: NodeJS.Signals | null;
}

/**
 * Process boundary used by the executor.
 */
export interface CommandRunner {
    /** Run one command line to completion with inherited standard streams. */
    run(command: string): Promise<StepResult>;
}

/**
 * Options for {@link ShellRunner}.
 */
export interface ShellOptions {
    /** Shell executable followed by its arguments, e.g. `['sh', '-cu']`. */
    shell: string[];
    /** Working directory of the children. Default: the current directory. */
    cwd?: string;
    /** Environment of the children. Default: `process.env`. */
    env?: NodeJS.ProcessEnv;
}

const FORWARDED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/**
 * Runs each line as `<shell...> <line>`, forwarding interrupts to the child while it runs.
 */
export class ShellRunner implements CommandRunner {
    private readonly options: ShellOptions;

    constructor(options: ShellOptions) {
        if (!options.shell.length)
            throw new Error('shell command must not be empty');
        this.options = options;
    }

    run(command: string): Promise<StepResult> {
        return new Promise<StepResult>((resolve, reject) => {
            const [file, ...args] = this.options.shell;
            const cp = childProcess.spawn(file, [...args, command], {
                cwd: this.options.cwd,
                env: this.options.env || process.env,
                stdio: 'inherit',
            });
            const forward = (signal: NodeJS.Signals) => {
                cp.kill(signal);
            };
            for (const signal of FORWARDED_SIGNALS)
                process.on(signal, forward);
            const cleanup = () => {
                for (const signal of FORWARDED_SIGNALS)
                    process.removeListener(signal, forward);
            };
            cp.on('error', e => {
                cleanup();
                reject(e);
            });
            cp.on('close', (code, signal) => {
                cleanup();
                resolve({ code, signal });
            });
        });
    }
}

/**
 * Exit code a shell would report for `result`: the code itself, or `128 + n` for signal `n`.
 */
export function exitCodeOf(result: StepResult): number {
    if (result.code !== null)
        return result.code;
    if (result.signal) {
        const n = os.constants.signals[result.signal];
        return 128 + (n || 0);
    }
    return 1;
}

/**
 * Return a shell-escaped version of `x`
 */
export function quote(x: string): string {
    if (!x.length)
        return '\'\'';
    else if (!/[^\w@%+=:,./-]/.test(x))
        return x;

    const y = x.replace(/'/g, `'"'"'`);
    return `'${y}'`;
}
