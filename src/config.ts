/**
 * @module
 * Runtime configuration: command-line flags, then environment, then defaults.
 */
import {
    z,
} from 'zod';
import {
    DefinitionError,
} from './errors';
import path = require('path');

/**
 * Resolved configuration.
 */
export interface Config {
    /** Absolute path of the catalog file. */
    file: string;
    /** Directory commands run in: the catalog's directory. */
    cwd: string;
    /** Shell executable and arguments; the command line is appended. */
    shell: string[];
    dryRun: boolean;
    verbose: boolean;
}

/**
 * Values given on the command line. Anything left out falls back to the environment.
 */
export interface ConfigFlags {
    file?: string;
    shell?: string;
    dryRun?: boolean;
    verbose?: boolean;
}

export const DEFAULT_CATALOG = 'runbook.json';
export const DEFAULT_SHELL = 'sh -cu';

const flag = z.enum(['1', 'true', 'yes', 'on', '0', 'false', 'no', 'off', ''])
    .transform(v => v === '1' || v === 'true' || v === 'yes' || v === 'on');

const envSchema = z.object({
    RUNBOOK_DRY_RUN: flag.optional(),
    RUNBOOK_FILE: z.string().min(1).optional(),
    RUNBOOK_SHELL: z.string().min(1).optional(),
    RUNBOOK_VERBOSE: flag.optional(),
});

/**
 * Merges `flags` over the environment and the defaults.
 *
 * @param cwd directory relative catalog paths are resolved against
 */
export function loadConfig(flags: ConfigFlags, env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Config {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new DefinitionError('invalid-config', 'invalid environment configuration', undefined, details);
    }
    const vars = parsed.data;

    const file = path.resolve(cwd, flags.file || vars.RUNBOOK_FILE || DEFAULT_CATALOG);
    const shell = splitShell(flags.shell || vars.RUNBOOK_SHELL || DEFAULT_SHELL);
    if (!shell.length)
        throw new DefinitionError('invalid-config', 'shell command must not be empty');
    return {
        cwd: path.dirname(file),
        dryRun: flags.dryRun ?? vars.RUNBOOK_DRY_RUN ?? false,
        file,
        shell,
        verbose: flags.verbose ?? vars.RUNBOOK_VERBOSE ?? false,
    };
}

function splitShell(command: string): string[] {
    return command.split(/\s+/).filter(part => part.length > 0);
}
