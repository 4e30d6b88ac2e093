/**
 * @module
 * Error taxonomy. Library code throws these; the CLI maps them to exit codes.
 */

/**
 * Exit codes reserved by runbook itself.
 * Everything else is the exit code of a failed command line.
 */
export enum ExitCode {
    Success = 0,
    /** Unknown recipe or alias, or arguments that do not bind. */
    Usage = 64,
    /** Invalid catalog. */
    Definition = 65,
    /** The shell could not be started. */
    Spawn = 127,
}

/**
 * Base class of all runbook errors.
 */
export abstract class RunbookError extends Error {
    abstract readonly exitCode: number;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export type DefinitionErrorKind =
    | 'duplicate-recipe'
    | 'unresolved-dependency'
    | 'cycle'
    | 'unresolved-placeholder'
    | 'invalid-template'
    | 'invalid-parameters'
    | 'invalid-arguments'
    | 'alias-collision'
    | 'multiple-defaults'
    | 'invalid-catalog'
    | 'invalid-config';

/**
 * The catalog itself is broken. Raised while building the registry, before anything runs.
 */
export class DefinitionError extends RunbookError {
    readonly exitCode = ExitCode.Definition;
    readonly kind: DefinitionErrorKind;
    /** Recipe the problem was found in, if any. */
    readonly recipe?: string;
    /** Extra lines, e.g. validation issues. */
    readonly details: string[];

    constructor(kind: DefinitionErrorKind, message: string, recipe?: string, details: string[] = []) {
        super(message);
        this.kind = kind;
        this.recipe = recipe;
        this.details = details;
    }
}

/**
 * A dependency cycle. `path` starts and ends with the same recipe.
 */
export class CycleError extends DefinitionError {
    readonly path: string[];

    constructor(path: string[]) {
        super('cycle', `recipe \`${path[0]}\` depends on itself: ${path.join(' -> ')}`, path[0]);
        this.path = path;
    }
}

export type ResolutionErrorKind = 'UnknownRecipe' | 'UnknownAlias';

/**
 * A name could not be resolved to a recipe.
 */
export class ResolutionError extends RunbookError {
    readonly exitCode = ExitCode.Usage;
    readonly kind: ResolutionErrorKind;
    readonly identifier: string;

    constructor(kind: ResolutionErrorKind, identifier: string, message: string) {
        super(message);
        this.kind = kind;
        this.identifier = identifier;
    }
}

/**
 * Raised for an invocation naming a recipe that does not exist.
 */
export function unknownRecipe(name: string | undefined, suggestion?: string): ResolutionError {
    let message = name === undefined ? 'catalog has no default recipe' : `unknown recipe \`${name}\``;
    if (suggestion)
        message += `, did you mean \`${suggestion}\`?`;
    return new ResolutionError('UnknownRecipe', name || '', message);
}

/**
 * Raised for an alias whose target does not exist.
 */
export function unknownAlias(alias: string, target: string): ResolutionError {
    return new ResolutionError('UnknownAlias', alias, `alias \`${alias}\` has an unknown target \`${target}\``);
}

export type BindErrorKind = 'MissingArgument' | 'TooManyArguments';

/**
 * Arguments could not be bound to a recipe's parameters.
 */
export class BindError extends RunbookError {
    readonly exitCode = ExitCode.Usage;
    readonly kind: BindErrorKind;
    readonly recipe: string;
    /** The parameter left without a value, for `MissingArgument`. */
    readonly parameter?: string;

    constructor(kind: BindErrorKind, recipe: string, message: string, parameter?: string) {
        super(message);
        this.kind = kind;
        this.recipe = recipe;
        this.parameter = parameter;
    }
}

/**
 * A command line exited with a non-zero code, was killed by a signal, or could not be started.
 */
export class ExecutionError extends RunbookError {
    readonly exitCode: number;
    readonly recipe: string;
    /** Zero-based index of the failed line within the whole run. */
    readonly step: number;
    readonly line: string;
    readonly signal?: NodeJS.Signals;

    constructor(recipe: string, step: number, line: string, exitCode: number, signal?: NodeJS.Signals, reason?: string) {
        const cause = reason ? `could not be started: ${reason}`
            : signal ? `was terminated by signal ${signal}`
            : `failed with exit code ${exitCode}`;
        super(`recipe \`${recipe}\` ${cause} (step ${step + 1}: ${line})`);
        this.exitCode = exitCode;
        this.recipe = recipe;
        this.step = step;
        this.line = line;
        this.signal = signal;
    }
}

/**
 * Raised when the runner rejects, e.g. because the shell does not exist.
 */
export function spawnFailure(recipe: string, step: number, line: string, e: unknown): ExecutionError {
    const reason = e instanceof Error ? e.message : String(e);
    return new ExecutionError(recipe, step, line, ExitCode.Spawn, undefined, reason);
}
