/**
 * @module
 * Command-line front end.
 */
import {
    Command,
    CommanderError,
} from 'commander';
import {
    loadConfig,
} from './config';
import {
    DefinitionError,
    ExitCode,
    RunbookError,
} from './errors';
import {
    openRunbook,
} from './index';
import {
    listRecipes,
    showRecipe,
    summarize,
} from './listing';
import {
    createReporter,
} from './progress';
import type {
    CommandRunner,
} from './shell';

/**
 * Streams and environment of one CLI run. Everything defaults to the current process.
 */
export interface CliContext {
    stdout?: NodeJS.WritableStream;
    stderr?: NodeJS.WritableStream;
    env?: NodeJS.ProcessEnv;
    cwd?: string;
    /** Replaces the shell runner. */
    runner?: CommandRunner;
}

type CliOptions = {
    list?: boolean;
    summary?: boolean;
    show?: string;
    dryRun?: boolean;
    file?: string;
    shell?: string;
    verbose?: boolean;
};

/**
 * Runs the CLI with `argv` (without the node and script paths) and returns the exit code.
 */
export async function main(argv: readonly string[], context: CliContext = {}): Promise<number> {
    const stdout = context.stdout || process.stdout;
    const stderr = context.stderr || process.stderr;
    let exitCode: number = ExitCode.Success;

    const program = new Command();
    program
        .name('runbook')
        .description('Run recipes from a runbook.json catalog')
        .argument('[recipe]', 'recipe or alias to run; the default recipe if omitted')
        .argument('[args...]', 'arguments for the recipe')
        .option('-l, --list', 'list public recipes')
        .option('--summary', 'print public recipe names on one line')
        .option('-s, --show <recipe>', 'print a recipe')
        .option('-n, --dry-run', 'print commands without running them')
        .option('-f, --file <path>', 'catalog file')
        .option('--shell <command>', 'shell used to run command lines')
        .option('-v, --verbose', 'announce each recipe as it starts')
        .passThroughOptions()
        .exitOverride()
        .configureOutput({
            writeErr: s => stderr.write(s),
            writeOut: s => stdout.write(s),
        })
        .action(async (recipe: string | undefined, args: string[]) => {
            const options = program.opts<CliOptions>();
            const config = loadConfig(options, context.env || process.env, context.cwd || process.cwd());
            const reporter = createReporter(stderr, config.verbose);
            const runbook = await openRunbook(config, { reporter, runner: context.runner });
            const { aliases, registry } = runbook.catalog;
            if (options.list) {
                for (const line of listRecipes(registry, aliases))
                    stdout.write(`${line}\n`);
            } else if (options.summary) {
                stdout.write(`${summarize(registry)}\n`);
            } else if (options.show !== undefined) {
                const recipe = runbook.resolve(options.show);
                if (aliases.isAlias(options.show))
                    stdout.write(`alias ${options.show} := ${recipe.name}\n`);
                for (const line of showRecipe(recipe))
                    stdout.write(`${line}\n`);
            } else {
                exitCode = await runbook.invoke(recipe, args);
            }
        });

    try {
        await program.parseAsync([...argv], { from: 'user' });
    } catch (e) {
        if (e instanceof CommanderError)
            return e.exitCode === 0 ? ExitCode.Success : ExitCode.Usage;
        if (e instanceof RunbookError) {
            createReporter(stderr).error(e.message, e instanceof DefinitionError ? e.details : undefined);
            return e.exitCode;
        }
        throw e;
    }
    return exitCode;
}
