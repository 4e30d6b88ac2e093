/**
 * @module
 * Runs an execution plan, one command line at a time.
 */
import {
    bind,
} from './bind';
import type {
    BoundRecipe,
} from './bind';
import {
    ExecutionError,
    ExitCode,
    spawnFailure,
} from './errors';
import type {
    ExecutionPlan,
} from './plan';
import type {
    Reporter,
} from './progress';
import {
    exitCodeOf,
} from './shell';
import type {
    CommandRunner,
    StepResult,
} from './shell';

/**
 * Options for {@link Executor}.
 */
export interface ExecutorOptions {
    runner: CommandRunner;
    reporter: Reporter;
    /** Echo lines without running them. */
    dryRun?: boolean;
}

/**
 * Executes plans. Holds no state between runs.
 */
export class Executor {
    private readonly options: ExecutorOptions;

    constructor(options: ExecutorOptions) {
        this.options = options;
    }

    /**
     * Binds every entry, then runs every line in order.
     *
     * Binding happens up front, so a {@link BindError} is thrown before any process is spawned.
     * A failing line stops the run; its exit code is returned and also reported. A line
     * killed by a signal stops the run even when its errors are ignored.
     */
    async run(plan: ExecutionPlan): Promise<number> {
        const bound: BoundRecipe[] = plan.map(entry => bind(entry.recipe, entry.args));
        const { reporter, runner } = this.options;
        let step = 0;

        for (let i = 0; i < bound.length; i++) {
            const { recipe, lines } = bound[i];
            reporter.recipe(i, bound.length, recipe.name);
            for (const line of lines) {
                const index = step++;
                if (line.echo || this.options.dryRun)
                    reporter.echo(line.command);
                if (this.options.dryRun)
                    continue;
                let result: StepResult;
                try {
                    result = await runner.run(line.command);
                } catch (e) {
                    const error = spawnFailure(recipe.name, index, line.command, e);
                    reporter.error(error.message);
                    return error.exitCode;
                }
                const code = exitCodeOf(result);
                // A signal always ends the run, even on a `-` line.
                if (code === 0 || (line.ignoreError && !result.signal))
                    continue;
                const error = new ExecutionError(recipe.name, index, line.command, code, result.signal || undefined);
                reporter.error(error.message);
                return error.exitCode;
            }
        }
        return ExitCode.Success;
    }
}
