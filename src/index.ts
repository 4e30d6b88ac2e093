/**
 * @module
 * runbook Public API
 */
import {
    readCatalog,
} from './catalog';
import type {
    Catalog,
} from './catalog';
import type {
    Config,
} from './config';
import {
    unknownRecipe,
} from './errors';
import {
    Executor,
} from './executor';
import {
    plan,
} from './plan';
import type {
    ExecutionPlan,
} from './plan';
import {
    createReporter,
} from './progress';
import type {
    Reporter,
} from './progress';
import type {
    Recipe,
} from './recipe';
import {
    ShellRunner,
} from './shell';
import type {
    CommandRunner,
} from './shell';

/**
 * Options for {@link Runbook}.
 */
export interface RunbookOptions {
    /** Process boundary. */
    runner: CommandRunner;
    /** Default: a console reporter on stderr. */
    reporter?: Reporter;
    /** Echo commands instead of running them. */
    dryRun?: boolean;
}

/**
 * A loaded catalog, ready to run recipes.
 */
export class Runbook {
    readonly catalog: Catalog;
    private readonly executor: Executor;

    constructor(catalog: Catalog, options: RunbookOptions) {
        this.catalog = catalog;
        this.executor = new Executor({
            dryRun: options.dryRun,
            reporter: options.reporter || createReporter(),
            runner: options.runner,
        });
    }

    /**
     * Resolves an alias or recipe name. Without a name, the default recipe.
     *
     * @throws {@link ResolutionError} `UnknownRecipe`
     */
    resolve(name?: string): Recipe {
        const { aliases, registry } = this.catalog;
        if (name === undefined) {
            const recipe = registry.defaultRecipe();
            if (!recipe)
                throw unknownRecipe(undefined);
            return recipe;
        }
        return registry.get(aliases.resolve(name));
    }

    /**
     * Execution plan for `name` invoked with `args`.
     */
    plan(name: string | undefined, args: readonly string[] = []): ExecutionPlan {
        return plan(this.catalog.registry, this.resolve(name), args);
    }

    /**
     * Resolves, plans and runs a recipe. Returns the exit code of the run.
     */
    async invoke(name: string | undefined, args: readonly string[] = []): Promise<number> {
        return this.executor.run(this.plan(name, args));
    }
}

/**
 * Opens the catalog named by `config`. Commands run through a {@link ShellRunner} unless
 * `options.runner` says otherwise.
 */
export async function openRunbook(config: Config, options: { reporter?: Reporter; runner?: CommandRunner } = {}): Promise<Runbook> {
    const catalog = await readCatalog(config.file);
    return new Runbook(catalog, {
        dryRun: config.dryRun,
        reporter: options.reporter || createReporter(undefined, config.verbose),
        runner: options.runner || new ShellRunner({ cwd: config.cwd, shell: config.shell }),
    });
}

export {
    AliasTable,
} from './alias';
export {
    bind,
} from './bind';
export type {
    Binding,
    BoundLine,
    BoundRecipe,
} from './bind';
export {
    createCatalog,
    parseCatalog,
    readCatalog,
} from './catalog';
export type {
    Catalog,
    CatalogFile,
} from './catalog';
export {
    loadConfig,
} from './config';
export type {
    Config,
    ConfigFlags,
} from './config';
export {
    BindError,
    DefinitionError,
    ExecutionError,
    ExitCode,
    ResolutionError,
    RunbookError,
} from './errors';
export {
    Executor,
} from './executor';
export type {
    ExecutionPlan,
    PlanEntry,
} from './plan';
export type {
    AliasDefinition,
    Parameter,
    Recipe,
    RecipeCall,
    RecipeDefinition,
} from './recipe';
export {
    Registry,
} from './registry';
export {
    ShellRunner,
} from './shell';
export type {
    CommandRunner,
    StepResult,
} from './shell';
