import type {
    CommandLine,
} from './template';

/**
 * Declared recipe parameter.
 */
export interface Parameter {
    name: string;
    /** Value used when no argument is supplied. */
    default?: string;
    /** Captures all remaining arguments. Only the last parameter may be variadic. */
    variadic: boolean;
}

/**
 * Reference to another recipe, with fixed arguments.
 */
export interface RecipeCall {
    name: string;
    args: string[];
}

/**
 * Recipe as written in a catalog. Omitted fields take their empty value.
 */
export interface RecipeDefinition {
    name: string;
    parameters?: Parameter[];
    /** Recipes run before this one. */
    dependencies?: (string | RecipeCall)[];
    /** Recipes run after this one. */
    subsequents?: (string | RecipeCall)[];
    /** Command lines. */
    body?: string[];
    doc?: string;
    /** Hidden from listings. Names starting with `_` are always private. */
    private?: boolean;
    /** Run when no recipe is named. */
    default?: boolean;
    /** Do not echo lines before running them. */
    quiet?: boolean;
}

/**
 * Alias as written in a catalog.
 */
export interface AliasDefinition {
    name: string;
    target: string;
}

/**
 * Validated recipe held by a {@link Registry}.
 */
export interface Recipe {
    readonly name: string;
    readonly parameters: readonly Parameter[];
    readonly dependencies: readonly RecipeCall[];
    readonly subsequents: readonly RecipeCall[];
    readonly body: readonly CommandLine[];
    readonly doc?: string;
    readonly private: boolean;
    readonly default: boolean;
    readonly quiet: boolean;
}

/**
 * Number of arguments a recipe needs at least.
 */
export function minArguments(recipe: Pick<Recipe, 'parameters'>): number {
    return recipe.parameters.filter(p => !p.variadic && p.default === undefined).length;
}

/**
 * Number of arguments a recipe accepts at most, `Infinity` with a variadic parameter.
 */
export function maxArguments(recipe: Pick<Recipe, 'parameters'>): number {
    const n = recipe.parameters.length;
    return n && recipe.parameters[n - 1].variadic ? Infinity : n;
}

/**
 * Normalizes a dependency written as a bare name.
 */
export function toRecipeCall(x: string | RecipeCall): RecipeCall {
    return typeof x === 'string' ? { args: [], name: x } : { args: [...x.args], name: x.name };
}

/**
 * Renders a parameter list the way `--list` shows it: `a b='x' *rest`.
 */
export function formatParameters(parameters: readonly Parameter[]): string {
    return parameters.map(p => {
        const name = p.variadic ? `*${p.name}` : p.name;
        return p.default === undefined ? name : `${name}=${quoteDefault(p.default)}`;
    }).join(' ');
}

function quoteDefault(value: string): string {
    return `'${value.replace(/'/g, `\\'`)}'`;
}
