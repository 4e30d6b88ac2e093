/**
 * @module
 * Recipe registry: the validated, immutable recipe catalog.
 */
import {
    CycleError,
    DefinitionError,
    unknownRecipe,
} from './errors';
import {
    maxArguments,
    minArguments,
    toRecipeCall,
} from './recipe';
import type {
    Parameter,
    Recipe,
    RecipeCall,
    RecipeDefinition,
} from './recipe';
import {
    compileLine,
    placeholders,
    TemplateSyntaxError,
} from './template';
import type {
    CommandLine,
} from './template';

/**
 * Immutable catalog of recipes, in definition order.
 *
 * Construction validates the whole catalog and throws a {@link DefinitionError} on the
 * first problem, so a registry that exists can always be planned and run.
 */
export class Registry {
    private readonly recipes: Map<string, Recipe>;

    constructor(definitions: Iterable<RecipeDefinition>) {
        this.recipes = new Map();
        for (const definition of definitions) {
            if (this.recipes.has(definition.name))
                throw new DefinitionError('duplicate-recipe', `recipe \`${definition.name}\` is defined more than once`, definition.name);
            this.recipes.set(definition.name, compileRecipe(definition));
        }

        const defaults = [...this.recipes.values()].filter(r => r.default);
        if (defaults.length > 1)
            throw new DefinitionError('multiple-defaults',
                `only one recipe may be marked default, found: ${defaults.map(r => r.name).join(', ')}`);

        for (const recipe of this.recipes.values()) {
            for (const call of [...recipe.dependencies, ...recipe.subsequents])
                this.checkCall(recipe, call);
        }

        this.checkCycles();
    }

    has(name: string): boolean {
        return this.recipes.has(name);
    }

    lookup(name: string): Recipe | undefined {
        return this.recipes.get(name);
    }

    /**
     * Like {@link lookup}, but throws `UnknownRecipe` (with a suggestion when a close name exists).
     */
    get(name: string): Recipe {
        const recipe = this.recipes.get(name);
        if (!recipe)
            throw unknownRecipe(name, name ? this.suggest(name) : undefined);
        return recipe;
    }

    /**
     * Recipes in definition order.
     */
    list(includePrivate: boolean): Recipe[] {
        const recipes = [...this.recipes.values()];
        return includePrivate ? recipes : recipes.filter(r => !r.private);
    }

    /**
     * The recipe marked default, else the first one that can run without arguments.
     */
    defaultRecipe(): Recipe | undefined {
        let first: Recipe | undefined;
        for (const recipe of this.recipes.values()) {
            if (recipe.default)
                return recipe;
            if (!first && minArguments(recipe) === 0)
                first = recipe;
        }
        return first;
    }

    /**
     * Closest recipe name within two edits of `name`, if any.
     */
    suggest(name: string): string | undefined {
        let best: string | undefined;
        let bestDistance = 3;
        for (const candidate of this.recipes.keys()) {
            const d = editDistance(name, candidate);
            if (d < bestDistance) {
                best = candidate;
                bestDistance = d;
            }
        }
        return best;
    }

    private checkCall(recipe: Recipe, call: RecipeCall): void {
        const target = this.recipes.get(call.name);
        if (!target)
            throw new DefinitionError('unresolved-dependency',
                `recipe \`${recipe.name}\` depends on unknown recipe \`${call.name}\``, recipe.name);
        const min = minArguments(target);
        const max = maxArguments(target);
        if (call.args.length < min || call.args.length > max) {
            const expected = max === Infinity ? `at least ${min}` : min === max ? `${min}` : `${min} to ${max}`;
            throw new DefinitionError('invalid-arguments',
                `recipe \`${recipe.name}\` calls \`${call.name}\` with ${call.args.length} argument(s), expected ${expected}`,
                recipe.name);
        }
    }

    /**
     * Depth-first search with visiting/visited marks over dependency and subsequent edges.
     * Uses an explicit stack, so arbitrarily deep chains are fine.
     */
    private checkCycles(): void {
        const visited = new Set<string>();
        const visiting = new Set<string>();

        for (const start of this.recipes.keys()) {
            if (visited.has(start))
                continue;
            const stack: { name: string; edges: string[]; next: number }[] = [];
            const push = (name: string) => {
                visiting.add(name);
                stack.push({ edges: this.edges(name), name, next: 0 });
            };
            push(start);

            while (stack.length) {
                const frame = stack[stack.length - 1];
                if (frame.next >= frame.edges.length) {
                    stack.pop();
                    visiting.delete(frame.name);
                    visited.add(frame.name);
                    continue;
                }
                const child = frame.edges[frame.next++];
                if (visiting.has(child)) {
                    const path = stack.map(f => f.name);
                    throw new CycleError([...path.slice(path.indexOf(child)), child]);
                }
                if (!visited.has(child))
                    push(child);
            }
        }
    }

    private edges(name: string): string[] {
        const recipe = this.recipes.get(name);
        if (!recipe)
            return [];
        return [...recipe.dependencies, ...recipe.subsequents].map(call => call.name);
    }
}

function compileRecipe(definition: RecipeDefinition): Recipe {
    const name = definition.name;
    const parameters = (definition.parameters || []).map(p => ({ ...p }));
    checkParameters(name, parameters);

    const declared = new Set(parameters.map(p => p.name));
    const body: CommandLine[] = [];
    for (const source of definition.body || []) {
        let line: CommandLine;
        try {
            line = compileLine(source);
        } catch (e) {
            if (e instanceof TemplateSyntaxError)
                throw new DefinitionError('invalid-template',
                    `recipe \`${name}\`: ${e.message} at column ${e.column + 1} in \`${source}\``, name);
            throw e;
        }
        for (const placeholder of placeholders(line)) {
            if (!declared.has(placeholder))
                throw new DefinitionError('unresolved-placeholder',
                    `recipe \`${name}\` uses undeclared parameter \`${placeholder}\``, name);
        }
        body.push(line);
    }

    return {
        body,
        default: !!definition.default,
        dependencies: (definition.dependencies || []).map(toRecipeCall),
        doc: definition.doc,
        name,
        parameters,
        private: !!definition.private || name.startsWith('_'),
        quiet: !!definition.quiet,
        subsequents: (definition.subsequents || []).map(toRecipeCall),
    };
}

function checkParameters(recipe: string, parameters: Parameter[]): void {
    const seen = new Set<string>();
    parameters.forEach((p, i) => {
        if (seen.has(p.name))
            throw new DefinitionError('invalid-parameters',
                `recipe \`${recipe}\` declares parameter \`${p.name}\` more than once`, recipe);
        seen.add(p.name);
        if (p.variadic && i !== parameters.length - 1)
            throw new DefinitionError('invalid-parameters',
                `recipe \`${recipe}\`: variadic parameter \`${p.name}\` must be the last parameter`, recipe);
    });
}

function editDistance(a: string, b: string): number {
    let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
    for (let i = 1; i <= a.length; i++) {
        const cur = [i];
        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            cur.push(Math.min(prev[j] + 1, cur[j - 1] + 1, prev[j - 1] + cost));
        }
        prev = cur;
    }
    return prev[b.length];
}
