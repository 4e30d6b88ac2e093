/**
 * @module
 * Human-readable views of a catalog: `--list`, `--summary` and `--show`.
 */
import type {
    AliasTable,
} from './alias';
import {
    formatParameters,
} from './recipe';
import type {
    Recipe,
    RecipeCall,
} from './recipe';
import type {
    Registry,
} from './registry';
import {
    quote,
} from './shell';

/**
 * Lines printed by `--list`: public recipes in definition order, docs aligned.
 */
export function listRecipes(registry: Registry, aliases: AliasTable): string[] {
    const recipes = registry.list(false);
    const signatures = recipes.map(signature);
    const width = Math.max(0, ...signatures.map(s => s.length));

    const lines = ['Available recipes:'];
    recipes.forEach((recipe, i) => {
        const notes: string[] = [];
        if (recipe.doc)
            notes.push(recipe.doc);
        const names = aliases.aliasesOf(recipe.name);
        if (names.length)
            notes.push(`[${names.length === 1 ? 'alias' : 'aliases'}: ${names.join(', ')}]`);
        const text = notes.length ? `${signatures[i].padEnd(width)} # ${notes.join(' ')}` : signatures[i];
        lines.push(`    ${text}`);
    });
    return lines;
}

/**
 * Public recipe names on one line.
 */
export function summarize(registry: Registry): string {
    return registry.list(false).map(r => r.name).join(' ');
}

/**
 * A recipe with its doc, dependencies and body.
 */
export function showRecipe(recipe: Recipe): string[] {
    const lines: string[] = [];
    if (recipe.doc)
        lines.push(`# ${recipe.doc}`);

    let header = `${signature(recipe)}:`;
    if (recipe.dependencies.length)
        header += ` ${recipe.dependencies.map(formatCall).join(' ')}`;
    if (recipe.subsequents.length)
        header += ` && ${recipe.subsequents.map(formatCall).join(' ')}`;
    lines.push(header);

    for (const line of recipe.body)
        lines.push(`    ${line.source}`);
    return lines;
}

function signature(recipe: Recipe): string {
    const parameters = formatParameters(recipe.parameters);
    return parameters ? `${recipe.name} ${parameters}` : recipe.name;
}

function formatCall(call: RecipeCall): string {
    if (!call.args.length)
        return call.name;
    return `(${[call.name, ...call.args.map(quote)].join(' ')})`;
}
