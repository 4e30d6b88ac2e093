/**
 * @module
 * Alias table.
 */
import {
    DefinitionError,
    unknownAlias,
} from './errors';
import type {
    AliasDefinition,
} from './recipe';
import type {
    Registry,
} from './registry';

/**
 * Maps alternate names to recipe names. Validated against a {@link Registry} once;
 * lookups afterwards never fail.
 */
export class AliasTable {
    private readonly targets: Map<string, string>;

    constructor(registry: Registry, aliases: Iterable<AliasDefinition>) {
        this.targets = new Map();
        for (const alias of aliases) {
            if (registry.has(alias.name))
                throw new DefinitionError('alias-collision', `alias \`${alias.name}\` has the same name as a recipe`);
            if (this.targets.has(alias.name))
                throw new DefinitionError('alias-collision', `alias \`${alias.name}\` is defined more than once`);
            if (!registry.has(alias.target))
                throw unknownAlias(alias.name, alias.target);
            this.targets.set(alias.name, alias.target);
        }
    }

    /**
     * Canonical recipe name; `name` itself if it is not an alias.
     */
    resolve(name: string): string {
        const target = this.targets.get(name);
        return target === undefined ? name : target;
    }

    /**
     * Whether `name` is an alias rather than a recipe name.
     */
    isAlias(name: string): boolean {
        return this.targets.has(name);
    }

    /**
     * Aliases of `recipe`, in definition order.
     */
    aliasesOf(recipe: string): string[] {
        const aliases: string[] = [];
        for (const [alias, target] of this.targets) {
            if (target === recipe)
                aliases.push(alias);
        }
        return aliases;
    }
}
