/**
 * @module
 * Catalog files: a JSON serialization of recipes and aliases.
 */
import {
    z,
} from 'zod';
import {
    AliasTable,
} from './alias';
import {
    DefinitionError,
} from './errors';
import type {
    AliasDefinition,
    RecipeDefinition,
} from './recipe';
import {
    Registry,
} from './registry';
import fs = require('fs-extra');

const identifier = z.string().regex(/^[A-Za-z_][A-Za-z0-9_-]*$/, 'must be an identifier');

const parameterSchema = z.union([
    identifier.transform(name => ({ name, variadic: false })),
    z.object({
        default: z.string().optional(),
        name: identifier,
        variadic: z.boolean().default(false),
    }).strict(),
]);

const callSchema = z.union([
    identifier,
    z.object({
        args: z.array(z.string()).default([]),
        name: identifier,
    }).strict(),
]);

const recipeSchema = z.object({
    body: z.array(z.string()).default([]),
    default: z.boolean().optional(),
    dependencies: z.array(callSchema).default([]),
    doc: z.string().optional(),
    name: identifier,
    parameters: z.array(parameterSchema).default([]),
    private: z.boolean().optional(),
    quiet: z.boolean().optional(),
    subsequents: z.array(callSchema).default([]),
}).strict();

/**
 * Shape of a catalog file.
 */
export const catalogSchema = z.object({
    aliases: z.record(identifier, identifier).default({}),
    recipes: z.array(recipeSchema),
}).strict();

export type CatalogFile = z.input<typeof catalogSchema>;

/**
 * Validated registry and aliases.
 */
export interface Catalog {
    readonly registry: Registry;
    readonly aliases: AliasTable;
}

/**
 * Builds a catalog from in-memory definitions.
 */
export function createCatalog(recipes: Iterable<RecipeDefinition>, aliases: Iterable<AliasDefinition> = []): Catalog {
    const registry = new Registry(recipes);
    return {
        aliases: new AliasTable(registry, aliases),
        registry,
    };
}

/**
 * Validates a parsed catalog file and builds the catalog.
 *
 * @param source file name used in error messages
 */
export function parseCatalog(data: unknown, source: string = 'catalog'): Catalog {
    const result = catalogSchema.safeParse(data);
    if (!result.success)
        throw new DefinitionError('invalid-catalog', `invalid catalog in ${source}`, undefined, formatIssues(result.error));
    const aliases = Object.entries(result.data.aliases).map(([name, target]) => ({ name, target }));
    return createCatalog(result.data.recipes, aliases);
}

/**
 * Reads and validates a catalog file.
 */
export async function readCatalog(filename: string): Promise<Catalog> {
    if (!(await fs.pathExists(filename)))
        throw new DefinitionError('invalid-catalog', `no catalog found at ${filename}`);
    let data: unknown;
    try {
        data = await fs.readJson(filename);
    } catch (e) {
        if (e instanceof SyntaxError)
            throw new DefinitionError('invalid-catalog', `${filename} is not valid JSON`, undefined, [e.message]);
        throw e;
    }
    return parseCatalog(data, filename);
}

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => {
        const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
        return `${path}${issue.message}`;
    });
}
