/**
 * @module
 * Parameter binding and body rendering.
 */
import {
    BindError,
} from './errors';
import type {
    Recipe,
} from './recipe';
import {
    renderLine,
} from './template';

/**
 * How a parameter got its value.
 */
export type Binding =
    | { kind: 'fixed'; value: string }
    | { kind: 'default'; value: string }
    | { kind: 'variadic'; values: string[] };

/**
 * Command line ready to run.
 */
export interface BoundLine {
    /** Text handed to the shell. */
    readonly command: string;
    /** Echo the line before running it. */
    readonly echo: boolean;
    /** A non-zero exit does not stop the run. */
    readonly ignoreError: boolean;
}

/**
 * Recipe with every parameter bound and its body rendered.
 */
export interface BoundRecipe {
    readonly recipe: Recipe;
    readonly bindings: ReadonlyMap<string, Binding>;
    readonly lines: readonly BoundLine[];
}

/**
 * String a binding renders to. Variadic values are joined by a single space.
 */
export function bindingValue(binding: Binding): string {
    switch (binding.kind) {
    case 'fixed':
    case 'default':
        return binding.value;
    case 'variadic':
        return binding.values.join(' ');
    }
}

/**
 * Binds positional `args` to the parameters of `recipe` and renders its body.
 *
 * @throws {@link BindError} `MissingArgument` or `TooManyArguments`.
 */
export function bind(recipe: Recipe, args: readonly string[]): BoundRecipe {
    const bindings = new Map<string, Binding>();
    let rest = 0;

    for (const parameter of recipe.parameters) {
        if (parameter.variadic) {
            const values = args.slice(rest);
            rest = args.length;
            if (!values.length && parameter.default !== undefined)
                bindings.set(parameter.name, { kind: 'default', value: parameter.default });
            else
                bindings.set(parameter.name, { kind: 'variadic', values });
            continue;
        }
        if (rest < args.length) {
            bindings.set(parameter.name, { kind: 'fixed', value: args[rest++] });
            continue;
        }
        if (parameter.default === undefined)
            throw new BindError('MissingArgument', recipe.name,
                `recipe \`${recipe.name}\` is missing a value for parameter \`${parameter.name}\``, parameter.name);
        bindings.set(parameter.name, { kind: 'default', value: parameter.default });
    }

    if (rest < args.length)
        throw new BindError('TooManyArguments', recipe.name,
            `recipe \`${recipe.name}\` takes ${recipe.parameters.length} argument(s) but ${args.length} were supplied`);

    const values = new Map<string, string>();
    for (const [name, binding] of bindings)
        values.set(name, bindingValue(binding));

    return {
        bindings,
        lines: recipe.body.map(line => ({
            command: renderLine(line, values),
            echo: recipe.quiet === line.toggleEcho,
            ignoreError: line.ignoreError,
        })),
        recipe,
    };
}
