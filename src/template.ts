/**
 * @module
 * Command-line templates: `{{ name }}` placeholders and line prefixes.
 */

/**
 * Piece of a compiled line.
 */
export type Fragment =
    | { type: 'text'; text: string }
    | { type: 'placeholder'; name: string };

/**
 * A body line compiled once, at registry construction.
 */
export interface CommandLine {
    /** Source text, prefixes included. */
    readonly source: string;
    readonly fragments: readonly Fragment[];
    /** Line started with `@`: echo is toggled for this line. */
    readonly toggleEcho: boolean;
    /** Line started with `-`: a non-zero exit does not stop the run. */
    readonly ignoreError: boolean;
}

/**
 * Template syntax problem, reported by the registry as a definition error.
 */
export class TemplateSyntaxError extends Error {
    readonly column: number;

    constructor(message: string, column: number) {
        super(message);
        this.name = 'TemplateSyntaxError';
        this.column = column;
    }
}

const NAME = /^[A-Za-z_][A-Za-z0-9_-]*$/;

/**
 * Compiles one body line.
 *
 * `{{{{` is an escaped literal `{{`. Leading `@` and `-` (in any order, each at most once)
 * are prefixes and are not part of the command.
 */
export function compileLine(source: string): CommandLine {
    let toggleEcho = false;
    let ignoreError = false;
    let i = 0;
    for (; i < source.length && i < 2; i++) {
        const c = source[i];
        if (c === '@' && !toggleEcho)
            toggleEcho = true;
        else if (c === '-' && !ignoreError)
            ignoreError = true;
        else
            break;
    }

    const fragments: Fragment[] = [];
    let text = '';
    while (i < source.length) {
        if (source.startsWith('{{{{', i)) {
            text += '{{';
            i += 4;
            continue;
        }
        if (!source.startsWith('{{', i)) {
            text += source[i];
            i++;
            continue;
        }
        const end = source.indexOf('}}', i + 2);
        if (end < 0)
            throw new TemplateSyntaxError('unterminated placeholder', i);
        const name = source.slice(i + 2, end).trim();
        if (!NAME.test(name))
            throw new TemplateSyntaxError(`invalid placeholder \`${name}\``, i);
        if (text)
            fragments.push({ text, type: 'text' });
        text = '';
        fragments.push({ name, type: 'placeholder' });
        i = end + 2;
    }
    if (text)
        fragments.push({ text, type: 'text' });

    return {
        fragments,
        ignoreError,
        source,
        toggleEcho,
    };
}

/**
 * Names referenced by a line's placeholders, in order of appearance.
 */
export function placeholders(line: CommandLine): string[] {
    const names: string[] = [];
    for (const fragment of line.fragments) {
        if (fragment.type === 'placeholder')
            names.push(fragment.name);
    }
    return names;
}

/**
 * Substitutes placeholder values. Every placeholder must have a value.
 */
export function renderLine(line: CommandLine, values: ReadonlyMap<string, string>): string {
    return line.fragments.map(fragment => {
        if (fragment.type === 'text')
            return fragment.text;
        const value = values.get(fragment.name);
        if (value === undefined)
            throw new Error(`no value bound for placeholder ${fragment.name}`);
        return value;
    }).join('');
}
