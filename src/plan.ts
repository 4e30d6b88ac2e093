/**
 * @module
 * Dependency resolution: turns one requested recipe into an ordered execution plan.
 */
import type {
    Recipe,
    RecipeCall,
} from './recipe';
import type {
    Registry,
} from './registry';

/**
 * One recipe invocation in a plan.
 */
export interface PlanEntry {
    readonly recipe: Recipe;
    /** Command-line arguments for the root, fixed arguments for everything else. */
    readonly args: readonly string[];
}

/**
 * Dependency-ordered invocations. Every `(recipe, args)` pair appears once.
 */
export type ExecutionPlan = readonly PlanEntry[];

interface Frame {
    entry: PlanEntry;
    key: string;
    /** Still walking dependencies, or already planned and walking subsequents. */
    stage: 'dependencies' | 'subsequents';
    next: number;
}

/**
 * Plans `root` invoked with `args`.
 *
 * Post-order depth-first walk: dependencies in declaration order, then the recipe itself,
 * then its subsequents. The registry has no cycles, so the walk terminates.
 */
export function plan(registry: Registry, root: Recipe, args: readonly string[] = []): ExecutionPlan {
    const entries: PlanEntry[] = [];
    const planned = new Set<string>();
    const stack: Frame[] = [];

    const push = (entry: PlanEntry) => {
        stack.push({ entry, key: entryKey(entry.recipe.name, entry.args), next: 0, stage: 'dependencies' });
    };
    push({ args: [...args], recipe: root });

    while (stack.length) {
        const frame = stack[stack.length - 1];
        const recipe = frame.entry.recipe;
        const calls = frame.stage === 'dependencies' ? recipe.dependencies : recipe.subsequents;

        if (frame.next < calls.length) {
            const call = calls[frame.next++];
            if (!planned.has(entryKey(call.name, call.args)))
                push(resolveCall(registry, call));
            continue;
        }

        if (frame.stage === 'dependencies') {
            planned.add(frame.key);
            entries.push(frame.entry);
            frame.stage = 'subsequents';
            frame.next = 0;
            continue;
        }

        stack.pop();
    }

    return entries;
}

function resolveCall(registry: Registry, call: RecipeCall): PlanEntry {
    return {
        args: call.args,
        recipe: registry.get(call.name),
    };
}

function entryKey(name: string, args: readonly string[]): string {
    return JSON.stringify([name, ...args]);
}
