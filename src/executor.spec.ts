import {
    suite,
    test,
} from 'mocha-typescript';
import {
    createCatalog,
} from './catalog';
import {
    BindError,
    ResolutionError,
} from './errors';
import {
    Executor,
} from './executor';
import {
    Runbook,
} from './index';
import {
    plan,
} from './plan';
import {
    createReporter,
} from './progress';
import type {
    RecipeDefinition,
} from './recipe';
import {
    Registry,
} from './registry';
import type {
    CommandRunner,
} from './shell';
import {
    FakeRunner,
    MemoryStream,
} from './test-utils/mocks';
import assert = require('assert');

const chain: RecipeDefinition[] = [
    { body: ['step a'], dependencies: ['b'], name: 'a' },
    { body: ['step b'], dependencies: ['c'], name: 'b' },
    { body: ['step c'], name: 'c' },
];

@suite('Executor')
export class ExecutorTest {
    @test
    async 'runs every line in plan order'(): Promise<void> {
        const registry = new Registry(chain);
        const runner = new FakeRunner();
        const output = new MemoryStream();
        const executor = new Executor({ reporter: createReporter(output), runner });
        assert.strictEqual(await executor.run(plan(registry, registry.get('a'))), 0);
        assert.deepStrictEqual(runner.commands, ['step c', 'step b', 'step a']);
        assert.strictEqual(output.text(), 'step c\nstep b\nstep a\n');
    }

    @test
    async 'a failing step stops the run with its exit code'(): Promise<void> {
        const registry = new Registry(chain);
        const runner = new FakeRunner({ 'step b': 3 });
        const output = new MemoryStream();
        const executor = new Executor({ reporter: createReporter(output), runner });
        assert.strictEqual(await executor.run(plan(registry, registry.get('a'))), 3);
        assert.deepStrictEqual(runner.commands, ['step c', 'step b']);
        assert.strictEqual(output.text(), 'step c\nstep b\nerror: recipe `b` failed with exit code 3 (step 2: step b)\n');
    }

    @test
    async 'a step killed by a signal'(): Promise<void> {
        const registry = new Registry(chain);
        const runner = new FakeRunner({ 'step c': 'SIGTERM' });
        const output = new MemoryStream();
        const executor = new Executor({ reporter: createReporter(output), runner });
        assert.strictEqual(await executor.run(plan(registry, registry.get('a'))), 143);
        assert.deepStrictEqual(runner.commands, ['step c']);
        assert.strictEqual(output.text(), 'step c\nerror: recipe `c` was terminated by signal SIGTERM (step 1: step c)\n');
    }

    @test
    async 'lines marked with - may fail'(): Promise<void> {
        const registry = new Registry([{ body: ['-@rm build.log', '@echo done'], name: 'clean' }]);
        const runner = new FakeRunner({ 'rm build.log': 1 });
        const executor = new Executor({ reporter: createReporter(new MemoryStream()), runner });
        assert.strictEqual(await executor.run(plan(registry, registry.get('clean'))), 0);
        assert.deepStrictEqual(runner.commands, ['rm build.log', 'echo done']);
    }

    @test
    async 'a signal stops the run even on a line marked with -'(): Promise<void> {
        const registry = new Registry([{ body: ['-slow', 'after'], name: 'x' }]);
        const runner = new FakeRunner({ slow: 'SIGINT' });
        const output = new MemoryStream();
        const executor = new Executor({ reporter: createReporter(output), runner });
        assert.strictEqual(await executor.run(plan(registry, registry.get('x'))), 130);
        assert.deepStrictEqual(runner.commands, ['slow']);
        assert.strictEqual(output.text(), 'slow\nerror: recipe `x` was terminated by signal SIGINT (step 1: slow)\n');
    }

    @test
    async 'a shell that cannot start stops the run with 127'(): Promise<void> {
        const registry = new Registry(chain);
        const commands: string[] = [];
        const runner: CommandRunner = {
            async run(command: string) {
                commands.push(command);
                throw new Error('spawn nosh ENOENT');
            },
        };
        const output = new MemoryStream();
        const executor = new Executor({ reporter: createReporter(output), runner });
        assert.strictEqual(await executor.run(plan(registry, registry.get('a'))), 127);
        assert.deepStrictEqual(commands, ['step c']);
        assert.strictEqual(output.text(),
            'step c\nerror: recipe `c` could not be started: spawn nosh ENOENT (step 1: step c)\n');
    }

    @test
    async 'binding errors stop the run before anything is spawned'(): Promise<void> {
        const registry = new Registry([
            { body: ['cargo check'], name: 'check' },
            { body: ['echo {{ who }}'], dependencies: ['check'], name: 'greet', parameters: [{ name: 'who', variadic: false }] },
        ]);
        const runner = new FakeRunner();
        const executor = new Executor({ reporter: createReporter(new MemoryStream()), runner });
        await assert.rejects(executor.run(plan(registry, registry.get('greet'))), BindError);
        assert.deepStrictEqual(runner.commands, []);
    }

    @test
    async 'dry run echoes every line and runs none'(): Promise<void> {
        const registry = new Registry([{ body: ['@cargo doc', 'cargo build'], name: 'doc', quiet: true }]);
        const runner = new FakeRunner();
        const output = new MemoryStream();
        const executor = new Executor({ dryRun: true, reporter: createReporter(output), runner });
        assert.strictEqual(await executor.run(plan(registry, registry.get('doc'))), 0);
        assert.deepStrictEqual(runner.commands, []);
        assert.strictEqual(output.text(), 'cargo doc\ncargo build\n');
    }

    @test
    async 'verbose mode announces each recipe'(): Promise<void> {
        const registry = new Registry(chain);
        const output = new MemoryStream();
        const executor = new Executor({ reporter: createReporter(output, true), runner: new FakeRunner() });
        await executor.run(plan(registry, registry.get('b')));
        assert.strictEqual(output.text(), '[1/2] c\nstep c\n[2/2] b\nstep b\n');
    }
}

@suite('Runbook')
export class RunbookTest {
    private createRunbook(runner: FakeRunner): Runbook {
        const catalog = createCatalog([
            { dependencies: ['help'], name: '_' },
            { body: ['@cargo build'], name: 'build' },
            { body: ['@just --list'], name: 'help' },
        ], [{ name: 'b', target: 'build' }]);
        return new Runbook(catalog, { reporter: createReporter(new MemoryStream()), runner });
    }

    @test
    async 'invoke() resolves aliases'(): Promise<void> {
        const runner = new FakeRunner();
        assert.strictEqual(await this.createRunbook(runner).invoke('b'), 0);
        assert.deepStrictEqual(runner.commands, ['cargo build']);
    }

    @test
    async 'invoke() without a name runs the default recipe'(): Promise<void> {
        const runner = new FakeRunner();
        assert.strictEqual(await this.createRunbook(runner).invoke(undefined), 0);
        assert.deepStrictEqual(runner.commands, ['just --list']);
    }

    @test
    async 'invoke() of an unknown recipe spawns nothing'(): Promise<void> {
        const runner = new FakeRunner();
        await assert.rejects(this.createRunbook(runner).invoke('deploy'), (e: unknown) => {
            assert(e instanceof ResolutionError);
            assert.strictEqual(e.kind, 'UnknownRecipe');
            return true;
        });
        assert.deepStrictEqual(runner.commands, []);
    }

    @test
    async 'invoke() with an empty name does not fall back to the default recipe'(): Promise<void> {
        const runner = new FakeRunner();
        await assert.rejects(this.createRunbook(runner).invoke(''), (e: unknown) => {
            assert(e instanceof ResolutionError);
            assert.strictEqual(e.kind, 'UnknownRecipe');
            assert.strictEqual(e.message, 'unknown recipe ``');
            return true;
        });
        assert.deepStrictEqual(runner.commands, []);
    }

    @test
    'resolve() without a default recipe'(): void {
        const catalog = createCatalog([{ name: 'run', parameters: [{ name: 'p', variadic: false }] }]);
        const runbook = new Runbook(catalog, { reporter: createReporter(new MemoryStream()), runner: new FakeRunner() });
        assert.throws(() => runbook.resolve(), /^ResolutionError: catalog has no default recipe$/);
    }
}
