import {
    suite,
    test,
} from 'mocha-typescript';
import {
    parseCatalog,
    readCatalog,
} from './catalog';
import {
    DefinitionError,
    ResolutionError,
} from './errors';
import assert = require('assert');
import fs = require('fs-extra');
import os = require('os');
import path = require('path');

function assertInvalid(data: unknown, details: string[]): void {
    assert.throws(() => parseCatalog(data, 'runbook.json'), (e: unknown) => {
        assert(e instanceof DefinitionError);
        assert.strictEqual(e.kind, 'invalid-catalog');
        assert.strictEqual(e.message, 'invalid catalog in runbook.json');
        assert.deepStrictEqual(e.details, details);
        return true;
    });
}

@suite('catalog')
export class CatalogTest {
    private static dir: string;

    static async before(): Promise<void> {
        CatalogTest.dir = await fs.mkdtemp(path.join(os.tmpdir(), 'runbook-catalog-'));
    }

    static async after(): Promise<void> {
        await fs.remove(CatalogTest.dir);
    }

    @test
    'parseCatalog() fills in omitted fields'(): void {
        const { aliases, registry } = parseCatalog({
            aliases: { r: 'run' },
            recipes: [
                { name: 'build' },
                {
                    body: ['cargo run -p {{ package }} -- {{ opts }}'],
                    dependencies: ['build', { name: 'build' }],
                    doc: 'run binary',
                    name: 'run',
                    parameters: ['package', { name: 'opts', variadic: true }],
                },
            ],
        });
        const run = registry.get(aliases.resolve('r'));
        assert.deepStrictEqual(run.parameters, [
            { name: 'package', variadic: false },
            { name: 'opts', variadic: true },
        ]);
        assert.deepStrictEqual(run.dependencies, [{ args: [], name: 'build' }, { args: [], name: 'build' }]);
        assert.deepStrictEqual(run.subsequents, []);
        assert.strictEqual(run.private, false);
        assert.strictEqual(run.quiet, false);
        assert.strictEqual(run.default, false);
        assert.deepStrictEqual(registry.get('build').body, []);
    }

    @test
    'parseCatalog() reports the path of each problem'(): void {
        assertInvalid({ recipes: [{ name: 7 }] }, ['recipes.0.name: Expected string, received number']);
        assertInvalid({ recipes: [{ bdy: [], name: 'a' }] }, ['recipes.0: Unrecognized key(s) in object: \'bdy\'']);
        assertInvalid({ recipes: [{ name: 'two words' }] }, ['recipes.0.name: must be an identifier']);
        assertInvalid({}, ['recipes: Required']);
    }

    @test
    'parseCatalog() validates the recipes themselves'(): void {
        assert.throws(() => parseCatalog({ aliases: { d: 'deploy' }, recipes: [{ name: 'build' }] }), ResolutionError);
        assert.throws(() => parseCatalog({ recipes: [{ dependencies: ['b'], name: 'a' }] }),
            /recipe `a` depends on unknown recipe `b`/);
    }

    @test
    async 'readCatalog()'(): Promise<void> {
        const filename = path.join(CatalogTest.dir, 'runbook.json');
        await fs.writeJson(filename, {
            aliases: { b: 'build' },
            recipes: [{ body: ['@cargo build'], name: 'build' }, { body: ['@cargo test'], name: 'test' }],
        });
        const catalog = await readCatalog(filename);
        assert.deepStrictEqual(catalog.registry.list(true).map(r => r.name), ['build', 'test']);
        assert.strictEqual(catalog.aliases.resolve('b'), 'build');
    }

    @test
    async 'readCatalog() of a missing file'(): Promise<void> {
        const filename = path.join(CatalogTest.dir, 'missing.json');
        await assert.rejects(readCatalog(filename), (e: unknown) => {
            assert(e instanceof DefinitionError);
            assert.strictEqual(e.message, `no catalog found at ${filename}`);
            return true;
        });
    }

    @test
    async 'readCatalog() of malformed JSON'(): Promise<void> {
        const filename = path.join(CatalogTest.dir, 'broken.json');
        await fs.writeFile(filename, '{ "recipes": [');
        await assert.rejects(readCatalog(filename), (e: unknown) => {
            assert(e instanceof DefinitionError);
            assert.strictEqual(e.kind, 'invalid-catalog');
            assert.strictEqual(e.message, `${filename} is not valid JSON`);
            return true;
        });
    }
}
