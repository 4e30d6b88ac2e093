#!/usr/bin/env node
import {
    main,
} from './cli';
import util = require('util');

main(process.argv.slice(2)).then(code => {
    process.exitCode = code;
}, (e: unknown) => {
    process.stderr.write(`error: ${util.inspect(e)}\n`);
    process.exitCode = 1;
});
