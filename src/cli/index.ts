import { runTests } from './run-tests.js';

process.exitCode = await runTests(process.argv.slice(2));
