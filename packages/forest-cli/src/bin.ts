import { processIO, run } from './cli.js';

run(process.argv.slice(2), processIO())
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    console.error(e);
    process.exit(1);
  });
