#!/usr/bin/env node
import { run } from './cli';

// interrupted runs print nothing on stdout
process.on('SIGINT', () => {
  process.stderr.write('doctrine-check: interrupted\n');
  process.exit(130);
});

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`doctrine-check: ${String(err)}`);
    process.exitCode = 2;
  }
);
