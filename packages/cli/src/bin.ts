#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import process from 'node:process';
import { runCli } from './cli.js';

function supportsColor(): boolean {
  if (process.env.NO_COLOR === '1') return false;
  if (process.env.FORCE_COLOR === '1') return true;
  return process.stdout.isTTY === true;
}

process.exitCode = runCli(process.argv.slice(2), {
  readFile: (file) => readFileSync(file, 'utf-8'),
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  color: supportsColor(),
});
