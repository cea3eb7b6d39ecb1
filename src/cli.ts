#!/usr/bin/env node
/**
 * CLI entry point for outbound-recorder.
 * Usage: outbound-recorder report <log.ndjson> [filters] | prune <log.ndjson> --older-than-days N
 */

import { parsePruneArgs, parseReportArgs, runPrune, runReport } from './cli/report';

const args = process.argv.slice(2);
const command = args[0];
const HELP_COMMANDS = new Set(['help', '--help', '-h']);
const VERSION_COMMANDS = new Set(['version', '--version', '-v']);

function usage(): void {
  console.error('Usage: outbound-recorder report <log.ndjson> [--status <code> ...] [--method <METHOD> ...] [--url <text>]');
  console.error('                                [--since <ISO>] [--until <ISO>] [--min-duration-ms <N>] [--contains <text>] [--limit <N>]');
  console.error('       outbound-recorder prune <log.ndjson> --older-than-days <N>');
  console.error('       outbound-recorder --help');
  console.error('       outbound-recorder --version');
  console.error('  report: prints a summary and the matching outbound requests, newest first.');
  console.error('  prune: removes requests recorded more than N days ago.');
}

function printVersion(): void {
  // dist/cli.js -> ../package.json, src/cli.ts -> ../package.json
  // eslint-disable-next-line @typescript-eslint/no-var-requires
  const pkg: { version?: string } = require('../package.json');
  process.stdout.write(`outbound-recorder ${pkg.version ?? '0.0.0'}\n`);
}

async function main(): Promise<number> {
  if (!command || HELP_COMMANDS.has(command)) {
    usage();
    return command ? 0 : 1;
  }
  if (VERSION_COMMANDS.has(command)) {
    printVersion();
    return 0;
  }
  try {
    if (command === 'report') {
      const parsed = parseReportArgs(args.slice(1));
      if (!parsed.ok) {
        console.error(parsed.error);
        usage();
        return 1;
      }
      await runReport(parsed.value, {
        color: process.stdout.isTTY,
        write: (line) => process.stdout.write(line + '\n'),
      });
      return 0;
    }
    if (command === 'prune') {
      const parsed = parsePruneArgs(args.slice(1));
      if (!parsed.ok) {
        console.error(parsed.error);
        usage();
        return 1;
      }
      const removed = await runPrune(parsed.value);
      process.stdout.write(`Removed ${removed} request log(s) from ${parsed.value.file}\n`);
      return 0;
    }
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
  usage();
  return 1;
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
