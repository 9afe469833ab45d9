#!/usr/bin/env tsx
/**
 * muni-harvest CLI Entry Point
 *
 * Loads .env, wires SIGINT to run cancellation and dispatches to the
 * registered commands.
 *
 * @module muni-harvest-cli
 */

import { Command } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { registerExtractCommand } from '../src/cli/commands/extract.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function createProgram(signal: AbortSignal): Command {
  const program = new Command();

  program
    .name('muni-harvest')
    .description('Extract structured municipality records from an encyclopedia index page')
    .version(getVersion(), '-V, --version', 'Output the version number');

  registerExtractCommand(program, { signal });

  return program;
}

async function main(): Promise<void> {
  loadDotenv();

  const controller = new AbortController();
  process.once('SIGINT', () => {
    controller.abort(new Error('Interrupted by user'));
  });

  await createProgram(controller.signal).parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(`Fatal: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = EXIT_CODES.ERRORS;
});
