#!/usr/bin/env node
import { pathToFileURL } from 'node:url';
import process from 'node:process';

import { Command, CommanderError } from 'commander';
import { ZodError } from 'zod';

import { loadDotenvFiles } from '../bootstrap/env.js';
import { createProcessLogger } from '../bootstrap/logger.js';
import { launchPortalBrowser } from '../browser.js';
import { describeError } from '../errors.js';
import { attachHelp } from './help.js';
import { registerScrapeCommand } from './commands/scrape.js';
import { registerShowCommand } from './commands/show.js';
import type { CommandContext } from './commands/shared.js';

const CONFIGURATION_ERROR_EXIT_CODE = 1;

/* eslint-disable no-console */
const consoleOutput: CommandContext['output'] = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};
/* eslint-enable no-console */

export function formatCliError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('\n');
  }
  return describeError(error);
}

function buildProgram(context: CommandContext): Command {
  const program = new Command('portfolio-scraper');

  program.showHelpAfterError('(use --help for details)');
  program.allowExcessArguments(false);
  program.exitOverride();
  program.configureOutput({
    writeOut: (text) => context.output.log(text.trimEnd()),
    writeErr: (text) => context.output.error(text.trimEnd()),
  });

  registerScrapeCommand(program, context);
  registerShowCommand(program, context);

  attachHelp(program);

  return program;
}

export type CliOverrides = Partial<Omit<CommandContext, 'setExitCode'>>;

/** Resolves to the process exit code; nothing here calls `process.exit`. */
export async function runCli(
  argv: readonly string[] = process.argv.slice(2),
  overrides: CliOverrides = {},
): Promise<number> {
  let exitCode = 0;
  const context: CommandContext = {
    output: consoleOutput,
    launchBrowser: launchPortalBrowser,
    createLogger: createProcessLogger,
    ...overrides,
    setExitCode: (code) => {
      exitCode = code;
    },
  };
  const program = buildProgram(context);

  try {
    await program.parseAsync(['node', 'portfolio-scraper', ...argv]);
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.code === 'commander.helpDisplayed' || error.code === 'commander.version' ? 0 : error.exitCode;
    }
    context.output.error(formatCliError(error));
    return CONFIGURATION_ERROR_EXIT_CODE;
  }
}

const isDirectExecution = (() => {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }

  try {
    return pathToFileURL(entry).href === import.meta.url;
  } catch {
    return false;
  }
})();

if (isDirectExecution) {
  loadDotenvFiles();
  process.exitCode = await runCli();
}
