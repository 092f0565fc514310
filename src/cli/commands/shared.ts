import path from 'node:path';
import process from 'node:process';

import type { Logger, ProcessLogger, ProcessLoggerOptions } from '../../bootstrap/logger.js';
import type { BrowserSession } from '../../browser.js';
import type { LaunchOptions } from '../../config.js';
import type { DebugFlags } from '../../debugging.js';

export type CommandOutput = {
  readonly log: (line: string) => void;
  readonly error: (line: string) => void;
};

export type BrowserLauncher = (
  options: Partial<LaunchOptions>,
  flags: DebugFlags,
  logger: Logger,
) => Promise<BrowserSession>;

export type CommandContext = {
  readonly env?: NodeJS.ProcessEnv;
  readonly cwd?: string;
  readonly output: CommandOutput;
  readonly setExitCode: (code: number) => void;
  readonly launchBrowser: BrowserLauncher;
  readonly createLogger: (options: ProcessLoggerOptions) => ProcessLogger;
};

export function resolveEnv(context: CommandContext): NodeJS.ProcessEnv {
  return context.env ?? process.env;
}

export function resolvePath(context: CommandContext, value: string): string {
  return path.resolve(context.cwd ?? process.cwd(), value);
}

export function printJson(context: CommandContext, payload: unknown): void {
  context.output.log(JSON.stringify(payload, null, 2));
}
