import fs from 'node:fs';
import path from 'node:path';

import { ensureDirectorySync } from '../io/files.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = {
  readonly info: (message: string, ...metadata: unknown[]) => void;
  readonly warn: (message: string, ...metadata: unknown[]) => void;
  readonly error: (message: string, ...metadata: unknown[]) => void;
  readonly debug: (message: string, ...metadata: unknown[]) => void;
};

export type ProcessLogger = Logger & {
  readonly logPath: string;
  readonly close: () => Promise<void>;
};

export type ProcessLoggerOptions = {
  readonly name?: string;
  readonly directory?: string;
  /** Mirror every entry to the console; warn and error go to stderr. */
  readonly echo?: boolean;
};

function formatMetadata(metadata: readonly unknown[]): unknown[] | undefined {
  if (!metadata.length) {
    return undefined;
  }

  return metadata.map((entry) => {
    if (typeof entry === 'string') {
      return entry;
    }

    if (entry instanceof Error) {
      return { name: entry.name, message: entry.message };
    }

    try {
      return JSON.parse(JSON.stringify(entry));
    } catch (_error) {
      return String(entry);
    }
  });
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

export function serialiseLog(level: LogLevel, message: string, metadata: readonly unknown[]): string {
  const payload: Record<string, unknown> = {
    ts: formatTimestamp(),
    level,
    message,
  };

  const formattedMetadata = formatMetadata(metadata);
  if (formattedMetadata) {
    payload.metadata = formattedMetadata;
  }

  return `${JSON.stringify(payload)}\n`;
}

function echoToConsole(level: LogLevel, message: string, metadata: readonly unknown[]): void {
  const formattedMetadata = formatMetadata(metadata);
  const suffix = formattedMetadata ? ` ${JSON.stringify(formattedMetadata.length === 1 ? formattedMetadata[0] : formattedMetadata)}` : '';
  const line = `[${level}] ${message}${suffix}`;

  /* eslint-disable no-console */
  if (level === 'warn' || level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
  /* eslint-enable no-console */
}

export function createProcessLogger(options: ProcessLoggerOptions = {}): ProcessLogger {
  const { name = 'scrape', directory = path.join(process.cwd(), 'logs'), echo = false } = options;

  ensureDirectorySync(directory);

  const timestamp = formatTimestamp().replace(/[:.]/g, '-');
  const logPath = path.join(directory, `${name}-${timestamp}.log`);
  const stream = fs.createWriteStream(logPath, { flags: 'a' });

  let closed = false;

  const write = (level: LogLevel, message: string, metadata: readonly unknown[]) => {
    if (closed) {
      return;
    }

    stream.write(serialiseLog(level, message, metadata));
    if (echo && level !== 'debug') {
      echoToConsole(level, message, metadata);
    }
  };

  const close = async (): Promise<void> => {
    if (closed) {
      return;
    }
    closed = true;

    await new Promise<void>((resolve, reject) => {
      stream.once('error', reject);
      stream.end(() => resolve());
    });
  };

  return {
    logPath,
    info: (message: string, ...metadata: unknown[]) => write('info', message, metadata),
    warn: (message: string, ...metadata: unknown[]) => write('warn', message, metadata),
    error: (message: string, ...metadata: unknown[]) => write('error', message, metadata),
    debug: (message: string, ...metadata: unknown[]) => write('debug', message, metadata),
    close,
  };
}
