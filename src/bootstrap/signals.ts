export type Signals = 'SIGINT' | 'SIGTERM';

export type Closer = () => void | Promise<void>;

type ErrorReporter = (message: string, error: unknown) => void;

const closersStack: Closer[] = [];
const closersSet = new Set<Closer>();

let shuttingDown = false;
let bound = false;

const SIGNALS_TO_HANDLE: Signals[] = ['SIGINT', 'SIGTERM'];

// eslint-disable-next-line no-console
const reportToConsole: ErrorReporter = (message, error) => console.error(message, error);

/** Runs every registered closer, most recent first. A failing closer does not stop the rest. */
export async function runClosers(report: ErrorReporter = reportToConsole): Promise<void> {
  const recordedClosers = closersStack.slice();
  closersStack.length = 0;

  for (let index = recordedClosers.length - 1; index >= 0; index -= 1) {
    const closer = recordedClosers[index];
    if (!closersSet.has(closer)) {
      continue;
    }

    closersSet.delete(closer);

    try {
      await closer();
    } catch (error) {
      report('[signals] closer failed:', error);
    }
  }

  closersSet.clear();
}

async function shutdown(signal: Signals): Promise<void> {
  if (shuttingDown) {
    return;
  }

  shuttingDown = true;
  await runClosers();

  // Re-raise so Node terminates with the conventional status for the signal.
  setImmediate(() => {
    try {
      process.kill(process.pid, signal);
    } catch (error) {
      reportToConsole('[signals] could not re-raise the signal:', error);
    }
  });
}

export function bindProcessSignals(): void {
  if (bound) {
    return;
  }
  bound = true;

  for (const signal of SIGNALS_TO_HANDLE) {
    process.once(signal, () => {
      // eslint-disable-next-line no-console
      console.error(`Received ${signal}, closing the browser...`);
      void shutdown(signal);
    });
  }
}

export function registerCloser(closer: Closer): () => void {
  closersStack.push(closer);
  closersSet.add(closer);

  return () => {
    closersSet.delete(closer);
  };
}
