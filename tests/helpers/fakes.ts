import { ProcessExit, ProcessLauncher, RunningProcess } from '../../src/services/media/processRunner.js';
import { ProgressEvent } from '../../src/types/media.js';

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

export interface FakeProcessScript {
  lines?: string[];
  exit?: ProcessExit;
  /** Keep the process running after the last line until kill() */
  hang?: boolean;
  /** Runs after the last line, before the process exits */
  beforeExit?: () => Promise<void>;
}

export interface FakeProcess extends RunningProcess {
  readonly killCount: number;
}

/**
 * In-process stand-in for a yt-dlp child
 */
export function fakeProcess(script: FakeProcessScript): FakeProcess {
  const killed = deferred<void>();
  const finished = deferred<void>();
  let killCount = 0;

  async function* lines(): AsyncGenerator<string> {
    for (const line of script.lines ?? []) {
      yield line;
    }
    if (script.hang) {
      await killed.promise;
    }
    if (script.beforeExit) {
      await script.beforeExit();
    }
    finished.resolve();
  }

  const exit: Promise<ProcessExit> = script.hang
    ? killed.promise.then((): ProcessExit => ({ code: null, signal: 'SIGTERM' }))
    : finished.promise.then(() => script.exit ?? { code: 0, signal: null });

  return {
    lines: lines(),
    exit,
    kill: () => {
      killCount += 1;
      killed.resolve();
    },
    get killCount() {
      return killCount;
    },
  };
}

export interface RecordingLauncher {
  launcher: ProcessLauncher;
  calls: Array<{ command: string; args: string[] }>;
}

export function recordingLauncher(child: RunningProcess): RecordingLauncher {
  const calls: Array<{ command: string; args: string[] }> = [];
  return {
    calls,
    launcher: (command, args) => {
      calls.push({ command, args });
      return child;
    },
  };
}

export async function collect(events: AsyncIterable<ProgressEvent>): Promise<ProgressEvent[]> {
  const collected: ProgressEvent[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
}
