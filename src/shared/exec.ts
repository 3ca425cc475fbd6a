import execa from 'execa';

type ExecaChildProcess = execa.ExecaChildProcess;

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
}

/** How a supervised process ended. `exitCode` is null when a signal ended it or it never spawned. */
export interface ExitResult {
  exitCode: number | null;
  signal: string | null;
  /** stdout and stderr, interleaved as written. */
  output: string;
  spawnError?: string;
}

export interface CommandResult extends ExitResult {
  timedOut: boolean;
}

export interface SupervisedProcess {
  readonly pid: number | undefined;
  /** Settles once the process has exited and its combined output is drained. Never rejects. */
  readonly exited: Promise<ExitResult>;
  kill(signal: NodeJS.Signals, forceAfterMs: number): void;
}

function spawn(command: string, args: string[], options: ExecOptions | undefined): ExecaChildProcess {
  return execa(command, args, {
    cwd: options?.cwd,
    env: options?.env,
    timeout: options?.timeoutMs,
    all: true,
    reject: false,
    stdin: 'ignore',
  });
}

// With reject: false execa resolves on every failure; the rejection branch covers option errors.
function settle(child: ExecaChildProcess, command: string): Promise<CommandResult> {
  return child.then(
    (result) => {
      const spawned = typeof result.exitCode === 'number' || result.signal !== undefined;
      return {
        exitCode: typeof result.exitCode === 'number' ? result.exitCode : null,
        signal: result.signal ?? null,
        output: result.all ?? '',
        spawnError: spawned ? undefined : result instanceof Error ? result.message : `failed to spawn ${command}`,
        timedOut: result.timedOut,
      };
    },
    (err: unknown) => ({
      exitCode: null,
      signal: null,
      output: '',
      spawnError: err instanceof Error ? err.message : String(err),
      timedOut: false,
    })
  );
}

/** Runs a command to completion, e.g. the build of a test program. Never rejects. */
export function run(command: string, args: string[], options?: ExecOptions): Promise<CommandResult> {
  return settle(spawn(command, args, options), command);
}

/**
 * Launches a long-running program with stdout and stderr interleaved into one
 * buffer, for supervision rather than for a result.
 */
export function launch(command: string, args: string[], options?: ExecOptions): SupervisedProcess {
  const child = spawn(command, args, options);
  const exited = settle(child, command);

  return {
    pid: child.pid,
    exited,
    kill(signal, forceAfterMs) {
      child.kill(signal, { forceKillAfterTimeout: forceAfterMs });
    },
  };
}
