import fs from 'fs/promises';
import path from 'path';
import type { Logger } from 'pino';
import type { RunnerConfig } from '../config/schema';
import { RunnerError, RunnerErrorCode, errorMessage } from '../shared/errors';
import { launch, run, type ExitResult, type SupervisedProcess } from '../shared/exec';
import { logger as defaultLogger } from '../shared/logger';
import { sleep } from '../shared/timers';
import type { TestCaseDefinition } from '../testing/types';
import type { MtaDescriptor } from './mta';
import { waitForPort } from './port-waiter';
import { TestCase, type TestCaseParent } from './test-case';

/** Compiles the test program found in `sourceDir` into the executable `output`. */
export type BuildFn = (sourceDir: string, output: string, config: RunnerConfig) => Promise<void>;

export const buildTestProgram: BuildFn = async (sourceDir, output, config) => {
  const [command, ...args] = config.build.command.map((part) => part.split('{output}').join(output));
  const result = await run(command, args, { cwd: sourceDir, timeoutMs: config.build.timeout_ms });
  if (result.exitCode === 0) return;

  const how = result.timedOut ? `timed out after ${config.build.timeout_ms}ms` : describeExit(result);
  throw new RunnerError(RunnerErrorCode.BUILD_FAILED, `build of ${sourceDir} failed: ${how}`, {
    dir: sourceDir,
    output,
    command: [command, ...args].join(' '),
    log: result.output,
  });
};

export interface TestDirOptions {
  index: number;
  path: string;
  config: RunnerConfig;
  mta: MtaDescriptor;
  logger?: Logger;
  build?: BuildFn;
}

export function describeExit(exit: ExitResult): string {
  if (exit.spawnError !== undefined) return `failed to start: ${exit.spawnError}`;
  if (exit.signal !== null) return `terminated by ${exit.signal}`;
  return `exit status ${exit.exitCode}`;
}

/**
 * One directory of test cases sharing a single running test program.
 *
 * start() builds and launches the program and resolves once its milter port
 * accepts connections; stop() terminates it. A background drain owns the process
 * promise: it records the exit, dumps the program's combined output when the exit
 * was unexpected or a test failed, and aborts any readiness wait still running.
 */
export class TestDir implements TestCaseParent {
  readonly index: number;
  readonly path: string;
  readonly config: RunnerConfig;
  readonly mta: MtaDescriptor;
  readonly logger: Logger;
  readonly tests: TestCase[] = [];
  private readonly build: BuildFn;

  private proc: SupervisedProcess | null = null;
  private drained: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private starting = false;
  private stopRequested = false;
  // Written by the drain and by test cases; the event loop serializes both.
  private exit: ExitResult | null = null;
  private failedTest = false;

  constructor(options: TestDirOptions) {
    this.index = options.index;
    this.path = options.path;
    this.config = options.config;
    this.mta = options.mta;
    this.logger = (options.logger ?? defaultLogger).child({ dir: options.path });
    this.build = options.build ?? buildTestProgram;
  }

  addTest(filePath: string, definition: TestCaseDefinition): TestCase {
    const test = new TestCase(this, this.tests.length, filePath, path.basename(filePath), definition);
    this.tests.push(test);
    return test;
  }

  get scratchDir(): string {
    return path.join(this.config.scratch_dir, `test-${this.index}`);
  }

  /** True once any owned test case has failed. */
  get failed(): boolean {
    return this.failedTest;
  }

  get exitResult(): ExitResult | null {
    return this.exit;
  }

  /** The program's exit as an error, when it ended other than as expected. */
  get startError(): RunnerError | null {
    const exit = this.exit;
    if (exit === null || this.isExpectedExit(exit)) return null;
    return new RunnerError(RunnerErrorCode.LAUNCH_FAILED, `test program ${describeExit(exit)}`, {
      exitCode: exit.exitCode,
      signal: exit.signal,
    });
  }

  get running(): boolean {
    return this.proc !== null;
  }

  async start(): Promise<void> {
    if (this.stopping !== null || this.proc !== null || this.starting) {
      throw new RunnerError(RunnerErrorCode.LAUNCH_FAILED, `${this.path} was already started or stopped`);
    }
    this.starting = true;

    const scratch = this.scratchDir;
    await fs.mkdir(scratch, { recursive: true, mode: 0o700 });
    const exe = path.join(scratch, 'test.exe');
    await this.build(this.path, exe, this.config);
    // stop() may have run while building; nothing is launched after it
    await this.throwIfStopped();

    const port = this.config.milter_port;
    const args = ['-network', 'tcp', '-address', `:${port}`, '-tags', this.mta.tags.join(' ')];
    const proc = launch(exe, args);
    this.proc = proc;
    const exited = new AbortController();
    this.drained = this.drain(proc, exited);

    // early-exit window: a program that skips or crashes on startup is gone by now
    await sleep(this.config.startup_grace_ms, exited.signal);
    await this.throwIfStopped();
    const early = this.exit;
    if (early !== null) {
      this.proc = null;
      if (early.exitCode === this.config.exit_codes.skip) {
        throw new RunnerError(RunnerErrorCode.TEST_SKIPPED, 'test skipped', { dir: this.path });
      }
      throw new RunnerError(RunnerErrorCode.LAUNCH_FAILED, `test program ${describeExit(early)}`, {
        dir: this.path,
        output: early.output,
      });
    }

    const signal = AbortSignal.any([exited.signal, AbortSignal.timeout(this.config.readiness_timeout_ms)]);
    try {
      await waitForPort(port, { signal });
    } catch (err) {
      await this.throwIfStopped();
      await this.stop();
      if (this.exit?.exitCode === this.config.exit_codes.skip) {
        throw new RunnerError(RunnerErrorCode.TEST_SKIPPED, 'test skipped', { dir: this.path });
      }
      throw new RunnerError(RunnerErrorCode.READINESS_FAILED, `port ${port} never became ready: ${errorMessage(err)}`, {
        dir: this.path,
        exit: this.exit ? describeExit(this.exit) : null,
      });
    }
    await this.throwIfStopped();
  }

  /** Rejects once a stop() issued during start() has finished terminating the program. */
  private async throwIfStopped(): Promise<void> {
    const stopping = this.stopping;
    if (stopping === null) return;
    await stopping;
    throw new RunnerError(RunnerErrorCode.LAUNCH_FAILED, `${this.path} was stopped while starting`, {
      dir: this.path,
    });
  }

  /** Terminates the test program once; later calls share the first call's promise. */
  stop(): Promise<void> {
    this.stopping ??= this.terminate();
    return this.stopping;
  }

  markFailedTest(): void {
    this.failedTest = true;
    this.mta.markFailedTest();
  }

  private async terminate(): Promise<void> {
    const proc = this.proc;
    this.proc = null;
    if (proc !== null) {
      this.stopRequested = true;
      proc.kill('SIGTERM', this.config.kill_timeout_ms);
    }
    await this.drained;
  }

  private async drain(proc: SupervisedProcess, exited: AbortController): Promise<void> {
    const exit = await proc.exited;
    this.exit = exit;
    const unexpected = !this.isExpectedExit(exit);
    if (unexpected) {
      this.logger.debug({ exitCode: exit.exitCode, signal: exit.signal }, `test program ${describeExit(exit)}`);
    }
    if (unexpected || this.failedTest) {
      this.logger.debug(`DIR ${this.path}\n${exit.output}`);
    }
    exited.abort();
  }

  private isExpectedExit(exit: ExitResult): boolean {
    if (exit.exitCode === this.config.exit_codes.clean) return true;
    if (exit.exitCode === this.config.exit_codes.skip) return true;
    return this.stopRequested && exit.signal === 'SIGTERM';
  }
}
