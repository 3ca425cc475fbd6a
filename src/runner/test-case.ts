import type { Logger } from 'pino';
import type { RunnerConfig } from '../config/schema';
import { RunnerError, RunnerErrorCode, errorMessage } from '../shared/errors';
import type { InputStep, SessionResult, TestCaseDefinition } from '../testing/types';
import { SessionError, send } from './driver';

export enum TestState {
  Ready = 'ready',
  Ok = 'ok',
  Skipped = 'skipped',
  Failed = 'failed',
}

/** What a test case needs from the directory that owns it. */
export interface TestCaseParent {
  readonly config: RunnerConfig;
  readonly logger: Logger;
  markFailedTest(): void;
}

export class TestCase {
  readonly index: number;
  readonly path: string;
  readonly filename: string;
  readonly definition: TestCaseDefinition;
  private readonly parent: TestCaseParent;
  private readonly smtpData: string[] = [];
  private current: TestState = TestState.Ready;

  constructor(parent: TestCaseParent, index: number, filePath: string, filename: string, definition: TestCaseDefinition) {
    this.parent = parent;
    this.index = index;
    this.path = filePath;
    this.filename = filename;
    this.definition = definition;
  }

  get state(): TestState {
    return this.current;
  }

  /** Everything sent and received in this case's SMTP sessions. */
  get transcript(): string {
    return this.smtpData.join('');
  }

  send(steps: readonly InputStep[], port: number): Promise<SessionResult> {
    const { smtp, auth } = this.parent.config;
    return send(steps, port, {
      host: smtp.host,
      commandTimeoutMs: smtp.command_timeout_ms,
      auth: { defaultPassword: auth.default_password, alternate: auth.alternate },
      transcript: (chunk) => {
        this.smtpData.push(chunk);
      },
    });
  }

  /** Runs the script against `port` and records exactly one outcome. */
  async run(port: number): Promise<TestState> {
    let result: SessionResult;
    try {
      result = await this.send(this.definition.steps, port);
    } catch (err) {
      const at = err instanceof SessionError ? ` at ${err.step}` : '';
      this.markFailed(`FAIL ${this.filename}: session error${at}: ${errorMessage(err)}`);
      return this.current;
    }

    const { verdict, reason } = this.definition.expectation.evaluate(result);
    switch (verdict) {
      case 'ok':
        this.markOk(`OK ${this.filename}: ${reason}`);
        break;
      case 'skip':
        this.markSkipped(`SKIP ${this.filename}: ${reason}`);
        break;
      case 'fail':
        this.markFailed(`FAIL ${this.filename}: ${reason}`);
        break;
    }
    return this.current;
  }

  markFailed(message: string): void {
    this.transition(TestState.Failed);
    this.parent.markFailedTest();
    this.parent.logger.trace({ expected: this.definition.expectation.describe() }, message);
    this.parent.logger.trace(`SMTP transaction:\n${this.transcript}`);
  }

  markSkipped(message: string): void {
    this.transition(TestState.Skipped);
    this.parent.logger.trace(message);
  }

  markOk(message: string): void {
    this.transition(TestState.Ok);
    this.parent.logger.trace(message);
  }

  private transition(next: TestState): void {
    if (this.current !== TestState.Ready) {
      throw new RunnerError(
        RunnerErrorCode.STATE_ALREADY_SET,
        `${this.filename} is already ${this.current}, cannot mark it ${next}`
      );
    }
    this.current = next;
  }
}
