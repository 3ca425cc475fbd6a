export enum RunnerErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  BUILD_FAILED = 'BUILD_FAILED',
  LAUNCH_FAILED = 'LAUNCH_FAILED',
  TEST_SKIPPED = 'TEST_SKIPPED',
  READINESS_FAILED = 'READINESS_FAILED',
  SMTP_TRANSPORT = 'SMTP_TRANSPORT',
  SMTP_PROTOCOL = 'SMTP_PROTOCOL',
  SMTP_TIMEOUT = 'SMTP_TIMEOUT',
  UNKNOWN_STEP = 'UNKNOWN_STEP',
  INCOMPLETE_INPUT = 'INCOMPLETE_INPUT',
  STATE_ALREADY_SET = 'STATE_ALREADY_SET',
}

export class RunnerError extends Error {
  readonly code: RunnerErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: RunnerErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'RunnerError';
    this.code = code;
    this.context = context;
  }
}

/** An SMTP reply whose code the command did not accept (normally 4xx/5xx). */
export class SmtpReplyError extends Error {
  readonly code: number;
  readonly enhancedCode?: string;

  constructor(code: number, message: string, enhancedCode?: string) {
    super(message);
    this.name = 'SmtpReplyError';
    this.code = code;
    this.enhancedCode = enhancedCode;
  }
}

/** True when `start()` rejected because the test program asked to be skipped. */
export function isSkip(err: unknown): boolean {
  return err instanceof RunnerError && err.code === RunnerErrorCode.TEST_SKIPPED;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
