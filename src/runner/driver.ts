import { RunnerError, RunnerErrorCode, SmtpReplyError, errorMessage } from '../shared/errors';
import { SmtpClient, type DataWriter } from '../smtp/client';
import { plainClient } from '../smtp/sasl';
import { DecisionStep, type InputStep, type SessionResult } from '../testing/types';

export interface AuthFixtures {
  defaultPassword: string;
  alternate: { identity: string; password: string };
}

export interface DriverOptions {
  host: string;
  commandTimeoutMs: number;
  auth: AuthFixtures;
  /** Mirror of all client traffic. */
  transcript?: (chunk: string) => void;
}

/** A driver fault, attributed to the protocol stage that was running. */
export class SessionError extends RunnerError {
  readonly step: DecisionStep;

  constructor(step: DecisionStep, cause: unknown) {
    const fault = toRunnerError(cause);
    super(fault.code, fault.message, fault.context);
    this.name = 'SessionError';
    this.step = step;
  }
}

function toRunnerError(cause: unknown): RunnerError {
  if (cause instanceof RunnerError) return cause;
  if (cause instanceof SmtpReplyError) {
    return new RunnerError(RunnerErrorCode.SMTP_PROTOCOL, cause.message, { replyCode: cause.code });
  }
  return new RunnerError(RunnerErrorCode.SMTP_TRANSPORT, errorMessage(cause));
}

export const QUEUED: SessionResult = { code: 250, message: 'OK: queued', step: DecisionStep.Eom };

export function passwordFor(identity: string, auth: AuthFixtures): string {
  return identity === auth.alternate.identity ? auth.alternate.password : auth.defaultPassword;
}

/**
 * Runs one scripted SMTP session against `port`. A negative reply to a step
 * becomes the session result for the stage it answered; everything else,
 * including a refused greeting, rejects with a SessionError. The only
 * successful end is a BODY step whose final reply accepts the message.
 */
export async function send(steps: readonly InputStep[], port: number, options: DriverOptions): Promise<SessionResult> {
  let client: SmtpClient;
  try {
    client = await SmtpClient.connect({
      host: options.host,
      port,
      commandTimeoutMs: options.commandTimeoutMs,
      debug: options.transcript,
    });
  } catch (err) {
    // a refused connection or greeting is a driver fault, not a decision
    throw new SessionError(DecisionStep.Any, err);
  }

  try {
    let data: DataWriter | null = null;
    for (const step of steps) {
      const kind: string = step.what;
      let outcome: SessionResult | undefined;
      switch (step.what) {
        case 'HELO':
          outcome = await attempt(DecisionStep.Helo, () => client.hello(step.arg));
          break;
        case 'STARTTLS':
          outcome = await attempt(DecisionStep.Any, () => client.startTls());
          break;
        case 'AUTH':
          outcome = await attempt(DecisionStep.Any, () =>
            client.auth(plainClient('', step.arg, passwordFor(step.arg, options.auth)))
          );
          break;
        case 'FROM':
          outcome = await attempt(DecisionStep.From, () => client.mail(step.addr));
          break;
        case 'TO':
          outcome = await attempt(DecisionStep.To, () => client.rcpt(step.addr));
          break;
        case 'RESET':
          outcome = await attempt(DecisionStep.Any, () => client.reset());
          break;
        case 'HEADER': {
          let writer: DataWriter;
          try {
            writer = await client.data();
          } catch (err) {
            return replyOrThrow(err, DecisionStep.Data);
          }
          data = writer;
          outcome = await attempt(DecisionStep.Any, () => writeTo(data, step.data));
          break;
        }
        case 'BODY': {
          outcome = await attempt(DecisionStep.Any, () => writeTo(data, step.data));
          if (outcome) return outcome;
          outcome = await attempt(DecisionStep.Eom, () => closeData(data));
          if (outcome) return outcome;
          try {
            await client.quit();
          } catch (err) {
            options.transcript?.(`# QUIT after queued message failed: ${errorMessage(err)}\n`);
          }
          return QUEUED;
        }
        default:
          throw new SessionError(
            DecisionStep.Any,
            new RunnerError(RunnerErrorCode.UNKNOWN_STEP, `unknown step ${kind}`)
          );
      }
      if (outcome) return outcome;
    }
    throw new SessionError(
      DecisionStep.Eom,
      new RunnerError(RunnerErrorCode.INCOMPLETE_INPUT, 'incomplete input sequence')
    );
  } finally {
    client.close();
  }
}

async function attempt(step: DecisionStep, action: () => Promise<void>): Promise<SessionResult | undefined> {
  try {
    await action();
    return undefined;
  } catch (err) {
    return replyOrThrow(err, step);
  }
}

function replyOrThrow(err: unknown, step: DecisionStep): SessionResult {
  if (err instanceof SmtpReplyError) {
    return { code: err.code, message: err.message, step };
  }
  if (err instanceof SessionError) throw err;
  throw new SessionError(step, err);
}

function openData(data: DataWriter | null): DataWriter {
  if (data === null) {
    throw new RunnerError(RunnerErrorCode.SMTP_PROTOCOL, 'no DATA stream open: BODY needs a preceding HEADER step');
  }
  return data;
}

function writeTo(data: DataWriter | null, chunk: Buffer): Promise<void> {
  return openData(data).write(chunk);
}

function closeData(data: DataWriter | null): Promise<void> {
  return openData(data).close();
}
