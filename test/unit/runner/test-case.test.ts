import { DEFAULT_CONFIG } from '../../../src/config/loader';
import { TestCase, TestState, type TestCaseParent } from '../../../src/runner/test-case';
import { RunnerErrorCode } from '../../../src/shared/errors';
import { DecisionExpectation } from '../../../src/testing/expectation';
import { DecisionStep, type InputStep, type TestCaseDefinition } from '../../../src/testing/types';
import { captureLogger, messages, type LogRecord } from '../../helpers/log';
import { freePort } from '../../helpers/net';
import { rejection, startSmtpServer, type SmtpStandIn } from '../../helpers/smtp';

const steps: InputStep[] = [
  { what: 'HELO', arg: 'a' },
  { what: 'FROM', addr: 'a@b.com' },
  { what: 'TO', addr: 'x@y.com' },
  { what: 'HEADER', data: Buffer.from('Subject: t\r\n\r\n') },
  { what: 'BODY', data: Buffer.from('hi') },
];

function fakeParent(): { parent: TestCaseParent; records: LogRecord[]; markFailedTest: jest.Mock } {
  const { logger, records } = captureLogger();
  const markFailedTest = jest.fn();
  return { parent: { config: structuredClone(DEFAULT_CONFIG), logger, markFailedTest }, records, markFailedTest };
}

function definition(expectation: DecisionExpectation): TestCaseDefinition {
  return { steps, expectation };
}

describe('TestCase', () => {
  let server: SmtpStandIn | null = null;

  afterEach(async () => {
    await server?.close();
    server = null;
  });

  it('starts ready with an empty transcript', () => {
    const { parent } = fakeParent();
    const test = new TestCase(parent, 0, '/tests/accept.yaml', 'accept.yaml', definition(new DecisionExpectation({ code: 250 })));
    expect(test.state).toBe(TestState.Ready);
    expect(test.transcript).toBe('');
  });

  it('marks itself ok when the result matches', async () => {
    server = await startSmtpServer();
    const { parent, records, markFailedTest } = fakeParent();
    const expectation = new DecisionExpectation({ code: 250, step: DecisionStep.Eom });
    const test = new TestCase(parent, 0, '/tests/accept.yaml', 'accept.yaml', definition(expectation));

    await expect(test.run(server.port)).resolves.toBe(TestState.Ok);
    expect(markFailedTest).not.toHaveBeenCalled();
    expect(messages(records)).toEqual(['OK accept.yaml: 250 OK: queued @eom']);
    expect(test.transcript).toContain('MAIL FROM:<a@b.com>\r\n');
  });

  it('marks itself failed, flags the parent and logs the transcript on a mismatch', async () => {
    server = await startSmtpServer({
      onMailFrom: (_address, _session, callback) => callback(rejection(550, 'rejected')),
    });
    const { parent, records, markFailedTest } = fakeParent();
    const expectation = new DecisionExpectation({ code: 250, step: DecisionStep.Eom });
    const test = new TestCase(parent, 1, '/tests/accept.yaml', 'accept.yaml', definition(expectation));

    await expect(test.run(server.port)).resolves.toBe(TestState.Failed);
    expect(markFailedTest).toHaveBeenCalledTimes(1);
    expect(messages(records)).toEqual([
      'FAIL accept.yaml: expected code 250, got 550 rejected @from',
      `SMTP transaction:\n${test.transcript}`,
    ]);
    expect(records[0].expected).toBe('250 @eom');
    expect(test.transcript).toContain('550 rejected');
  });

  it('treats an expected rejection as a pass', async () => {
    server = await startSmtpServer({
      onMailFrom: (_address, _session, callback) => callback(rejection(550, 'rejected')),
    });
    const { parent } = fakeParent();
    const expectation = new DecisionExpectation({ code: 550, step: DecisionStep.From });
    const test = new TestCase(parent, 0, '/tests/reject.yaml', 'reject.yaml', definition(expectation));
    await expect(test.run(server.port)).resolves.toBe(TestState.Ok);
  });

  it('marks itself failed on a driver error', async () => {
    const { parent, records, markFailedTest } = fakeParent();
    const test = new TestCase(parent, 0, '/tests/accept.yaml', 'accept.yaml', definition(new DecisionExpectation({ code: 250 })));
    const port = await freePort();

    await expect(test.run(port)).resolves.toBe(TestState.Failed);
    expect(markFailedTest).toHaveBeenCalledTimes(1);
    expect(records[0].msg).toMatch(/^FAIL accept\.yaml: session error at any: connect to 127\.0\.0\.1:\d+: /);
  });

  it('marks itself skipped when the expectation says so', async () => {
    server = await startSmtpServer();
    const { parent, records, markFailedTest } = fakeParent();
    const expectation = new DecisionExpectation({ code: 250, skip: 'needs a second MTA' });
    const test = new TestCase(parent, 0, '/tests/skip.yaml', 'skip.yaml', definition(expectation));

    await expect(test.run(server.port)).resolves.toBe(TestState.Skipped);
    expect(markFailedTest).not.toHaveBeenCalled();
    expect(messages(records)).toEqual(['SKIP skip.yaml: needs a second MTA']);
  });

  it('never changes state once it has left ready', () => {
    const { parent, markFailedTest } = fakeParent();
    const test = new TestCase(parent, 0, '/tests/x.yaml', 'x.yaml', definition(new DecisionExpectation({ code: 250 })));
    test.markOk('OK x.yaml');

    expect(() => test.markFailed('FAIL x.yaml')).toThrow(
      expect.objectContaining({ code: RunnerErrorCode.STATE_ALREADY_SET })
    );
    expect(() => test.markSkipped('SKIP x.yaml')).toThrow('x.yaml is already ok, cannot mark it skipped');
    expect(test.state).toBe(TestState.Ok);
    expect(markFailedTest).not.toHaveBeenCalled();
  });
});
