export { loadConfig, parseConfig, DEFAULT_CONFIG, CONFIG_ENV_VAR } from './config/loader';
export type { RunnerConfig } from './config/schema';
export { RunnerError, RunnerErrorCode, SmtpReplyError, isSkip } from './shared/errors';
export { createLogger, levelForVerbosity } from './shared/logger';
export { SmtpClient } from './smtp/client';
export { send, SessionError, passwordFor, QUEUED } from './runner/driver';
export type { DriverOptions, AuthFixtures } from './runner/driver';
export { waitForPort } from './runner/port-waiter';
export { Mta } from './runner/mta';
export type { MtaDescriptor } from './runner/mta';
export { TestCase, TestState } from './runner/test-case';
export { TestDir, buildTestProgram, describeExit } from './runner/test-dir';
export type { BuildFn, TestDirOptions } from './runner/test-dir';
export { runTestDir } from './runner/run-dir';
export type { DirOutcome, DirStatus, CaseOutcome } from './runner/run-dir';
export { DecisionExpectation } from './testing/expectation';
export { DecisionStep } from './testing/types';
export type { InputStep, SessionResult, Expectation, Evaluation, TestCaseDefinition, Verdict } from './testing/types';
