import { errorMessage, isSkip } from '../shared/errors';
import type { TestState } from './test-case';
import type { TestDir } from './test-dir';

export type DirStatus = 'ok' | 'failed' | 'skipped' | 'error';

export interface CaseOutcome {
  index: number;
  filename: string;
  state: TestState;
}

export interface DirOutcome {
  path: string;
  status: DirStatus;
  cases: CaseOutcome[];
  error?: string;
}

/**
 * Starts the directory's test program, runs its cases one after another against
 * the MTA, and always stops the program afterwards. Cases never overlap: the
 * filter under test is a single stateful instance.
 */
export async function runTestDir(dir: TestDir): Promise<DirOutcome> {
  try {
    await dir.start();
  } catch (err) {
    if (isSkip(err)) {
      dir.logger.info('test program asked to be skipped');
      for (const test of dir.tests) test.markSkipped(`SKIP ${test.filename}: directory skipped`);
      return { path: dir.path, status: 'skipped', cases: outcomes(dir) };
    }
    dir.logger.error({ err }, 'could not start test program');
    await dir.stop();
    return { path: dir.path, status: 'error', cases: outcomes(dir), error: errorMessage(err) };
  }

  try {
    for (const test of dir.tests) {
      await test.run(dir.mta.smtpPort);
    }
  } finally {
    await dir.stop();
  }

  const status: DirStatus = dir.failed || dir.startError !== null ? 'failed' : 'ok';
  return { path: dir.path, status, cases: outcomes(dir) };
}

function outcomes(dir: TestDir): CaseOutcome[] {
  return dir.tests.map((t) => ({ index: t.index, filename: t.filename, state: t.state }));
}
