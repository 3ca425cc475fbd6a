/** Protocol stage a reply (or failure) is attributed to. Diagnostic only. */
export enum DecisionStep {
  Any = 'any',
  Helo = 'helo',
  From = 'from',
  To = 'to',
  Data = 'data',
  Eom = 'eom',
}

export type InputStep =
  | { what: 'HELO'; arg: string }
  | { what: 'STARTTLS' }
  | { what: 'AUTH'; arg: string }
  | { what: 'FROM'; addr: string }
  | { what: 'TO'; addr: string }
  | { what: 'RESET' }
  | { what: 'HEADER'; data: Buffer }
  | { what: 'BODY'; data: Buffer };

export interface SessionResult {
  code: number;
  message: string;
  step: DecisionStep;
}

export type Verdict = 'ok' | 'skip' | 'fail';

export interface Evaluation {
  verdict: Verdict;
  reason: string;
}

/** Judges a session result against what the test case expects. */
export interface Expectation {
  evaluate(result: SessionResult): Evaluation;
  describe(): string;
}

export interface TestCaseDefinition {
  steps: InputStep[];
  expectation: Expectation;
}
