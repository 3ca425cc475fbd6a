import { DecisionStep, type Evaluation, type Expectation, type SessionResult } from './types';

export interface DecisionExpectationOptions {
  code: number;
  step?: DecisionStep;
  messageContains?: string;
  /** Set when the case does not apply to the MTA being driven. */
  skip?: string;
}

/**
 * Exact reply code, a decision step (`any` matches every step) and an optional
 * message substring.
 */
export class DecisionExpectation implements Expectation {
  private readonly code: number;
  private readonly step: DecisionStep;
  private readonly messageContains?: string;
  private readonly skipReason?: string;

  constructor(options: DecisionExpectationOptions) {
    this.code = options.code;
    this.step = options.step ?? DecisionStep.Any;
    this.messageContains = options.messageContains;
    this.skipReason = options.skip;
  }

  evaluate(result: SessionResult): Evaluation {
    if (this.skipReason !== undefined) {
      return { verdict: 'skip', reason: this.skipReason };
    }
    const got = `${result.code} ${result.message} @${result.step}`;
    if (result.code !== this.code) {
      return { verdict: 'fail', reason: `expected code ${this.code}, got ${got}` };
    }
    if (this.step !== DecisionStep.Any && result.step !== DecisionStep.Any && result.step !== this.step) {
      return { verdict: 'fail', reason: `expected decision at ${this.step}, got ${got}` };
    }
    if (this.messageContains !== undefined && !result.message.includes(this.messageContains)) {
      return { verdict: 'fail', reason: `expected message containing "${this.messageContains}", got ${got}` };
    }
    return { verdict: 'ok', reason: got };
  }

  describe(): string {
    const msg = this.messageContains !== undefined ? ` "${this.messageContains}"` : '';
    return `${this.code} @${this.step}${msg}`;
  }
}
