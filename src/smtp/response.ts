import { RunnerError, RunnerErrorCode } from '../shared/errors';

export interface Reply {
  code: number;
  /** Text of each line with the code and separator removed. */
  lines: string[];
}

const REPLY_LINE = /^(\d{3})(?:([ -])(.*))?$/;
const ENHANCED_CODE = /^[245]\.\d{1,3}\.\d{1,3}$/;

/**
 * Incremental parser for server replies. Multi-line replies ("250-a", "250 b")
 * are folded into one Reply once the final line arrives.
 */
export class ReplyParser {
  private buffer = '';
  private partial: Reply | null = null;

  push(chunk: string): Reply[] {
    this.buffer += chunk;
    const complete: Reply[] = [];

    let newlineIdx = this.buffer.indexOf('\n');
    while (newlineIdx !== -1) {
      const line = this.buffer.slice(0, newlineIdx).replace(/\r$/, '');
      this.buffer = this.buffer.slice(newlineIdx + 1);
      newlineIdx = this.buffer.indexOf('\n');

      const match = REPLY_LINE.exec(line);
      if (!match) {
        throw new RunnerError(RunnerErrorCode.SMTP_PROTOCOL, `Malformed SMTP reply line: ${JSON.stringify(line)}`);
      }
      const code = parseInt(match[1], 10);
      const text = match[3] ?? '';
      const reply: Reply = this.partial ?? { code, lines: [] };
      reply.lines.push(text);

      if (match[2] === '-') {
        this.partial = reply;
      } else {
        this.partial = null;
        complete.push(reply);
      }
    }
    return complete;
  }

  reset(): void {
    this.buffer = '';
    this.partial = null;
  }
}

/**
 * Splits an RFC 2034 enhanced status code off a reply. The code is repeated on
 * every line of a multi-line reply and is removed from each of them.
 */
export function splitEnhancedCode(reply: Reply): { enhancedCode?: string; message: string } {
  const message = reply.lines.join('\n');
  const first = reply.lines[0] ?? '';
  const spaceIdx = first.indexOf(' ');
  if (spaceIdx === -1) return { message };

  const candidate = first.slice(0, spaceIdx);
  if (!ENHANCED_CODE.test(candidate)) return { message };

  const stripped = reply.lines.map((l) => (l.startsWith(candidate + ' ') ? l.slice(candidate.length + 1) : l));
  return { enhancedCode: candidate, message: stripped.join('\n') };
}
