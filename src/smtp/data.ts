const CR = 0x0d;
const LF = 0x0a;
const DOT = 0x2e;

/**
 * Encodes message content for the DATA phase across any number of writes:
 * bare LF becomes CRLF and a dot at the start of a line is doubled.
 */
export class DotEncoder {
  private atLineStart = true;
  private lastWasCR = false;

  encode(chunk: Buffer): Buffer {
    const out: number[] = [];
    for (const byte of chunk) {
      if (this.atLineStart && byte === DOT) out.push(DOT);
      if (byte === LF && !this.lastWasCR) out.push(CR);
      out.push(byte);
      this.atLineStart = byte === LF;
      this.lastWasCR = byte === CR;
    }
    return Buffer.from(out);
  }

  /** Terminator, preceded by CRLF when the content did not end a line. */
  finish(): Buffer {
    const tail = this.atLineStart ? '.\r\n' : '\r\n.\r\n';
    this.atLineStart = true;
    this.lastWasCR = false;
    return Buffer.from(tail, 'ascii');
  }
}
