/** The MTA flavour a test directory is driven through. */
export interface MtaDescriptor {
  readonly name: string;
  /** Passed to the test program as `-tags`. */
  readonly tags: readonly string[];
  /** SMTP listener of the MTA; sessions are sent here, not to the milter. */
  readonly smtpPort: number;
  markFailedTest(): void;
}

export class Mta implements MtaDescriptor {
  readonly name: string;
  readonly tags: readonly string[];
  readonly smtpPort: number;
  private failed = false;

  constructor(name: string, tags: readonly string[], smtpPort: number) {
    this.name = name;
    this.tags = tags;
    this.smtpPort = smtpPort;
  }

  markFailedTest(): void {
    this.failed = true;
  }

  get hasFailedTest(): boolean {
    return this.failed;
  }
}
