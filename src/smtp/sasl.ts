export interface SaslClient {
  readonly mechanism: string;
  /** Initial response sent with the AUTH command. */
  start(): Buffer;
}

/** RFC 4616 PLAIN: authzid NUL authcid NUL passwd. */
export function plainClient(identity: string, username: string, password: string): SaslClient {
  return {
    mechanism: 'PLAIN',
    start: () => Buffer.from(`${identity}\0${username}\0${password}`, 'utf-8'),
  };
}
