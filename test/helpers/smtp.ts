import { SMTPServer, type SMTPServerOptions } from 'smtp-server';

export interface SmtpStandIn {
  port: number;
  received: string[];
  mailFrom: string[];
  secureMailFrom: boolean[];
  authenticated: Array<{ username: string; password: string }>;
  close(): Promise<void>;
}

export function rejection(code: number, message: string): Error {
  return Object.assign(new Error(message), { responseCode: code });
}

/**
 * In-process MTA stand-in on an ephemeral port. Accepts everything unless the
 * given hooks say otherwise.
 */
export async function startSmtpServer(
  hooks: Pick<SMTPServerOptions, 'onMailFrom' | 'onRcptTo'> & { rejectData?: Error } = {}
): Promise<SmtpStandIn> {
  const received: string[] = [];
  const mailFrom: string[] = [];
  const secureMailFrom: boolean[] = [];
  const authenticated: Array<{ username: string; password: string }> = [];

  const server = new SMTPServer({
    logger: false,
    authOptional: true,
    allowInsecureAuth: true,
    onAuth(auth, _session, callback) {
      authenticated.push({ username: auth.username ?? '', password: auth.password ?? '' });
      callback(null, { user: auth.username });
    },
    onMailFrom(address, session, callback) {
      mailFrom.push(address.address);
      secureMailFrom.push(session.secure);
      if (hooks.onMailFrom) {
        hooks.onMailFrom(address, session, callback);
      } else {
        callback();
      }
    },
    onRcptTo: hooks.onRcptTo,
    onData(stream, _session, callback) {
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('end', () => {
        received.push(Buffer.concat(chunks).toString('utf-8'));
        callback(hooks.rejectData ?? null);
      });
    },
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.server.address();
  if (address === null || typeof address === 'string') throw new Error('smtp stand-in has no TCP address');
  const port = address.port;

  return {
    port,
    received,
    mailFrom,
    secureMailFrom,
    authenticated,
    close: () => new Promise<void>((resolve) => server.close(() => resolve())),
  };
}
