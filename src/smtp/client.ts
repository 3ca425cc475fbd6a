import net from 'net';
import tls from 'tls';
import { StringDecoder } from 'string_decoder';
import { RunnerError, RunnerErrorCode, SmtpReplyError } from '../shared/errors';
import { DotEncoder } from './data';
import { ReplyParser, splitEnhancedCode, type Reply } from './response';
import type { SaslClient } from './sasl';

export interface SmtpClientOptions {
  host: string;
  port: number;
  /** Bound on each wait for a server reply. 0 waits indefinitely. */
  commandTimeoutMs: number;
  /** Receives every chunk sent and received, in wire order. */
  debug?: (chunk: string) => void;
}

/** Open DATA stream. `close()` sends the terminator and waits for the final reply. */
export interface DataWriter {
  write(chunk: Buffer): Promise<void>;
  close(): Promise<void>;
}

interface Waiter {
  resolve: (reply: Reply) => void;
  reject: (err: Error) => void;
}

// Replies meaning "EHLO not recognised/implemented"; only these fall back to HELO.
const EHLO_UNSUPPORTED: ReadonlySet<number> = new Set([500, 502]);

function transportError(context: string, err: Error): RunnerError {
  return new RunnerError(RunnerErrorCode.SMTP_TRANSPORT, `${context}: ${err.message}`, {
    cause: err.message,
  });
}

/**
 * Minimal command/response SMTP client. One method per command; a reply with an
 * unexpected code rejects with SmtpReplyError, socket and TLS problems reject
 * with RunnerError(SMTP_TRANSPORT).
 */
export class SmtpClient {
  private socket: net.Socket;
  private decoder = new StringDecoder('utf-8');
  private readonly parser = new ReplyParser();
  private readonly queued: Reply[] = [];
  private waiter: Waiter | null = null;
  private failure: Error | null = null;
  private readonly options: SmtpClientOptions;
  private localName = 'localhost';
  private didHello = false;
  private closed = false;

  private constructor(socket: net.Socket, options: SmtpClientOptions) {
    this.options = options;
    this.socket = socket;
    this.attach(socket);
  }

  /** Connects and consumes the 220 greeting. */
  static async connect(options: SmtpClientOptions): Promise<SmtpClient> {
    const socket = await new Promise<net.Socket>((resolve, reject) => {
      const s = net.createConnection({ host: options.host, port: options.port });
      const onError = (err: Error) => {
        s.destroy();
        reject(transportError(`connect to ${options.host}:${options.port}`, err));
      };
      s.once('error', onError);
      s.once('connect', () => {
        s.off('error', onError);
        resolve(s);
      });
    });

    const client = new SmtpClient(socket, options);
    try {
      client.expect(await client.readReply(), (code) => code === 220);
    } catch (err) {
      client.close();
      throw err;
    }
    return client;
  }

  /**
   * EHLO, falling back to HELO only when the server does not know EHLO (500/502).
   * Any other refusal is the server's answer to the greeting and is rethrown.
   */
  async hello(name: string): Promise<void> {
    this.localName = name;
    this.didHello = true;
    try {
      await this.ehlo();
    } catch (err) {
      if (!(err instanceof SmtpReplyError) || !EHLO_UNSUPPORTED.has(err.code)) throw err;
      await this.command(`HELO ${this.localName}`, (code) => code === 250);
    }
  }

  /** STARTTLS with certificate verification disabled, then a fresh EHLO. */
  async startTls(): Promise<void> {
    await this.ensureHello();
    await this.command('STARTTLS', (code) => code === 220);

    const plain = this.socket;
    this.detach(plain);
    this.parser.reset();
    const secure = await new Promise<tls.TLSSocket>((resolve, reject) => {
      const s = tls.connect({ socket: plain, rejectUnauthorized: false });
      const onError = (err: Error) => {
        s.destroy();
        reject(transportError('TLS negotiation failed', err));
      };
      s.on('error', onError);
      s.once('secureConnect', () => {
        s.off('error', onError);
        resolve(s);
      });
    });
    this.socket = secure;
    this.attach(secure);
    await this.ehlo();
  }

  async auth(sasl: SaslClient): Promise<void> {
    await this.ensureHello();
    const initial = sasl.start().toString('base64');
    await this.write(`AUTH ${sasl.mechanism} ${initial === '' ? '=' : initial}\r\n`);
    const reply = await this.readReply();
    if (reply.code === 334) {
      // single-step mechanisms only: cancel the exchange
      await this.write('*\r\n');
      await this.readReply();
      throw new RunnerError(RunnerErrorCode.SMTP_PROTOCOL, `Unexpected server challenge during AUTH ${sasl.mechanism}`);
    }
    this.expect(reply, (code) => code === 235);
  }

  async mail(from: string): Promise<void> {
    await this.ensureHello();
    await this.command(`MAIL FROM:<${from}>`, (code) => code === 250);
  }

  async rcpt(to: string): Promise<void> {
    await this.command(`RCPT TO:<${to}>`, (code) => code === 250 || code === 251);
  }

  async reset(): Promise<void> {
    await this.ensureHello();
    await this.command('RSET', (code) => code === 250);
  }

  async data(): Promise<DataWriter> {
    await this.command('DATA', (code) => code === 354);
    const encoder = new DotEncoder();
    let open = true;
    const ensureOpen = () => {
      if (!open) throw new RunnerError(RunnerErrorCode.SMTP_PROTOCOL, 'DATA stream already closed');
    };
    return {
      write: async (chunk) => {
        ensureOpen();
        await this.write(encoder.encode(chunk));
      },
      close: async () => {
        ensureOpen();
        open = false;
        await this.write(encoder.finish());
        this.expect(await this.readReply(), (code) => code === 250);
      },
    };
  }

  async quit(): Promise<void> {
    try {
      await this.command('QUIT', (code) => code === 221);
    } finally {
      this.close();
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.socket.destroy();
  }

  private async ensureHello(): Promise<void> {
    if (!this.didHello) await this.hello(this.localName);
  }

  private async ehlo(): Promise<void> {
    await this.command(`EHLO ${this.localName}`, (code) => code === 250);
  }

  private async command(line: string, accept: (code: number) => boolean): Promise<Reply> {
    await this.write(`${line}\r\n`);
    return this.expect(await this.readReply(), accept);
  }

  private expect(reply: Reply, accept: (code: number) => boolean): Reply {
    if (!accept(reply.code)) {
      const { enhancedCode, message } = splitEnhancedCode(reply);
      throw new SmtpReplyError(reply.code, message, enhancedCode);
    }
    return reply;
  }

  private write(data: string | Buffer): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);
    this.options.debug?.(typeof data === 'string' ? data : data.toString('utf-8'));
    return new Promise<void>((resolve, reject) => {
      this.socket.write(data, (err) => (err ? reject(transportError('write failed', err)) : resolve()));
    });
  }

  private readReply(): Promise<Reply> {
    const next = this.queued.shift();
    if (next) return Promise.resolve(next);
    if (this.failure) return Promise.reject(this.failure);

    return new Promise<Reply>((resolve, reject) => {
      const timeoutMs = this.options.commandTimeoutMs;
      let timer: NodeJS.Timeout | undefined;
      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          this.waiter = null;
          const err = new RunnerError(RunnerErrorCode.SMTP_TIMEOUT, `No reply from server within ${timeoutMs}ms`);
          this.fail(err);
          this.socket.destroy();
          reject(err);
        }, timeoutMs);
      }
      this.waiter = {
        resolve: (reply) => {
          clearTimeout(timer);
          resolve(reply);
        },
        reject: (err) => {
          clearTimeout(timer);
          reject(err);
        },
      };
    });
  }

  private attach(socket: net.Socket): void {
    this.decoder = new StringDecoder('utf-8');
    socket.on('data', this.onData);
    socket.on('error', this.onError);
    socket.on('close', this.onClose);
  }

  private detach(socket: net.Socket): void {
    socket.off('data', this.onData);
    socket.off('error', this.onError);
    socket.off('close', this.onClose);
  }

  private readonly onData = (chunk: Buffer | string): void => {
    const text = typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    if (text === '') return;
    this.options.debug?.(text);
    let replies: Reply[];
    try {
      replies = this.parser.push(text);
    } catch (err) {
      this.fail(err instanceof Error ? err : new Error(String(err)));
      this.socket.destroy();
      return;
    }
    for (const reply of replies) {
      const waiter = this.waiter;
      if (waiter) {
        this.waiter = null;
        waiter.resolve(reply);
      } else {
        this.queued.push(reply);
      }
    }
  };

  private readonly onError = (err: Error): void => {
    this.fail(transportError('connection error', err));
  };

  private readonly onClose = (): void => {
    this.fail(new RunnerError(RunnerErrorCode.SMTP_TRANSPORT, 'connection closed'));
  };

  private fail(err: Error): void {
    if (this.failure) return;
    this.failure = err;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.reject(err);
    }
  }
}
