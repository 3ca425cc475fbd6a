import net from 'net';
import { sleep } from '../shared/timers';

export interface WaitForPortOptions {
  /** Aborting ends the wait: deadline, or the program under test exiting. */
  signal: AbortSignal;
  host?: string;
  intervalMs?: number;
}

/**
 * Polls until `host:port` accepts a TCP connection. Each probe socket is closed
 * straight away. Rejects with the last connection error once the signal aborts.
 */
export async function waitForPort(port: number, options: WaitForPortOptions): Promise<void> {
  const host = options.host ?? '127.0.0.1';
  const intervalMs = options.intervalMs ?? 100;
  let lastError: Error | null = null;

  while (!options.signal.aborted) {
    try {
      await probe(host, port, options.signal);
      return;
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
    }
    await sleep(intervalMs, options.signal);
  }
  throw lastError ?? abortError(options.signal);
}

function probe(host: string, port: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    const onAbort = () => {
      socket.destroy();
      reject(abortError(signal));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    socket.once('connect', () => {
      signal.removeEventListener('abort', onAbort);
      socket.destroy();
      resolve();
    });
    socket.once('error', (err) => {
      signal.removeEventListener('abort', onAbort);
      socket.destroy();
      reject(err);
    });
  });
}

function abortError(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error('port wait aborted');
}
