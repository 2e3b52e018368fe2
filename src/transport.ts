import tls from 'node:tls';
import { TransportError } from './errors';
import { makeRandomServerName } from './tls';

/**
 * The byte stream a channel runs over: ordered, reliable, and already
 * secured at the record layer.
 */
export interface Transport {
  /** Write all of `data` in one call. */
  send (data: Buffer): Promise<void>;
  /**
   * Resolve with exactly `length` bytes. Rejects with a TransportError if the
   * connection closes or fails first. Only one read may be pending.
   */
  recv (length: number): Promise<Buffer>;
  /** The peer's certificate, DER encoded. */
  peerCertificateDer (): Buffer;
  close (): void;
  readonly remoteAddress?: string;
}

export type TlsConnectOptions = {
  host: string,
  port: number,
  // SNI name; a random one is used when omitted
  servername?: string,
  // idle timeout, disabled when 0 or omitted
  timeoutMs?: number,
  // relays present self-signed certificates, so this defaults to false
  rejectUnauthorized?: boolean,
}

type PendingRead = {
  length: number,
  resolve: (data: Buffer) => void,
  reject: (err: TransportError) => void,
}

export class TlsTransport implements Transport {
  socket: tls.TLSSocket;
  private chunks: Buffer[];
  private buffered: number;
  private pendingRead?: PendingRead;
  private failure?: TransportError;

  constructor (socket: tls.TLSSocket) {
    this.socket = socket;
    this.chunks = [];
    this.buffered = 0;
    socket.on('data', (data: Buffer) => {
      this.chunks.push(data);
      this.buffered += data.length;
      this.fulfillPendingRead();
    });
    socket.on('end', () => {
      this.fail(new TransportError('closed', 'Connection closed by peer'));
    });
    socket.on('close', () => {
      this.fail(new TransportError('closed', 'Connection closed'));
    });
    socket.on('error', (err) => {
      this.fail(new TransportError('io', `Connection error: ${err.message}`, { cause: err }));
    });
    socket.on('timeout', () => {
      const err = new TransportError('timeout', 'Connection timed out');
      this.fail(err);
      socket.destroy(err);
    });
  }

  static connect (options: TlsConnectOptions): Promise<TlsTransport> {
    const tlsOptions: tls.ConnectionOptions = {
      host: options.host,
      port: options.port,
      servername: options.servername ?? makeRandomServerName(),
      rejectUnauthorized: options.rejectUnauthorized ?? false,
    }
    return new Promise((resolve, reject) => {
      const socket = tls.connect(tlsOptions);
      const onError = (err: Error) => {
        socket.destroy();
        reject(new TransportError('io', `Unable to connect to ${options.host}:${options.port}: ${err.message}`, { cause: err }));
      };
      socket.once('error', onError);
      socket.once('secureConnect', () => {
        socket.off('error', onError);
        if (options.timeoutMs) {
          socket.setTimeout(options.timeoutMs);
        }
        resolve(new TlsTransport(socket));
      });
    });
  }

  get remoteAddress (): string | undefined {
    return this.socket.remoteAddress
  }

  send (data: Buffer): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise((resolve, reject) => {
      this.socket.write(data, (err) => {
        if (err) {
          reject(new TransportError('io', `Write failed: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  recv (length: number): Promise<Buffer> {
    if (this.pendingRead) {
      return Promise.reject(new TransportError('io', 'A read is already pending on this transport'));
    }
    return new Promise((resolve, reject) => {
      this.pendingRead = { length, resolve, reject };
      this.fulfillPendingRead();
    });
  }

  peerCertificateDer (): Buffer {
    const cert = this.socket.getPeerCertificate();
    if (!cert || !cert.raw) {
      throw new TransportError('io', 'Peer did not present a certificate');
    }
    return cert.raw;
  }

  close (): void {
    this.socket.end();
  }

  private fulfillPendingRead (): void {
    const pending = this.pendingRead;
    if (!pending) return;
    if (this.buffered >= pending.length) {
      this.pendingRead = undefined;
      pending.resolve(this.take(pending.length));
      return;
    }
    if (this.failure) {
      this.pendingRead = undefined;
      pending.reject(this.failure);
    }
  }

  private take (length: number): Buffer {
    const all = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.buffered);
    const data = all.subarray(0, length);
    const rest = all.subarray(length);
    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered = rest.length;
    return data;
  }

  private fail (err: TransportError): void {
    // keep the first failure, a close usually follows an error
    if (!this.failure) {
      this.failure = err;
    }
    this.fulfillPendingRead();
  }
}
