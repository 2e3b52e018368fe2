import { TransportError } from './errors';
import type { Transport } from './transport';

// In-memory transport for tests: serves scripted inbound bytes and records
// everything sent.
export class MemoryTransport implements Transport {
  inbound: Buffer;
  sent: Buffer[];
  peerCert: Buffer | undefined;
  remoteAddress?: string;
  closed: boolean;

  constructor ({
    inbound = Buffer.alloc(0),
    peerCert,
    remoteAddress,
  }: { inbound?: Buffer, peerCert?: Buffer, remoteAddress?: string } = {}) {
    this.inbound = inbound;
    this.sent = [];
    this.peerCert = peerCert;
    this.remoteAddress = remoteAddress;
    this.closed = false;
  }

  push (data: Buffer): void {
    this.inbound = Buffer.concat([this.inbound, data]);
  }

  async send (data: Buffer): Promise<void> {
    if (this.closed) {
      throw new TransportError('closed', 'Connection closed');
    }
    this.sent.push(data);
  }

  async recv (length: number): Promise<Buffer> {
    if (this.inbound.length < length) {
      throw new TransportError('closed', `Connection closed with ${this.inbound.length} of ${length} bytes available`);
    }
    const data = this.inbound.subarray(0, length);
    this.inbound = this.inbound.subarray(length);
    return data;
  }

  peerCertificateDer (): Buffer {
    if (!this.peerCert) {
      throw new TransportError('io', 'Peer did not present a certificate');
    }
    return this.peerCert;
  }

  close (): void {
    this.closed = true;
  }
}
