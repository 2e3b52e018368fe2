import { Cell, CellCommands } from './cell';
import type { CellConverter } from './cell-converter';
import {
  getCertDescription,
  isEd25519CertType,
  parseEd25519Certificate,
} from './cert';
import type { Ed25519Certificate } from './cert';
import { ChannelError } from './errors';
import { BytesReader } from './util';

export type OpaqueCertificate = {
  kind: 'opaque',
  type: number,
  body: Buffer,
}

export type Ed25519CertificateEntry = {
  kind: 'ed25519',
  type: number,
  cert: Ed25519Certificate,
}

export type Certificate = OpaqueCertificate | Ed25519CertificateEntry

export type CellCerts = {
  certs: Certificate[]
};

export function decodeCerts (payload: Buffer): Certificate[] {
  // N: Number of certs in cell            [1 octet]
  // N times:
  //    CertType                           [1 octet]
  //    CLEN                               [2 octets]
  //    Certificate                        [CLEN octets]
  const reader = new BytesReader(payload)
  if (reader.isExhausted()) {
    throw new ChannelError('invalid_format', 'CERTS payload is empty')
  }
  const certs: Certificate[] = []
  const numCerts = reader.readUIntBE(1)
  for (let i = 0; i < numCerts; i++) {
    const type = reader.readUIntBE(1)
    const certLength = reader.readUIntBE(2)
    const body = reader.readBytes(certLength)
    if (isEd25519CertType(type)) {
      certs.push({ kind: 'ed25519', type, cert: parseEd25519Certificate(body, type) })
    } else {
      certs.push({ kind: 'opaque', type, body })
    }
  }
  return certs
}

export function findCertificate (certs: Certificate[], type: number): Certificate | undefined {
  return certs.find((cert) => cert.type === type)
}

export function findEd25519Certificate (certs: Certificate[], type: number): Ed25519Certificate | undefined {
  for (const entry of certs) {
    if (entry.kind === 'ed25519' && entry.type === type) {
      return entry.cert
    }
  }
  return undefined
}

export function formatCerts (certs: Certificate[]): string[] {
  const lines: string[] = []
  for (const entry of certs) {
    lines.push(`#${entry.type} ${getCertDescription(entry.type)}`)
    if (entry.kind === 'opaque') {
      lines.push(`  body: ${entry.body.length} bytes`)
      continue
    }
    const { cert } = entry
    lines.push(`  version: ${cert.version}`)
    lines.push(`  expirationHours: ${cert.expirationHours}`)
    lines.push(`  keyType: ${cert.keyType}`)
    lines.push(`  certifiedKey: ${cert.certifiedKey.toString('hex')}`)
    lines.push(`  extensions: (${cert.extensions.length})`)
    for (const { type, flags, data } of cert.extensions) {
      lines.push(`    type=${type} flags=${flags} data=${data.toString('hex')}`)
    }
    if (cert.signedWith) {
      lines.push(`  signedWith: ${cert.signedWith.toString('hex')}`)
    }
  }
  return lines
}

// CERTS cells are only ever received by this channel
export const CertsCellConverter: CellConverter<CellCerts> = {
  command: CellCommands.CERTS,
  fromCell (cell: Cell): CellCerts {
    return { certs: decodeCerts(cell.payload) }
  },
  fromKeywords (_keywords: CellCerts): CellCerts {
    throw new ChannelError('not_implemented', 'Building CERTS cells is not supported')
  },
  toCell (_value: CellCerts): Cell {
    throw new ChannelError('not_implemented', 'Sending CERTS cells is not supported')
  },
}
