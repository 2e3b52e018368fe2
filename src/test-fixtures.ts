import { bufferFromUint } from './util';

// Builders for synthetic certificate bodies and CERTS payloads used by the
// specs.

export type ExtensionFixture = {
  type: number,
  flags?: number,
  data: Buffer,
}

export function buildEd25519CertBody ({
  version = 1,
  certType = 5,
  expirationHours = 480000,
  keyType = 3,
  certifiedKey = Buffer.alloc(32, 0xaa),
  extensions = [],
  signature = Buffer.alloc(64, 0x55),
}: {
  version?: number,
  certType?: number,
  expirationHours?: number,
  keyType?: number,
  certifiedKey?: Buffer,
  extensions?: ExtensionFixture[],
  signature?: Buffer,
} = {}): Buffer {
  return Buffer.concat([
    buildEd25519CertHeader({ version, certType, expirationHours, keyType, certifiedKey, extensions }),
    signature,
  ])
}

// everything but the signature
export function buildEd25519CertHeader ({
  version = 1,
  certType = 5,
  expirationHours = 480000,
  keyType = 3,
  certifiedKey = Buffer.alloc(32, 0xaa),
  extensions = [],
}: {
  version?: number,
  certType?: number,
  expirationHours?: number,
  keyType?: number,
  certifiedKey?: Buffer,
  extensions?: ExtensionFixture[],
}): Buffer {
  return Buffer.concat([
    bufferFromUint(1, version),
    bufferFromUint(1, certType),
    bufferFromUint(4, expirationHours),
    bufferFromUint(1, keyType),
    certifiedKey,
    bufferFromUint(1, extensions.length),
    ...extensions.map(({ type, flags = 0, data }) => Buffer.concat([
      bufferFromUint(2, data.length),
      bufferFromUint(1, type),
      bufferFromUint(1, flags),
      data,
    ])),
  ])
}

export function buildCertsPayload (entries: Array<{ type: number, body: Buffer }>, count = entries.length): Buffer {
  return Buffer.concat([
    bufferFromUint(1, count),
    ...entries.map(({ type, body }) => Buffer.concat([
      bufferFromUint(1, type),
      bufferFromUint(2, body.length),
      body,
    ])),
  ])
}
