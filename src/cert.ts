import { ChannelError } from './errors';
import { BytesReader } from './util';

export type Ed25519CertificateExtension = {
  type: number;
  flags: number;
  data: Buffer;
}

export type Ed25519Certificate = {
  // the CERTS entry tag this certificate arrived under
  certType: number;
  // the CERT_TYPE byte inside the certificate body
  embeddedCertType: number;
  version: number;
  expirationHours: number;
  keyType: number;
  certifiedKey: Buffer;
  extensions: Array<Ed25519CertificateExtension>;
  signature: Buffer;
  signedWith: Buffer | undefined;
  // every byte before the signature, i.e. what the signature covers
  preSignature: Buffer;
}

export const CertTypes = {
	/// TLS link key, signed with RSA identity. X.509 format. (Obsolete)
	TLS_LINK_X509: 0x01,
	/// Self-signed RSA identity certificate. X.509 format. (Legacy)
	RSA_ID_X509: 0x02,
	/// RSA lnk authentication key signed with RSA identity
	/// key. X.509 format. (Obsolete)
	LINK_AUTH_X509: 0x03,

	/// Identity verifying a signing key, directly.
	IDENTITY_V_SIGNING: 0x04,

	/// Signing key verifying a TLS certificate by digest.
	SIGNING_V_TLS_CERT: 0x05,

	/// Signing key verifying a link authentication key.
	SIGNING_V_LINK_AUTH: 0x06,

	/// RSA identity key certifying an Ed25519 identity key. RSA
	/// crosscert format. (Legacy)
	RSA_ID_V_IDENTITY: 0x07,

	/// For onion services: short-term descriptor signing key
	/// (`KP_hs_desc_sign`), signed with blinded onion service identity
	/// (`KP_hs_blind_id`).
	HS_BLINDED_ID_V_SIGNING: 0x08,

	/// For onion services: Introduction point authentication key
	/// (`KP_hs_ipt_sid`), signed with short term descriptor signing key
	/// (`KP_hs_desc_sign`).
	HS_IP_V_SIGNING: 0x09,

	/// An ntor key converted to a ed25519 key, cross-certifying an
	/// identity key.
	NTOR_CC_IDENTITY: 0x0A,

	/// For onion services: Ntor encryption key (`KP_hss_ntor`),
	/// converted to ed25519, signed with the descriptor signing key
	/// (`KP_hs_desc_sign`).
	HS_IP_CC_SIGNING: 0x0B,
} as const

// CERTS entries with these types carry the Ed25519 certificate format
export const ED25519_CERT_TYPES: readonly number[] = [
  CertTypes.IDENTITY_V_SIGNING,
  CertTypes.SIGNING_V_TLS_CERT,
  CertTypes.SIGNING_V_LINK_AUTH,
  CertTypes.HS_BLINDED_ID_V_SIGNING,
  CertTypes.HS_IP_V_SIGNING,
  CertTypes.NTOR_CC_IDENTITY,
  CertTypes.HS_IP_CC_SIGNING,
]

export const isEd25519CertType = (type: number): boolean => ED25519_CERT_TYPES.includes(type)

const certDescriptions: Record<number, string> = {
	[CertTypes.TLS_LINK_X509]: 'Link key certificate certified by RSA1024 identity',
	[CertTypes.RSA_ID_X509]: 'RSA1024 Identity certificate, self-signed.',
	[CertTypes.LINK_AUTH_X509]: 'RSA1024 AUTHENTICATE cell link certificate, signed with RSA1024 key.',
	[CertTypes.IDENTITY_V_SIGNING]: 'Ed25519 signing key, signed with identity key.',
	[CertTypes.SIGNING_V_TLS_CERT]: 'TLS link certificate, signed with ed25519 signing key.',
	[CertTypes.SIGNING_V_LINK_AUTH]: 'Ed25519 AUTHENTICATE cell key, signed with ed25519 signing key.',
	[CertTypes.RSA_ID_V_IDENTITY]: 'Ed25519 identity, signed with RSA identity.',
	[CertTypes.HS_BLINDED_ID_V_SIGNING]: 'Onion service descriptor signing key, signed with blinded identity.',
	[CertTypes.HS_IP_V_SIGNING]: 'Onion service introduction point authentication key.',
	[CertTypes.NTOR_CC_IDENTITY]: 'Ntor onion key cross-certifying ed25519 identity.',
	[CertTypes.HS_IP_CC_SIGNING]: 'Onion service ntor encryption key, signed with descriptor signing key.',
};

export function getCertDescription (type: number): string {
	return certDescriptions[type] || 'Unknown'
}

/// Extension identifiers for extensions in certificates.
export const ExtensionTypes = {
  /// Extension indicating an Ed25519 key that signed this certificate.
  ///
  /// Certificates do not always contain the key that signed them.
  SIGNED_WITH_ED25519_KEY: 0x04,
} as const

const ED25519_KEY_LEN = 32
const ED25519_SIGNATURE_LEN = 64

// certType is the tag from the enclosing CERTS entry and wins over the
// CERT_TYPE byte in the body
export function parseEd25519Certificate (certBody: Buffer, certType: number): Ed25519Certificate {
  try {
    return readEd25519Certificate(certBody, certType)
  } catch (err) {
    if (err instanceof ChannelError) {
      throw new ChannelError('invalid_format', `Invalid ed25519 certificate (type ${certType}): ${err.message}`, { cause: err })
    }
    throw err
  }
}

function readEd25519Certificate (certBody: Buffer, certType: number): Ed25519Certificate {
  const reader = new BytesReader(certBody);
  // VERSION         [1 Byte]
  // CERT_TYPE       [1 Byte]
  // EXPIRATION_DATE [4 Bytes]
  // CERT_KEY_TYPE   [1 byte]
  // CERTIFIED_KEY   [32 Bytes]
  // N_EXTENSIONS    [1 byte]
  // EXTENSIONS      [N_EXTENSIONS times]
  // SIGNATURE       [64 Bytes]
  const version = reader.readUIntBE(1)
  const embeddedCertType = reader.readUIntBE(1)
  const expirationHours = reader.readUIntBE(4)
  const keyType = reader.readUIntBE(1)
  const certifiedKey = reader.readBytes(ED25519_KEY_LEN)

  const nExtensions = reader.readUIntBE(1);
  const extensions: Ed25519CertificateExtension[] = [];
  for (let index = 0; index < nExtensions; index++) {
    // ExtLength [2 bytes]
    // ExtType   [1 byte]
    // ExtFlags  [1 byte]
    // ExtData   [ExtLength bytes]
    const length = reader.readUIntBE(2);
    extensions.push({
      type: reader.readUIntBE(1),
      flags: reader.readUIntBE(1),
      data: reader.readBytes(length),
    })
  }

  if (reader.remaining !== ED25519_SIGNATURE_LEN) {
    throw new ChannelError('invalid_format', `Expected ${ED25519_SIGNATURE_LEN} signature bytes after extensions, found ${reader.remaining}`);
  }
  const signatureOffset = reader.offset;
  const signature = reader.readBytes(ED25519_SIGNATURE_LEN);

  const keyExtension = extensions.find(({ type }) => type === ExtensionTypes.SIGNED_WITH_ED25519_KEY);

  return {
    certType,
    embeddedCertType,
    version,
    expirationHours,
    keyType,
    certifiedKey,
    extensions,
    signature,
    signedWith: keyExtension?.data,
    preSignature: certBody.subarray(0, signatureOffset),
  }
}
