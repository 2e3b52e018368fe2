export { Channel, convertCell } from './channel'
export type { HandshakeResult } from './channel'
export { Cell, CellCommands, PAYLOAD_LEN, isVariableLength, getCommandName } from './cell'
export type { CellConverter } from './cell-converter'
export {
  CertTypes,
  ExtensionTypes,
  ED25519_CERT_TYPES,
  getCertDescription,
  isEd25519CertType,
  parseEd25519Certificate,
} from './cert'
export type { Ed25519Certificate, Ed25519CertificateExtension } from './cert'
export {
  CertsCellConverter,
  decodeCerts,
  findCertificate,
  findEd25519Certificate,
  formatCerts,
} from './certs-cell'
export type { Certificate, CellCerts, OpaqueCertificate, Ed25519CertificateEntry } from './certs-cell'
export { defaultChannelOptions, resolveChannelOptions } from './config'
export type { ChannelOptions } from './config'
export { ChannelError, TransportError, isChannelError } from './errors'
export type { ChannelErrorCode, TransportErrorReason } from './errors'
export { serializeCell, readCell, writeCell } from './messaging'
export type { CircuitIdWidth } from './messaging'
export { NetInfoCellConverter, AddressTypes, decodeNetInfo, encodeNetInfo } from './netinfo-cell'
export type { CellNetInfo, NetInfoAddress } from './netinfo-cell'
export { TlsTransport } from './transport'
export type { Transport, TlsConnectOptions } from './transport'
export { VersionsCellConverter, decodeVersions, encodeVersions, negotiateVersion } from './versions-cell'
export type { CellVersions } from './versions-cell'
