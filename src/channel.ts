import { CellCommands, getCommandName } from './cell';
import type { Cell } from './cell';
import type { CellConverter } from './cell-converter';
import { CertTypes } from './cert';
import type { Ed25519Certificate } from './cert';
import {
  CertsCellConverter,
  findEd25519Certificate,
} from './certs-cell';
import type { Certificate } from './certs-cell';
import { resolveChannelOptions } from './config';
import type { ChannelOptions } from './config';
import { ChannelError } from './errors';
import { readCell, writeCell } from './messaging';
import type { CircuitIdWidth } from './messaging';
import {
  NetInfoCellConverter,
  netInfoAddressFromIp,
} from './netinfo-cell';
import type { CellNetInfo } from './netinfo-cell';
import { TlsTransport } from './transport';
import type { TlsConnectOptions, Transport } from './transport';
import { VersionsCellConverter, negotiateVersion } from './versions-cell';
import { keysMatch, sha256 } from './util';

export type HandshakeResult = {
  linkProtocolVersion: number,
  peerVersions: number[],
  certs: Certificate[],
  signingCert: Ed25519Certificate,
  peerNetInfo: CellNetInfo,
}

/**
 * A link to one relay over one transport. Not safe for overlapping
 * receives: a cell is read as header then body, so callers must await each
 * `receive` before starting the next.
 */
export class Channel {
  transport: Transport;
  circuitIdWidth: CircuitIdWidth;
  linkVersions: number[];
  linkProtocolVersion?: number;

  constructor (transport: Transport, options: ChannelOptions = {}) {
    const { circuitIdWidth, linkVersions } = resolveChannelOptions(options)
    this.transport = transport;
    this.circuitIdWidth = circuitIdWidth;
    this.linkVersions = linkVersions;
  }

  static async connect (options: TlsConnectOptions & ChannelOptions): Promise<Channel> {
    // validate before opening a socket
    const channelOptions = resolveChannelOptions(options)
    const transport = await TlsTransport.connect(options)
    return new Channel(transport, channelOptions)
  }

  send (cell: Cell): Promise<void> {
    return writeCell(this.transport, cell, this.circuitIdWidth)
  }

  receive (): Promise<Cell> {
    return readCell(this.transport, this.circuitIdWidth)
  }

  async sendTyped<T, K> (value: T, converter: CellConverter<T, K>): Promise<void> {
    const cell = converter.toCell(value)
    await this.send(cell)
  }

  async receiveTyped<T, K> (converter: CellConverter<T, K>): Promise<T> {
    const cell = await this.receive()
    return convertCell(cell, converter)
  }

  /**
   * Binds the TLS connection to a SIGNING_V_TLS_CERT: its certified key must
   * be the SHA-256 of the peer's DER certificate.
   *
   * Only the binding is checked. The certificate's signature, expiry and
   * chain back to the relay identity are not, so success alone does not
   * authenticate the relay.
   */
  verifyPeerIdentity (signingCert: Ed25519Certificate): void {
    if (signingCert.certType !== CertTypes.SIGNING_V_TLS_CERT) {
      throw new ChannelError('cert_mismatch', `Expected a signing->TLS certificate (type ${CertTypes.SIGNING_V_TLS_CERT}), got type ${signingCert.certType}`)
    }
    // sha256 hash of (DER-encoded) peer certificate for this connection
    const peerCertSha256 = sha256(this.transport.peerCertificateDer())
    if (!keysMatch(peerCertSha256, signingCert.certifiedKey)) {
      throw new ChannelError('cert_mismatch', 'Peer cert did not authenticate TLS cert')
    }
  }

  /**
   * Unauthenticated initiator handshake: VERSIONS out, then VERSIONS, CERTS,
   * AUTH_CHALLENGE and NETINFO in, then our NETINFO out. AUTH_CHALLENGE is
   * read but not answered, since we do not authenticate.
   */
  async clientHandshake (): Promise<HandshakeResult> {
    // The first VERSIONS cell always uses 2 byte circuit ids
    if (this.circuitIdWidth !== 16) {
      throw new ChannelError('invalid_format', 'The link handshake needs a channel with 16 bit circuit ids')
    }
    const ourVersions = VersionsCellConverter.fromKeywords({ versions: this.linkVersions })
    await this.sendTyped(ourVersions, VersionsCellConverter)

    const { versions: peerVersions } = await this.receiveTyped(VersionsCellConverter)
    const linkProtocolVersion = negotiateVersion(this.linkVersions, peerVersions)
    if (linkProtocolVersion === undefined) {
      throw new ChannelError('invalid_version', `No shared link protocol version (ours: ${this.linkVersions.join(',')}, theirs: ${peerVersions.join(',')})`)
    }
    this.linkProtocolVersion = linkProtocolVersion

    const { certs } = await this.receiveTyped(CertsCellConverter)
    const signingCert = findEd25519Certificate(certs, CertTypes.SIGNING_V_TLS_CERT)
    if (!signingCert) {
      throw new ChannelError('invalid_format', 'Missing signing->TLS cert')
    }
    this.verifyPeerIdentity(signingCert)

    const authChallengeCell = await this.receive()
    assertCommand(authChallengeCell, CellCommands.AUTH_CHALLENGE)

    const peerNetInfo = await this.receiveTyped(NetInfoCellConverter)

    await this.sendTyped({
      //   Clients SHOULD send "0" as their timestamp, to
      //  avoid fingerprinting.
      time: 0,
      otherAddress: netInfoAddressFromIp(this.transport.remoteAddress),
      addresses: [],
    }, NetInfoCellConverter)

    return {
      linkProtocolVersion,
      peerVersions,
      certs,
      signingCert,
      peerNetInfo,
    }
  }

  close (): void {
    this.transport.close()
  }
}

export function convertCell<T, K> (cell: Cell, converter: CellConverter<T, K>): T {
  assertCommand(cell, converter.command)
  return converter.fromCell(cell)
}

function assertCommand (cell: Cell, command: number): void {
  if (cell.command !== command) {
    throw new ChannelError('invalid_format', `Expected a ${getCommandName(command)} cell, got ${cell.commandName}`)
  }
}
