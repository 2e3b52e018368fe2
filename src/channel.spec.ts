import test from 'ava';
import { Cell, CellCommands } from './cell';
import { parseEd25519Certificate } from './cert';
import { Channel } from './channel';
import { CertsCellConverter } from './certs-cell';
import { ChannelError, TransportError } from './errors';
import { serializeCell } from './messaging';
import { encodeNetInfo } from './netinfo-cell';
import { MemoryTransport } from './test-transport';
import { buildCertsPayload, buildEd25519CertBody } from './test-fixtures';
import { VersionsCellConverter, encodeVersions } from './versions-cell';
import { sha256 } from './util';

const peerCert = Buffer.from('test-peer-certificate')

const signingCertFor = (der: Buffer, certType = 5) =>
  parseEd25519Certificate(buildEd25519CertBody({ certType, certifiedKey: sha256(der) }), certType)

const rawCells = (...cells: Cell[]): Buffer => Buffer.concat(cells.map((cell) => serializeCell(cell, 16)))

const relayHandshakeCells = ({ versions = [3, 4, 5], certifiedKey = sha256(peerCert) }: { versions?: number[], certifiedKey?: Buffer } = {}): Buffer => rawCells(
  encodeVersions(versions),
  new Cell(0, CellCommands.CERTS, buildCertsPayload([
    { type: 2, body: Buffer.from('rsa-identity') },
    { type: 4, body: buildEd25519CertBody({ certType: 4 }) },
    { type: 5, body: buildEd25519CertBody({ certType: 5, certifiedKey }) },
  ])),
  // 32 byte challenge, one method
  new Cell(0, CellCommands.AUTH_CHALLENGE, Buffer.concat([Buffer.alloc(32, 0x42), Buffer.from([0x00, 0x01, 0x00, 0x03])])),
  encodeNetInfo({ time: 1700000000, otherAddress: { type: 4, address: '10.0.0.2' }, addresses: [{ type: 4, address: '10.0.0.1' }] }),
)

test('a new channel uses 16 bit circuit ids', t => {
  const channel = new Channel(new MemoryTransport())
  t.is(channel.circuitIdWidth, 16)
  t.deepEqual(channel.linkVersions, [3])
  t.is(channel.linkProtocolVersion, undefined)
})

test('the channel rejects link versions that need 32 bit circuit ids', t => {
  const err = t.throws(() => new Channel(new MemoryTransport(), { linkVersions: [3, 4] }), { instanceOf: ChannelError })
  t.is(err?.code, 'invalid_version')
})

test('send writes one framed cell', async t => {
  const transport = new MemoryTransport()
  const channel = new Channel(transport)
  await channel.send(new Cell(0, CellCommands.VERSIONS, Buffer.from([0, 3])))
  t.is(transport.sent.length, 1)
  t.is(transport.sent[0].toString('hex'), '00000700020003')
})

test('receive decodes the raw VERSIONS bytes', async t => {
  const channel = new Channel(new MemoryTransport({ inbound: Buffer.from([0x00, 0x00, 0x07, 0x00, 0x02, 0x00, 0x03]) }))
  const cell = await channel.receive()
  t.is(cell.circuitId, 0)
  t.is(cell.command, 7)
  t.is(cell.payload.toString('hex'), '0003')
  t.deepEqual(VersionsCellConverter.fromCell(cell).versions, [3])
})

test('sendTyped does not touch the transport when encoding fails', async t => {
  const transport = new MemoryTransport()
  const channel = new Channel(transport)
  const err = await t.throwsAsync(channel.sendTyped({ versions: [1, 6] }, VersionsCellConverter), { instanceOf: ChannelError })
  t.is(err?.code, 'invalid_version')
  t.is(transport.sent.length, 0)
  const notImplemented = await t.throwsAsync(channel.sendTyped({ certs: [] }, CertsCellConverter), { instanceOf: ChannelError })
  t.is(notImplemented?.code, 'not_implemented')
  t.is(transport.sent.length, 0)
})

test('sendTyped then receiveTyped round trips versions', async t => {
  const transport = new MemoryTransport()
  const channel = new Channel(transport)
  await channel.sendTyped({ versions: [1, 3, 5] }, VersionsCellConverter)
  transport.push(transport.sent[0])
  t.deepEqual(await channel.receiveTyped(VersionsCellConverter), { versions: [1, 3, 5] })
})

test('receiveTyped rejects a cell of another command', async t => {
  const transport = new MemoryTransport({ inbound: rawCells(new Cell(0, CellCommands.CERTS, Buffer.from([0]))) })
  const channel = new Channel(transport)
  const err = await t.throwsAsync(channel.receiveTyped(VersionsCellConverter), { instanceOf: ChannelError })
  t.is(err?.code, 'invalid_format')
})

test('receive passes transport errors through', async t => {
  const channel = new Channel(new MemoryTransport())
  const err = await t.throwsAsync(channel.receive(), { instanceOf: TransportError })
  t.is(err?.reason, 'closed')
})

test('verifyPeerIdentity accepts the certificate whose digest is certified', t => {
  const channel = new Channel(new MemoryTransport({ peerCert }))
  t.notThrows(() => channel.verifyPeerIdentity(signingCertFor(peerCert)))
})

test('verifyPeerIdentity rejects a different certificate', t => {
  const channel = new Channel(new MemoryTransport({ peerCert }))
  const err = t.throws(() => channel.verifyPeerIdentity(signingCertFor(Buffer.from('some-other-certificate'))), { instanceOf: ChannelError })
  t.is(err?.code, 'cert_mismatch')
})

test('verifyPeerIdentity only takes signing->TLS certificates', t => {
  const channel = new Channel(new MemoryTransport({ peerCert }))
  const err = t.throws(() => channel.verifyPeerIdentity(signingCertFor(peerCert, 4)), { instanceOf: ChannelError })
  t.is(err?.code, 'cert_mismatch')
})

test('verifyPeerIdentity passes through a missing peer certificate', t => {
  const channel = new Channel(new MemoryTransport())
  t.throws(() => channel.verifyPeerIdentity(signingCertFor(peerCert)), { instanceOf: TransportError })
})

test('clientHandshake negotiates, checks the TLS binding and sends NETINFO', async t => {
  const transport = new MemoryTransport({ inbound: relayHandshakeCells(), peerCert, remoteAddress: '10.0.0.2' })
  const channel = new Channel(transport)
  const result = await channel.clientHandshake()
  t.is(result.linkProtocolVersion, 3)
  t.is(channel.linkProtocolVersion, 3)
  t.deepEqual(result.peerVersions, [3, 4, 5])
  t.deepEqual(result.certs.map(({ type }) => type), [2, 4, 5])
  t.is(result.signingCert.certType, 5)
  t.deepEqual(result.peerNetInfo, {
    time: 1700000000,
    otherAddress: { type: 4, address: '10.0.0.2' },
    addresses: [{ type: 4, address: '10.0.0.1' }],
  })
  t.is(transport.sent.length, 2)
  t.is(transport.sent[0].toString('hex'), '00000700020003')
  const netInfo = transport.sent[1]
  t.is(netInfo.length, 3 + 509)
  t.is(netInfo.subarray(0, 3 + 11).toString('hex'), '000008' + '00000000' + '04040a000002' + '00')
  t.is(transport.inbound.length, 0)
})

test('clientHandshake fails without a shared version', async t => {
  const transport = new MemoryTransport({ inbound: relayHandshakeCells({ versions: [4, 5] }), peerCert })
  const err = await t.throwsAsync(new Channel(transport).clientHandshake(), { instanceOf: ChannelError })
  t.is(err?.code, 'invalid_version')
  t.is(transport.sent.length, 1)
})

test('clientHandshake fails when the TLS certificate is not certified', async t => {
  const transport = new MemoryTransport({ inbound: relayHandshakeCells({ certifiedKey: Buffer.alloc(32) }), peerCert })
  const err = await t.throwsAsync(new Channel(transport).clientHandshake(), { instanceOf: ChannelError })
  t.is(err?.code, 'cert_mismatch')
  t.is(transport.sent.length, 1)
})

test('clientHandshake fails without a signing->TLS cert', async t => {
  const inbound = rawCells(
    encodeVersions([3]),
    new Cell(0, CellCommands.CERTS, buildCertsPayload([{ type: 4, body: buildEd25519CertBody({ certType: 4 }) }])),
  )
  const err = await t.throwsAsync(new Channel(new MemoryTransport({ inbound, peerCert })).clientHandshake(), { instanceOf: ChannelError })
  t.is(err?.code, 'invalid_format')
})

test('clientHandshake needs a 16 bit channel', async t => {
  const transport = new MemoryTransport()
  const err = await t.throwsAsync(new Channel(transport, { circuitIdWidth: 32 }).clientHandshake(), { instanceOf: ChannelError })
  t.is(err?.code, 'invalid_format')
  t.is(transport.sent.length, 0)
})

test('close closes the transport', t => {
  const transport = new MemoryTransport()
  new Channel(transport).close()
  t.true(transport.closed)
})
