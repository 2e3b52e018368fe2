import test from 'ava';
import { Cell, CellCommands } from './cell';
import { ChannelError, TransportError } from './errors';
import { readCell, serializeCell, stripTrailingZeros, writeCell } from './messaging';
import { MemoryTransport } from './test-transport';

test('serializeCell pads fixed cells to 509 bytes', t => {
  const data = serializeCell(new Cell(0x0102, CellCommands.CREATE2, Buffer.from([0xab, 0xcd])), 16)
  t.is(data.length, 2 + 1 + 509)
  t.is(data.subarray(0, 5).toString('hex'), '01020aabcd')
  t.true(data.subarray(5).every((byte) => byte === 0))
})

test('serializeCell length-prefixes variable cells', t => {
  const data = serializeCell(new Cell(0, CellCommands.VERSIONS, Buffer.from([0, 3, 0, 4])), 16)
  t.is(data.toString('hex'), '0000070004' + '00030004')
})

test('serializeCell writes 32 bit circuit ids', t => {
  const data = serializeCell(new Cell(0x80000001, CellCommands.VPADDING, Buffer.alloc(0)), 32)
  t.is(data.toString('hex'), '80000001800000')
})

test('serializeCell rejects a circuit id wider than the channel', t => {
  const err = t.throws(() => serializeCell(new Cell(0x10000, CellCommands.PADDING), 16), { instanceOf: ChannelError })
  t.is(err?.code, 'invalid_format')
})

test('serializeCell rejects a variable payload over 65535 bytes', t => {
  t.throws(() => serializeCell(new Cell(0, CellCommands.VPADDING, Buffer.alloc(0x10000)), 16), { instanceOf: ChannelError })
})

test('readCell decodes a VERSIONS cell from raw bytes', async t => {
  const transport = new MemoryTransport({ inbound: Buffer.from([0x00, 0x00, 0x07, 0x00, 0x02, 0x00, 0x03]) })
  const cell = await readCell(transport, 16)
  t.is(cell.circuitId, 0)
  t.is(cell.command, 7)
  t.is(cell.payload.toString('hex'), '0003')
})

test('fixed cells round trip when the payload has no trailing zero', async t => {
  const payload = Buffer.from('0001ff00fe', 'hex')
  const transport = new MemoryTransport()
  await writeCell(transport, new Cell(77, CellCommands.RELAY, payload), 32)
  transport.push(transport.sent[0])
  const cell = await readCell(transport, 32)
  t.is(cell.circuitId, 77)
  t.is(cell.command, CellCommands.RELAY)
  t.is(cell.payload.toString('hex'), '0001ff00fe')
})

test('fixed cells lose trailing zero bytes of their payload', async t => {
  const transport = new MemoryTransport()
  await writeCell(transport, new Cell(1, CellCommands.DESTROY, Buffer.from([0x05, 0x00, 0x00])), 16)
  transport.push(transport.sent[0])
  const cell = await readCell(transport, 16)
  t.is(cell.payload.toString('hex'), '05')
})

test('variable cells round trip exactly, trailing zeros included', async t => {
  const payload = Buffer.from('00aa0000', 'hex')
  const transport = new MemoryTransport()
  await writeCell(transport, new Cell(0xbeef, CellCommands.CERTS, payload), 16)
  transport.push(transport.sent[0])
  const cell = await readCell(transport, 16)
  t.is(cell.circuitId, 0xbeef)
  t.is(cell.command, CellCommands.CERTS)
  t.is(cell.payload.toString('hex'), '00aa0000')
})

test('readCell reads back to back cells in order', async t => {
  const transport = new MemoryTransport()
  await writeCell(transport, new Cell(0, CellCommands.VERSIONS, Buffer.from([0, 3])), 16)
  await writeCell(transport, new Cell(5, CellCommands.PADDING, Buffer.from([9])), 16)
  transport.push(Buffer.concat(transport.sent))
  const first = await readCell(transport, 16)
  const second = await readCell(transport, 16)
  t.is(first.command, CellCommands.VERSIONS)
  t.is(second.circuitId, 5)
  t.is(second.payload.toString('hex'), '09')
})

test('readCell passes transport errors through on a short header', async t => {
  const transport = new MemoryTransport({ inbound: Buffer.from([0x00, 0x00]) })
  const err = await t.throwsAsync(readCell(transport, 16), { instanceOf: TransportError })
  t.is(err?.reason, 'closed')
})

test('readCell fails when a variable body is cut short', async t => {
  const transport = new MemoryTransport({ inbound: Buffer.from([0x00, 0x00, 0x81, 0x00, 0x05, 0x01]) })
  await t.throwsAsync(readCell(transport, 16), { instanceOf: TransportError })
})

test('stripTrailingZeros', t => {
  t.is(stripTrailingZeros(Buffer.from([1, 0, 2, 0, 0])).toString('hex'), '010002')
  t.is(stripTrailingZeros(Buffer.alloc(509)).length, 0)
})
