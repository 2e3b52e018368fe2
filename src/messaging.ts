import { Cell, PAYLOAD_LEN, isVariableLength } from './cell';
import { ChannelError } from './errors';
import { bufferFromUint } from './util';
import type { Transport } from './transport';

// CIRCID_LEN is 2 for link protocol versions 1, 2, and 3.  CIRCID_LEN
// is 4 for link protocol version 4 or higher.  The first VERSIONS cell,
// and any cells sent before the first VERSIONS cell, always have
// CIRCID_LEN == 2 for backward compatibility.
export type CircuitIdWidth = 16 | 32

export const circuitIdLength = (width: CircuitIdWidth): number => width / 8

export function serializeCell (cell: Cell, circuitIdWidth: CircuitIdWidth): Buffer {
  // On a version 1 connection, each cell contains the following
  // fields:

  //      CircID                                [CIRCID_LEN bytes]
  //      Command                               [1 byte]
  //      Payload (padded with padding bytes)   [PAYLOAD_LEN bytes]

  // On a version 2 or higher connection, all cells are as in version 1
  // connections, except for variable-length cells, whose format is:

  //      CircID                                [CIRCID_LEN octets]
  //      Command                               [1 octet]
  //      Length                                [2 octets; big-endian integer]
  //      Payload (some commands MAY pad)       [Length bytes]
  const { circuitId, command, payload } = cell
  const cellData = [
    bufferFromUint(circuitIdLength(circuitIdWidth), circuitId),
    bufferFromUint(1, command),
  ];
  if (isVariableLength(command)) {
    if (payload.length > 0xffff) {
      throw new ChannelError('invalid_format', `Variable length payload of ${payload.length} bytes does not fit a 16 bit length`)
    }
    cellData.push(bufferFromUint(2, payload.length));
    cellData.push(payload);
  } else {
    cellData.push(payload);
    const paddingLength = PAYLOAD_LEN - payload.length;
    if (paddingLength > 0) {
      cellData.push(Buffer.alloc(paddingLength));
    }
  }
  return Buffer.concat(cellData);
}

export async function writeCell (transport: Transport, cell: Cell, circuitIdWidth: CircuitIdWidth): Promise<void> {
  const serializedCell = serializeCell(cell, circuitIdWidth)
  await transport.send(serializedCell)
}

export async function readCell (transport: Transport, circuitIdWidth: CircuitIdWidth): Promise<Cell> {
  const idLength = circuitIdLength(circuitIdWidth)
  const header = await transport.recv(idLength + 1)
  const circuitId = header.readUIntBE(0, idLength)
  const command = header.readUInt8(idLength)
  let payload: Buffer
  if (isVariableLength(command)) {
    const length = (await transport.recv(2)).readUInt16BE(0)
    payload = await transport.recv(length)
  } else {
    payload = stripTrailingZeros(await transport.recv(PAYLOAD_LEN))
  }
  return new Cell(circuitId, command, payload)
}

// Fixed cells carry no length, so padding and a payload that really ends in
// zero bytes look the same; both are stripped.
export function stripTrailingZeros (data: Buffer): Buffer {
  let end = data.length
  while (end > 0 && data[end - 1] === 0) {
    end--
  }
  return data.subarray(0, end)
}
