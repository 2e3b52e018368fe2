import net from 'node:net';
import { Cell, CellCommands, PAYLOAD_LEN } from './cell';
import type { CellConverter } from './cell-converter';
import { ChannelError } from './errors';
import { BytesReader, bufferFromUint } from './util';

export const AddressTypes = {
  IPv4: 4,
  IPv6: 6,
} as const

export type NetInfoAddress = {
  address: string,
  type: number,
}

export type CellNetInfo = {
  time: number,
  otherAddress: NetInfoAddress | undefined,
  addresses: Array<NetInfoAddress>,
};

//   TIME       (Timestamp)                     [4 bytes]
//   OTHERADDR  (Other OR's address)            [variable]
//      ATYPE   (Address type)                  [1 byte]
//      ALEN    (Address length)                [1 byte]
//      AVAL    (Address value in NBO)          [ALEN bytes]
//   NMYADDR    (Number of this OR's addresses) [1 byte]
//     NMYADDR times:
//       ATYPE   (Address type)                 [1 byte]
//       ALEN    (Address length)               [1 byte]
//       AVAL    (Address value in NBO))        [ALEN bytes]

// Recognized address types (ATYPE) are:

//  [04] IPv4.
//  [06] IPv6.
// ALEN MUST be 4 when ATYPE is 0x04 (IPv4) and 16 when ATYPE is 0x06
// (IPv6).

export function decodeNetInfo (payload: Buffer): CellNetInfo {
  // NETINFO is fixed length, so trailing zero fields were stripped on receive
  const padded = payload.length < PAYLOAD_LEN
    ? Buffer.concat([payload, Buffer.alloc(PAYLOAD_LEN - payload.length)])
    : payload
  const reader = new BytesReader(padded)
  const time = reader.readUIntBE(4)
  const otherAddress = readNetInfoAddress(reader)
  const numMyAddresses = reader.readUIntBE(1);
  const addresses: NetInfoAddress[] = [];
  for (let j = 0; j < numMyAddresses; j++) {
    const address = readNetInfoAddress(reader)
    if (address !== undefined) {
      addresses.push(address);
    }
  }
  return { time, otherAddress, addresses };
}

export function encodeNetInfo ({ time, otherAddress, addresses }: CellNetInfo): Cell {
  const payloadBytes = Buffer.concat([
    bufferFromUint(4, time),
    serializeNetInfoAddress(otherAddress),
    bufferFromUint(1, addresses.length),
    ...addresses.map((addressInfo) => serializeNetInfoAddress(addressInfo)),
  ])
  return new Cell(0, CellCommands.NETINFO, payloadBytes)
}

export function netInfoAddressFromIp (ip: string | undefined): NetInfoAddress | undefined {
  if (ip === undefined) return undefined
  if (net.isIPv4(ip)) return { address: ip, type: AddressTypes.IPv4 }
  if (net.isIPv6(ip)) {
    // IPv4 peers on a dual stack socket show up as ::ffff:a.b.c.d
    const mapped = /^::ffff:(\d+\.\d+\.\d+\.\d+)$/i.exec(ip)
    if (mapped) return { address: mapped[1], type: AddressTypes.IPv4 }
    return { address: ip, type: AddressTypes.IPv6 }
  }
  return undefined
}

// an address of an unrecognized type is skipped, as the reader expects
function readNetInfoAddress (reader: BytesReader): NetInfoAddress | undefined {
  const type = reader.readUIntBE(1)
  const length = reader.readUIntBE(1)
  const addressBytes = reader.readBytes(length)
  if (type === AddressTypes.IPv4 && length === 4) {
    return { address: addressBytes.join('.'), type }
  }
  if (type === AddressTypes.IPv6 && length === 16) {
    return { address: formatIPv6(addressBytes), type }
  }
  if (type === AddressTypes.IPv4 || type === AddressTypes.IPv6) {
    throw new ChannelError('invalid_format', `Invalid address length ${length} for address type ${type}`)
  }
  return undefined
}

function serializeNetInfoAddress (netInfoAddress: NetInfoAddress | undefined): Buffer {
  if (!netInfoAddress) {
    // unknown address: type 0, which readers ignore
    return Buffer.concat([
      bufferFromUint(1, 0),
      bufferFromUint(1, 4),
      Buffer.alloc(4),
    ])
  }
  const { address, type } = netInfoAddress;
  const addressBytes = ipAddressToBuffer(address, type)
  return Buffer.concat([
    bufferFromUint(1, type),
    bufferFromUint(1, addressBytes.length),
    addressBytes,
  ])
}

function formatIPv6 (bytes: Buffer): string {
  const groups: string[] = []
  for (let i = 0; i < 16; i += 2) {
    groups.push(bytes.readUInt16BE(i).toString(16))
  }
  return groups.join(':')
}

function ipAddressToBuffer (ipAddress: string, type: number): Buffer {
  if (type === AddressTypes.IPv4) {
    if (!net.isIPv4(ipAddress)) {
      throw new ChannelError('invalid_format', `Invalid IPv4 address ${ipAddress}`)
    }
    return Buffer.from(ipAddress.split('.').map(part => parseInt(part, 10)));
  }
  if (type === AddressTypes.IPv6) {
    if (!net.isIPv6(ipAddress) || ipAddress.includes('.')) {
      throw new ChannelError('invalid_format', `Invalid IPv6 address ${ipAddress}`)
    }
    const [head, tail] = ipAddress.split('::')
    const headGroups = head ? head.split(':') : []
    const tailGroups = tail ? tail.split(':') : []
    const zeroGroups = tail === undefined ? [] : new Array<string>(8 - headGroups.length - tailGroups.length).fill('0')
    const groups = [...headGroups, ...zeroGroups, ...tailGroups]
    const bytes = Buffer.alloc(16)
    groups.forEach((group, i) => {
      bytes.writeUInt16BE(parseInt(group, 16), i * 2)
    })
    return bytes
  }
  throw new ChannelError('invalid_format', `Invalid address type ${type}`)
}

export const NetInfoCellConverter: CellConverter<CellNetInfo> = {
  command: CellCommands.NETINFO,
  fromCell (cell: Cell): CellNetInfo {
    return decodeNetInfo(cell.payload)
  },
  fromKeywords (keywords: CellNetInfo): CellNetInfo {
    // validates by serializing
    encodeNetInfo(keywords)
    return { ...keywords, addresses: [...keywords.addresses] }
  },
  toCell (value: CellNetInfo): Cell {
    return encodeNetInfo(value)
  },
}
