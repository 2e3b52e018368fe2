import { Cell, CellCommands } from './cell';
import type { CellConverter } from './cell-converter';
import { ChannelError } from './errors';
import { BytesReader } from './util';

// the versions a peer may list in a VERSIONS cell
export const KNOWN_LINK_VERSIONS: readonly number[] = [1, 2, 3, 4, 5]
// the most versions a VERSIONS cell may carry
export const MAX_VERSIONS = 5

export type CellVersions = {
  versions: number[]
};

const isKnownVersion = (version: number): boolean => KNOWN_LINK_VERSIONS.includes(version)

function assertValidVersions (versions: number[]): void {
  const invalid = versions.find((version) => !isKnownVersion(version))
  if (invalid !== undefined) {
    throw new ChannelError('invalid_version', `Link protocol version ${invalid} is not in [1, 5]`)
  }
}

export function decodeVersions (payload: Buffer): number[] {
  // A VERSIONS cell payload is a list of 2-byte versions, no count, no terminator
  if (payload.length % 2 !== 0) {
    throw new ChannelError('invalid_format', `VERSIONS payload has odd length ${payload.length}`)
  }
  const reader = new BytesReader(payload)
  const versions: number[] = []
  while (!reader.isExhausted()) {
    if (versions.length >= MAX_VERSIONS) {
      throw new ChannelError('invalid_format', `VERSIONS cell lists more than ${MAX_VERSIONS} versions`)
    }
    const version = reader.readUIntBE(2)
    if (!isKnownVersion(version)) {
      throw new ChannelError('invalid_format', `VERSIONS cell lists unknown version ${version}`)
    }
    versions.push(version)
  }
  return versions
}

export function encodeVersions (versions: number[]): Cell {
  assertValidVersions(versions)
  const payloadBytes = Buffer.alloc(versions.length * 2)
  versions.forEach((version, i) => {
    payloadBytes.writeUInt16BE(version, i * 2)
  })
  return new Cell(0, CellCommands.VERSIONS, payloadBytes)
}

// highest version both sides list
export function negotiateVersion (ours: number[], theirs: number[]): number | undefined {
  const shared = theirs.filter((version) => ours.includes(version))
  if (shared.length === 0) return undefined
  return Math.max(...shared)
}

export const VersionsCellConverter: CellConverter<CellVersions> = {
  command: CellCommands.VERSIONS,
  fromCell (cell: Cell): CellVersions {
    return { versions: decodeVersions(cell.payload) }
  },
  fromKeywords ({ versions }: CellVersions): CellVersions {
    assertValidVersions(versions)
    return { versions: [...versions] }
  },
  toCell ({ versions }: CellVersions): Cell {
    return encodeVersions(versions)
  },
}
