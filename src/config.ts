import { InvalidArgumentError } from 'commander';
import { ChannelError } from './errors';
import type { CircuitIdWidth } from './messaging';

export type ChannelOptions = {
  circuitIdWidth?: CircuitIdWidth,
  // link protocol versions offered in our VERSIONS cell
  linkVersions?: number[],
}

export type ResolvedChannelOptions = Required<ChannelOptions>

// Versions 4 and up switch the channel to 32 bit circuit ids after the
// VERSIONS exchange, which this channel never does.
export const MAX_LINK_VERSION_FOR_16_BIT_IDS = 3

export const defaultChannelOptions: ResolvedChannelOptions = {
  circuitIdWidth: 16,
  linkVersions: [3],
}

export function resolveChannelOptions (options: ChannelOptions = {}): ResolvedChannelOptions {
  const resolved: ResolvedChannelOptions = {
    circuitIdWidth: options.circuitIdWidth ?? defaultChannelOptions.circuitIdWidth,
    linkVersions: options.linkVersions ?? defaultChannelOptions.linkVersions,
  }
  if (resolved.circuitIdWidth !== 16 && resolved.circuitIdWidth !== 32) {
    throw new ChannelError('invalid_format', `Circuit id width must be 16 or 32 bits, got ${resolved.circuitIdWidth}`)
  }
  if (resolved.linkVersions.length === 0) {
    throw new ChannelError('invalid_version', 'At least one link protocol version must be offered')
  }
  const unsupported = resolved.linkVersions.find((version) => !Number.isInteger(version) || version < 1 || version > MAX_LINK_VERSION_FOR_16_BIT_IDS)
  if (unsupported !== undefined) {
    throw new ChannelError('invalid_version', `Link protocol version ${unsupported} is not supported, use versions 1 to ${MAX_LINK_VERSION_FOR_16_BIT_IDS}`)
  }
  return { ...resolved, linkVersions: [...resolved.linkVersions] }
}

export function parseLinkVersions (value: string): number[] {
  return value.split(',').map((part) => {
    const version = Number.parseInt(part.trim(), 10)
    if (Number.isNaN(version)) {
      throw new ChannelError('invalid_version', `Invalid link protocol version "${part}"`)
    }
    return version
  })
}

// commander argument parsers for the CLI
export function parsePort (value: string): number {
  const port = Number(value)
  if (!Number.isInteger(port) || port < 1 || port > 0xffff) {
    throw new InvalidArgumentError('Port must be an integer from 1 to 65535.')
  }
  return port
}

export function parseTimeout (value: string): number {
  const timeoutMs = Number(value)
  if (!Number.isInteger(timeoutMs) || timeoutMs < 0) {
    throw new InvalidArgumentError('Timeout must be a whole number of milliseconds, 0 to disable.')
  }
  return timeoutMs
}
