import { ChannelError } from './errors';

//  PAYLOAD_LEN -- The longest allowable cell payload, in bytes. (509)
export const PAYLOAD_LEN = 509

// The 'Command' field of a fixed-length cell holds one of the following
// values:

// 0 -- PADDING     (Padding)                 (See Sec 7.2)
// 1 -- CREATE      (Create a circuit)        (See Sec 5.1)
// 2 -- CREATED     (Acknowledge create)      (See Sec 5.1)
// 3 -- RELAY       (End-to-end data)         (See Sec 5.5 and 6)
// 4 -- DESTROY     (Stop using a circuit)    (See Sec 5.4)
// 5 -- CREATE_FAST (Create a circuit, no KP) (See Sec 5.1)
// 6 -- CREATED_FAST (Circuit created, no KP) (See Sec 5.1)
// 8 -- NETINFO     (Time and address info)   (See Sec 4.5)
// 9 -- RELAY_EARLY (End-to-end data; limited)(See Sec 5.6)
// 10 -- CREATE2    (Extended CREATE cell)    (See Sec 5.1)
// 11 -- CREATED2   (Extended CREATED cell)    (See Sec 5.1)
// 12 -- PADDING_NEGOTIATE   (Padding negotiation)    (See Sec 7.2)

// Variable-length command values are:

// 7 -- VERSIONS    (Negotiate proto version) (See Sec 4)
// 128 -- VPADDING  (Variable-length padding) (See Sec 7.2)
// 129 -- CERTS     (Certificates)            (See Sec 4.2)
// 130 -- AUTH_CHALLENGE (Challenge value)    (See Sec 4.3)
// 131 -- AUTHENTICATE (Client authentication)(See Sec 4.5)
// 132 -- AUTHORIZE (Client authorization)    (Not yet used)

export enum CellCommands {
  PADDING = 0,
  CREATE = 1,
  CREATED = 2,
  RELAY = 3,
  DESTROY = 4,
  CREATE_FAST = 5,
  CREATED_FAST = 6,
  VERSIONS = 7,
  NETINFO = 8,
  RELAY_EARLY = 9,
  CREATE2 = 10,
  CREATED2 = 11,
  PADDING_NEGOTIATE = 12,
  VPADDING = 128,
  CERTS = 129,
  AUTH_CHALLENGE = 130,
  AUTHENTICATE = 131,
  AUTHORIZE = 132,
}

// On a version 3 or
// higher connection, variable-length cells are indicated by a command
// byte equal to 7 ("VERSIONS"), or greater than or equal to 128.
export function isVariableLength (command: number): boolean {
  return command >= 128 || command === CellCommands.VERSIONS
}

export function getCommandName (command: number): string {
  const name: string | undefined = CellCommands[command]
  if (name !== undefined) return name
  return `<UNKNOWN:${command}|0x${command.toString(16)}>`
}

/**
 * The framing unit of a channel. The circuit id width is a property of the
 * channel, so only the value is kept here.
 */
export class Cell {
  readonly circuitId: number;
  readonly command: number;
  readonly payload: Buffer;

  constructor (circuitId: number, command: number, payload: Buffer = Buffer.alloc(0)) {
    if (!Number.isInteger(circuitId) || circuitId < 0) {
      throw new ChannelError('invalid_format', `Invalid circuit id ${circuitId}`)
    }
    if (!Number.isInteger(command) || command < 0 || command > 0xff) {
      throw new ChannelError('invalid_format', `Invalid command ${command}`)
    }
    if (!isVariableLength(command) && payload.length > PAYLOAD_LEN) {
      throw new ChannelError('invalid_format', `Fixed length payloads must be ${PAYLOAD_LEN} bytes or less, got ${payload.length} for ${getCommandName(command)}`)
    }
    this.circuitId = circuitId;
    this.command = command;
    this.payload = payload;
  }

  get commandName (): string {
    return getCommandName(this.command)
  }

  get isVariableLength (): boolean {
    return isVariableLength(this.command)
  }
}
