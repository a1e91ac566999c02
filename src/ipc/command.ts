/**
 * In-band command sub-protocol.
 *
 * A command frame is a constant-width 8 byte header: the 4 byte magic
 * `ESC I P C` followed by a 4 byte ASCII tag. Commands are advisory: anything
 * that is not exactly a known header is left in the stream as payload.
 */

export const CommandCode = {
  PING: 'PING',
  PONG: 'PONG',
  SET_STREAM: 'SET_STREAM',
  SET_DATA: 'SET_DATA',
} as const;

export type CommandCode = (typeof CommandCode)[keyof typeof CommandCode];

export const COMMAND_MAGIC = Buffer.from([0x1b, 0x49, 0x50, 0x43]);
export const COMMAND_HEADER_BYTES = 8;

const TAGS: Record<CommandCode, string> = {
  PING: 'PING',
  PONG: 'PONG',
  SET_STREAM: 'STRM',
  SET_DATA: 'DATA',
};

const CODES_BY_TAG: ReadonlyMap<string, CommandCode> = new Map(
  Object.values(CommandCode).map((code): [string, CommandCode] => [TAGS[code], code]),
);

export function encodeCommand(code: CommandCode): Buffer {
  return Buffer.concat([COMMAND_MAGIC, Buffer.from(TAGS[code], 'ascii')]);
}

/**
 * Parse a command header.
 *
 * @returns The command, or null when `bytes` is not exactly one known header.
 */
export function parseCommand(bytes: Uint8Array): CommandCode | null {
  if (bytes.length !== COMMAND_HEADER_BYTES) return null;
  if (!couldBeCommandPrefix(bytes)) return null;
  const tag = Buffer.from(bytes.subarray(COMMAND_MAGIC.length)).toString('ascii');
  return CODES_BY_TAG.get(tag) ?? null;
}

/**
 * True while the bytes seen so far can still turn into a command header,
 * i.e. they match the magic for as far as they go.
 */
export function couldBeCommandPrefix(bytes: Uint8Array): boolean {
  const n = Math.min(bytes.length, COMMAND_MAGIC.length);
  for (let i = 0; i < n; i++) {
    if (bytes[i] !== COMMAND_MAGIC[i]) return false;
  }
  return true;
}
