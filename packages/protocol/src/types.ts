/**
 * RCON Wire Protocol — Types
 *
 * Every message on the wire is one packet:
 *
 *   offset  size  field
 *   0       4     size (int32 LE): byte count of everything below
 *   4       4     id   (int32 LE)
 *   8       4     type (int32 LE)
 *   12      n     body (n = size - 10)
 *   12+n    2     terminator (0x00 0x00)
 *
 * The client only ever has one request in flight, so a single correlation
 * id is used for the whole session.
 */

// =============================================================================
// Packet Types
// =============================================================================

/**
 * Numeric packet types. Requests and replies share a numeric space, so
 * EXEC_COMMAND and AUTH_RESPONSE are both 2.
 */
export const PacketType = {
  /** Server → Client: reply to a command */
  RESPONSE_VALUE: 0,
  /** Server → Client: reply to an authentication request */
  AUTH_RESPONSE: 2,
  /** Client → Server: run a console command */
  EXEC_COMMAND: 2,
  /** Client → Server: log in with the shared password */
  AUTH: 3,
} as const;

export type PacketType = (typeof PacketType)[keyof typeof PacketType];

// =============================================================================
// Packet
// =============================================================================

export interface Packet {
  /** Correlation id. `-1` in an auth reply means the password was rejected. */
  id: number;
  /** Packet type. Incoming packets may carry values outside {@link PacketType}. */
  type: number;
  /** Body without terminators. Strings are written as UTF-8, buffers as-is. */
  body: string | Buffer;
}

/**
 * A packet read off the wire, with the size field it declared.
 * The body holds exactly the bytes the server sent; no charset is assumed.
 */
export interface ReceivedPacket extends Packet {
  size: number;
  body: Buffer;
}

// =============================================================================
// Byte Source
// =============================================================================

/**
 * Anything {@link readPacket} can pull bytes from.
 * Implementations resolve with exactly `length` bytes or reject.
 */
export interface ByteReader {
  readExactly(length: number): Promise<Buffer>;
}

// =============================================================================
// Error Codes
// =============================================================================

export type ErrorCode =
  | "CONNECTION_FAILED"       // every connect attempt failed
  | "AUTH_REJECTED"           // server answered the login with id -1
  | "MALFORMED_HEADER"        // size field could not be read
  | "INVALID_PACKET_SIZE"     // size field outside 10..4096
  | "TRUNCATED_PAYLOAD"       // fewer bytes than the size field declared
  | "INVALID_RESPONSE_ID"     // reply id does not match the session id
  | "COMMAND_TOO_LONG"        // body does not fit in one packet
  | "READ_DEADLINE_EXCEEDED"  // no data before the read deadline
  | "CONNECTION_CLOSED"       // peer closed the socket
  | "SEND_FAILED"             // socket write failed
  | "INVALID_STATE";          // operation not allowed in the current state
