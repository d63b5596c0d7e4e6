/**
 * @rcon-console/protocol — RCON wire protocol
 *
 * Packet layout, limits, codec and error taxonomy shared by the client packages.
 */

export {
  MAX_PACKET_SIZE,
  MIN_PACKET_SIZE,
  PACKET_OVERHEAD,
  SIZE_FIELD_LENGTH,
  SESSION_PACKET_ID,
  AUTH_REJECTED_ID,
} from "./constants.js";

export { PacketType } from "./types.js";

export type {
  Packet,
  ReceivedPacket,
  ByteReader,
  ErrorCode,
} from "./types.js";

export { encodePacket, decodePacket, readPacket } from "./packet.js";

export {
  RconError,
  createError,
  createCommandTooLongError,
  isRconError,
  hasErrorCode,
} from "./errors.js";
