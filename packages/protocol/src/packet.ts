/**
 * RCON Wire Protocol — Packet codec
 *
 * Pure transformations between packets and bytes. Reading from a live
 * stream goes through a {@link ByteReader}, so the codec never touches a socket.
 */

import {
  MAX_PACKET_SIZE,
  MIN_PACKET_SIZE,
  PACKET_OVERHEAD,
  SIZE_FIELD_LENGTH,
} from "./constants.js";
import { createError } from "./errors.js";
import type { ByteReader, Packet, ReceivedPacket } from "./types.js";

const ENCODING: BufferEncoding = "utf-8";

/**
 * Encode a packet into a single buffer ready to be written to the socket.
 * Keeping the body within limits is the caller's job.
 */
export function encodePacket(packet: Packet): Buffer {
  const body = typeof packet.body === "string" ? Buffer.from(packet.body, ENCODING) : packet.body;
  const size = PACKET_OVERHEAD + body.length;

  // Buffer.alloc zero-fills, which provides the two terminator bytes
  const buffer = Buffer.alloc(SIZE_FIELD_LENGTH + size);
  buffer.writeInt32LE(size, 0);
  buffer.writeInt32LE(packet.id, 4);
  buffer.writeInt32LE(packet.type, 8);
  body.copy(buffer, 12);
  return buffer;
}

/**
 * Decode one complete frame (size field included) held in memory.
 */
export function decodePacket(frame: Buffer): ReceivedPacket {
  if (frame.length < SIZE_FIELD_LENGTH) {
    throw createError(
      "MALFORMED_HEADER",
      `frame too short for a size field (${frame.length} bytes)`,
    );
  }

  const size = frame.readInt32LE(0);
  assertPacketSize(size);

  const payload = frame.subarray(SIZE_FIELD_LENGTH);
  if (payload.length < size) {
    throw createError(
      "TRUNCATED_PAYLOAD",
      `packet declares ${size} bytes but only ${payload.length} are present`,
    );
  }

  return decodePayload(size, payload);
}

/**
 * Read one packet from a byte stream.
 *
 * Reads the size field, validates it, then reads exactly that many bytes.
 * An out-of-range size stops before any payload byte is consumed.
 */
export async function readPacket(reader: ByteReader): Promise<ReceivedPacket> {
  let header: Buffer;
  try {
    header = await reader.readExactly(SIZE_FIELD_LENGTH);
  } catch (err) {
    throw createError("MALFORMED_HEADER", "failed to read packet size", err);
  }

  const size = header.readInt32LE(0);
  assertPacketSize(size);

  let payload: Buffer;
  try {
    payload = await reader.readExactly(size);
  } catch (err) {
    throw createError("TRUNCATED_PAYLOAD", "failed to read packet payload", err);
  }

  return decodePayload(size, payload);
}

function assertPacketSize(size: number): void {
  if (size < MIN_PACKET_SIZE || size > MAX_PACKET_SIZE) {
    throw createError(
      "INVALID_PACKET_SIZE",
      `invalid packet size: ${size} (must be ${MIN_PACKET_SIZE}-${MAX_PACKET_SIZE})`,
    );
  }
}

/** `payload` holds at least `size` bytes starting at the id field */
function decodePayload(size: number, payload: Buffer): ReceivedPacket {
  return {
    size,
    id: payload.readInt32LE(0),
    type: payload.readInt32LE(4),
    // Body runs up to the two terminators, which are dropped unchecked.
    // Copied, so a reply does not pin the reader's receive buffer.
    body: Buffer.from(payload.subarray(8, size - 2)),
  };
}
