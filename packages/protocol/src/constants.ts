/**
 * RCON Wire Protocol — Limits and well-known values
 */

/** Largest size field the client accepts, and the bound on outgoing bodies */
export const MAX_PACKET_SIZE = 4096;

/** id (4) + type (4) + two terminator bytes */
export const PACKET_OVERHEAD = 10;

/** Smallest legal size field: an empty body */
export const MIN_PACKET_SIZE = PACKET_OVERHEAD;

/** Width of the leading size field */
export const SIZE_FIELD_LENGTH = 4;

/** Correlation id used for every packet of a session */
export const SESSION_PACKET_ID = 0x0badc0de;

/** Id the server puts in an auth reply when the password is wrong */
export const AUTH_REJECTED_ID = -1;
