/**
 * RCON Connection
 *
 * Owns the TCP socket to the server: connects (with retry), logs in once,
 * then runs commands one round trip at a time.
 *
 *   disconnected → connected → authenticated → closed
 *
 * `closed` is reachable from every state and is final; a failed session
 * is discarded, never reconnected.
 */

import { createConnection, type Socket } from "node:net";
import {
  AUTH_REJECTED_ID,
  MAX_PACKET_SIZE,
  PacketType,
  SESSION_PACKET_ID,
  createCommandTooLongError,
  createError,
  encodePacket,
  isRconError,
  readPacket,
  type Packet,
  type RconError,
  type ReceivedPacket,
} from "@rcon-console/protocol";
import { SocketReader } from "./socket-reader.js";

export type ConnectionState = "disconnected" | "connected" | "authenticated" | "closed";

/** Opens a TCP connection, rejecting if it is not up within `timeoutMs` */
export type Dialer = (host: string, port: number, timeoutMs: number) => Promise<Socket>;

export interface ConnectionOptions {
  host: string;
  port: number;
  /** Connect attempts before giving up (default: 3) */
  maxAttempts?: number;
  /** Per-attempt connect timeout in ms (default: 10000) */
  connectTimeoutMs?: number;
  /** Pause between connect attempts in ms (default: 1000) */
  retryDelayMs?: number;
  /** Deadline for each response in ms (default: 10000) */
  readTimeoutMs?: number;
  /** Override how sockets are opened (tests) */
  dial?: Dialer;
  /** Override how the retry pause is awaited (tests) */
  sleep?: (ms: number) => Promise<void>;
}

export interface ConnectionEvents {
  /** Called when connection state changes */
  onStateChange?: (state: ConnectionState) => void;
  /** Called after a failed connect attempt that will be retried */
  onRetry?: (attempt: number, error: Error) => void;
}

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
const DEFAULT_RETRY_DELAY_MS = 1_000;
const DEFAULT_READ_TIMEOUT_MS = 10_000;

/** Largest command body; leaves room for framing within the packet limit */
export const MAX_COMMAND_LENGTH = MAX_PACKET_SIZE - 1;

export class Connection {
  readonly host: string;
  readonly port: number;
  private readonly maxAttempts: number;
  private readonly connectTimeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly readTimeoutMs: number;
  private readonly dial: Dialer;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly events: ConnectionEvents;

  private socket: Socket | null = null;
  private reader: SocketReader | null = null;
  private state: ConnectionState = "disconnected";
  private stateListeners = new Set<(state: ConnectionState) => void>();

  constructor(options: ConnectionOptions, events: ConnectionEvents = {}) {
    this.host = options.host;
    this.port = options.port;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
    this.dial = options.dial ?? dialTcp;
    this.sleep = options.sleep ?? delay;
    this.events = events;
  }

  /** Current connection state */
  get connectionState(): ConnectionState {
    return this.state;
  }

  /**
   * Watch state changes after construction (for UIs created once the
   * connection is already up). Returns a function that stops watching.
   */
  watchState(listener: (state: ConnectionState) => void): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  /** `host:port` as used in messages */
  get address(): string {
    return this.host.includes(":") ? `[${this.host}]:${this.port}` : `${this.host}:${this.port}`;
  }

  /**
   * Connect to the server, retrying failed attempts.
   * This is the only operation that retries.
   *
   * A close() while an attempt or the pause is pending ends the loop with
   * CONNECTION_CLOSED; a socket dialled after that is destroyed, not kept.
   */
  async connect(): Promise<void> {
    this.expectState("disconnected", "connect");

    let lastError: Error = new Error("no connection attempt made");
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      let socket: Socket;
      try {
        socket = await this.dial(this.host, this.port, this.connectTimeoutMs);
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));
        if (attempt < this.maxAttempts) {
          this.events.onRetry?.(attempt, lastError);
          await this.sleep(this.retryDelayMs);
          if (this.state === "closed") throw closedWhileConnecting();
        }
        continue;
      }

      if (this.state === "closed") {
        socket.destroy();
        throw closedWhileConnecting();
      }
      this.attach(socket);
      this.setState("connected");
      return;
    }

    this.setState("closed");
    throw createError("CONNECTION_FAILED", `failed to connect to ${this.address}`, lastError);
  }

  /**
   * Log in with the shared password. Must run exactly once, right after connect().
   *
   * Only the -1 rejection id is checked; any other id counts as success.
   */
  async authenticate(password: string): Promise<void> {
    this.expectState("connected", "authenticate");

    try {
      await this.send({ id: SESSION_PACKET_ID, type: PacketType.AUTH, body: password });
    } catch (err) {
      throw createError("SEND_FAILED", "failed to send auth packet", err);
    }

    let response: ReceivedPacket;
    try {
      response = await this.receive();
    } catch (err) {
      throw wrapReceiveError("failed to receive auth response", err);
    }

    if (response.id === AUTH_REJECTED_ID) {
      this.close();
      throw createError("AUTH_REJECTED", "authentication rejected");
    }

    this.setState("authenticated");
  }

  /**
   * Run one command and resolve with the server's reply (possibly empty),
   * byte for byte. Failures leave the session usable for the next command.
   */
  async execute(command: string): Promise<Buffer> {
    const byteLength = Buffer.byteLength(command, "utf-8");
    if (byteLength >= MAX_PACKET_SIZE) {
      throw createCommandTooLongError(byteLength, MAX_COMMAND_LENGTH);
    }
    this.expectState("authenticated", "execute a command");

    try {
      await this.send({ id: SESSION_PACKET_ID, type: PacketType.EXEC_COMMAND, body: command });
    } catch (err) {
      throw createError("SEND_FAILED", "failed to send command", err);
    }

    let response: ReceivedPacket;
    try {
      response = await this.receive();
    } catch (err) {
      throw wrapReceiveError("failed to receive response", err);
    }

    if (response.id !== SESSION_PACKET_ID) {
      throw createError(
        "INVALID_RESPONSE_ID",
        `invalid response ID (expected ${SESSION_PACKET_ID}, got ${response.id})`,
      );
    }

    return response.body;
  }

  /**
   * Close the socket. Safe to call more than once.
   */
  close(): void {
    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
      this.reader = null;
    }
    this.setState("closed");
  }

  // ===========================================================================
  // Internal
  // ===========================================================================

  private attach(socket: Socket): void {
    socket.setNoDelay(true);
    this.socket = socket;
    this.reader = new SocketReader(socket);
    socket.once("close", () => {
      if (this.socket === socket) {
        this.socket = null;
        this.setState("closed");
      }
    });
  }

  private send(packet: Packet): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      return Promise.reject(createError("CONNECTION_CLOSED", "connection is closed"));
    }
    // One write per packet, so the frame is never interleaved
    const frame = encodePacket(packet);
    return new Promise((resolve, reject) => {
      socket.write(frame, (err) => (err ? reject(err) : resolve()));
    });
  }

  /**
   * Read one packet under a fresh deadline. The deadline is cleared whatever
   * the outcome, so it never carries over to the next read.
   */
  private async receive(): Promise<ReceivedPacket> {
    const reader = this.reader;
    if (!reader) {
      throw createError("CONNECTION_CLOSED", "connection is closed");
    }

    const deadline = setTimeout(() => {
      reader.cancel(
        createError("READ_DEADLINE_EXCEEDED", `read deadline exceeded (${this.readTimeoutMs}ms)`),
      );
    }, this.readTimeoutMs);

    try {
      return await readPacket(reader);
    } finally {
      clearTimeout(deadline);
    }
  }

  private expectState(expected: ConnectionState, action: string): void {
    if (this.state === "closed" && expected !== "closed") {
      throw createError("CONNECTION_CLOSED", `cannot ${action}: connection is closed`);
    }
    if (this.state !== expected) {
      throw createError("INVALID_STATE", `cannot ${action} while ${this.state}`);
    }
  }

  private setState(state: ConnectionState): void {
    // closed is final, even if a reply was still in flight when the socket went away
    if (this.state === "closed") return;
    if (this.state !== state) {
      this.state = state;
      this.events.onStateChange?.(state);
      for (const listener of this.stateListeners) listener(state);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Default dialer: plain TCP with a connect timeout.
 */
export const dialTcp: Dialer = (host, port, timeoutMs) =>
  new Promise((resolve, reject) => {
    const socket = createConnection({ host, port });

    const timer = setTimeout(() => {
      socket.destroy();
      reject(new Error(`dial tcp ${host}:${port}: i/o timeout`));
    }, timeoutMs);

    const onError = (err: Error) => {
      clearTimeout(timer);
      socket.destroy();
      reject(err);
    };

    socket.once("error", onError);
    socket.once("connect", () => {
      clearTimeout(timer);
      socket.off("error", onError);
      resolve(socket);
    });
  });

function closedWhileConnecting(): RconError {
  return createError("CONNECTION_CLOSED", "connection closed while connecting");
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Codec errors keep their code; the operation becomes the message prefix */
function wrapReceiveError(context: string, err: unknown): RconError {
  return createError(isRconError(err) ? err.code : "CONNECTION_CLOSED", context, err);
}
