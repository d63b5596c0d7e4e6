/**
 * Buffered reader over a TCP socket.
 *
 * Collects `data` chunks as they arrive and hands out exact-length reads,
 * so a packet split across several TCP segments (or several packets in one
 * segment) reads the same as one that arrived whole.
 */

import type { Socket } from "node:net";
import { createError, type ByteReader } from "@rcon-console/protocol";

interface PendingRead {
  length: number;
  resolve: (chunk: Buffer) => void;
  reject: (err: Error) => void;
}

export class SocketReader implements ByteReader {
  private buffer: Buffer = Buffer.alloc(0);
  private pending: PendingRead | null = null;
  /** Set once the socket errors or closes; later reads fail with it */
  private failure: Error | null = null;

  constructor(socket: Socket) {
    socket.on("data", (chunk: Buffer) => {
      this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
      this.drain();
    });
    socket.on("error", (err) => this.fail(err));
    socket.on("close", () => {
      this.fail(createError("CONNECTION_CLOSED", "connection closed by server"));
    });
  }

  /**
   * Resolve with exactly `length` bytes. Bytes already buffered are served
   * even after the socket has closed.
   */
  readExactly(length: number): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(createError("INVALID_STATE", "a read is already in progress"));
    }
    if (this.buffer.length >= length) {
      return Promise.resolve(this.take(length));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise((resolve, reject) => {
      this.pending = { length, resolve, reject };
    });
  }

  /**
   * Abort the read in progress, if any. Buffered bytes are kept.
   */
  cancel(reason: Error): void {
    const pending = this.pending;
    this.pending = null;
    pending?.reject(reason);
  }

  private drain(): void {
    const pending = this.pending;
    if (pending && this.buffer.length >= pending.length) {
      this.pending = null;
      pending.resolve(this.take(pending.length));
    }
  }

  private take(length: number): Buffer {
    const chunk = this.buffer.subarray(0, length);
    this.buffer = this.buffer.subarray(length);
    return chunk;
  }

  private fail(err: Error): void {
    // An error is followed by close; keep the first, more specific one
    if (this.failure) return;
    this.failure = err;
    this.cancel(err);
  }
}
