/**
 * Byte transport abstraction.
 *
 * A session writes encoded tokens through a ByteTransport and is fed the
 * bytes the transport receives through `TokenSession.dataReceived`. Any
 * ordered, reliable byte stream will do: tokens carry their own framing,
 * so chunk boundaries on either side mean nothing.
 *
 * Implementations:
 * - MemoryTransport (below) joins two sessions in one process
 */

import type { TokenSession } from "./session.ts";

export interface ByteTransport {
  /** Write bytes to the peer, in order. */
  write(bytes: Uint8Array): void;

  /** Close the transport. No bytes are written afterwards. */
  close(): void;
}

/**
 * In-process transport. Bytes written on one end are fed to the session on
 * the other end in a later microtask, so neither session is re-entered
 * while it is writing.
 */
export class MemoryTransport implements ByteTransport {
  peer: TokenSession<MemoryTransport> | null = null;
  /** Every chunk written so far. */
  readonly written: Uint8Array[] = [];
  private _closed = false;

  get closed(): boolean {
    return this._closed;
  }

  write(bytes: Uint8Array): void {
    if (this._closed) {
      throw new Error("transport is closed");
    }
    this.written.push(bytes);
    const peer = this.peer;
    queueMicrotask(() => peer?.dataReceived(bytes));
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    const peer = this.peer;
    queueMicrotask(() => peer?.connectionLost("peer closed the transport"));
  }
}
