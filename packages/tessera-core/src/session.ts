// Token session: one send stack and one receive stack over a byte transport.
//
// The session owns teardown. Whichever side notices a ProtocolError first
// (the reader, the receive stack, the send stack, or the transport going
// away) brings everything down at once: the reader stops, queued and
// in-flight sends are rejected, every unslicer is finished with a Failure
// so every placeholder settles, and the result channel is closed. A
// locally detected error is reported to the peer with an ERROR token
// before the transport is closed.

import {
  ProtocolError,
  TokenReader,
  encodeToken,
  errorToken,
} from "@tessera/wire";
import { type Channel, createChannel, drain } from "./channel.ts";
import { type Logger, createLogger, describeError } from "./logging.ts";
import { type ResolvedOptions, type SessionOptions, resolveOptions } from "./options.ts";
import { SendStack } from "./slicing/send_stack.ts";
import { type ByteTransport, MemoryTransport } from "./transport.ts";
import { type Received, ReceiveStack } from "./unslicing/receive_stack.ts";

export class TokenSession<T extends ByteTransport = ByteTransport> {
  readonly options: ResolvedOptions;
  private readonly sender: SendStack;
  private readonly receiver: ReceiveStack;
  private readonly reader: TokenReader;
  private readonly inbox: Channel<Received> = createChannel();
  private readonly log: Logger;
  private _closed: ProtocolError | null = null;

  constructor(
    readonly transport: T,
    options: SessionOptions = {},
  ) {
    this.options = resolveOptions(options);
    const o = this.options;
    this.log = createLogger("tessera:session", o.debug);

    this.sender = new SendStack(
      { writeToken: (token) => this.transport.write(encodeToken(token)) },
      {
        registry: o.slicers,
        vocabulary: o.vocabulary,
        streaming: o.streaming,
        referenceScope: o.referenceScope,
        onFatal: (error) => this.teardown(error, true),
        logger: createLogger("tessera:send", o.debug),
      },
    );

    this.receiver = new ReceiveStack({
      registry: o.unslicers,
      vocabulary: o.vocabulary,
      constraint: o.constraint,
      maxDepth: o.maxDepth,
      maxTokenSize: o.maxTokenSize,
      referenceScope: o.referenceScope,
      deliver: (result) => {
        this.inbox.send(result);
      },
      logger: createLogger("tessera:recv", o.debug),
    });

    this.reader = new TokenReader(this.receiver);
  }

  /** The error that ended the session, or null while it is open. */
  get closed(): ProtocolError | null {
    return this._closed;
  }

  /** Permit or forbid suspension for objects sent from now on. */
  allowStreaming(streamable: boolean): void {
    this.sender.root.allowStreaming(streamable);
  }

  /**
   * Serialize `obj` after everything sent before it.
   *
   * @returns resolves once its last token is written; rejects with the
   *   Violation that aborted it, or the ProtocolError that ended the session
   */
  send(obj: unknown): Promise<void> {
    if (this._closed) {
      return Promise.reject(this._closed);
    }
    return this.sender.send(obj);
  }

  /**
   * Next received top-level object, or its Failure. Null once the session
   * has ended and every result has been taken.
   */
  recv(): Promise<Received | null> {
    return this.inbox.recv();
  }

  [Symbol.asyncIterator](): AsyncGenerator<Received> {
    return drain(this.inbox);
  }

  /** Feed bytes read from the transport. */
  dataReceived(chunk: Uint8Array): void {
    if (this._closed) return;
    try {
      this.reader.feed(chunk);
    } catch (e) {
      const error = e instanceof ProtocolError ? e : ProtocolError.internal(e);
      this.teardown(error, !error.fromPeer);
    }
  }

  /** The transport went away underneath the session. */
  connectionLost(reason = "transport closed"): void {
    this.teardown(ProtocolError.connectionLost(reason), false);
  }

  /** End the session and close the transport. */
  close(): void {
    this.teardown(ProtocolError.connectionLost("closed locally"), false);
  }

  private teardown(error: ProtocolError, notifyPeer: boolean): void {
    if (this._closed) return;
    this._closed = error;
    this.log.log("teardown", { error: describeError(error), notifyPeer });

    this.reader.halt(error);
    this.sender.connectionLost(error);
    this.receiver.connectionLost(error);

    if (notifyPeer) {
      try {
        this.transport.write(encodeToken(errorToken(error.message)));
      } catch (e) {
        this.log.log("error-not-sent", { error: describeError(e) });
      }
    }
    this.transport.close();
    this.inbox.close();
  }
}

/**
 * Two sessions joined by in-process transports.
 *
 * @example
 * ```typescript
 * const [alice, bob] = createSessionPair();
 * await alice.send({ greeting: "hello" });
 * const result = await bob.recv(); // { ok: true, value: { greeting: "hello" } }
 * ```
 */
export function createSessionPair(
  options: SessionOptions = {},
  peerOptions: SessionOptions = options,
): [TokenSession<MemoryTransport>, TokenSession<MemoryTransport>] {
  const a = new TokenSession(new MemoryTransport(), options);
  const b = new TokenSession(new MemoryTransport(), peerOptions);
  a.transport.peer = b;
  b.transport.peer = a;
  return [a, b];
}
