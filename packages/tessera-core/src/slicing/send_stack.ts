// Send stack: drives slicers and writes their tokens.
//
// Objects passed to `send` are queued and serialized one at a time, each
// as a complete top-level structure. Production is synchronous until a
// slicer yields Suspend; the stack then waits for the promise and picks up
// where it left off, and later objects wait behind it.
//
// A Violation raised by a slicer (or by the registry refusing a child)
// aborts that slicer's structure: ABORT(id) then CLOSE(id) go out, and the
// parent is told through `childAborted`. Reaching the root rejects the
// promise `send` returned for that object, and the next object starts.
//
// Anything else is fatal: the stack stops, every queued send is rejected,
// and the owner is told through `onFatal`.

import {
  ProtocolError,
  type Token,
  Violation,
  type Vocabulary,
  abortToken,
  closeToken,
  openToken,
} from "@tessera/wire";
import { type Logger, createLogger, describeError } from "../logging.ts";
import type { SlicerRegistry } from "./registry.ts";
import { RootSlicer } from "./root.ts";
import { EmitToken, type SliceContext, type Slicer, Suspend } from "./slicer.ts";

export interface TokenSink {
  writeToken(token: Token): void;
}

export interface SendStackOptions {
  registry: SlicerRegistry;
  vocabulary: Vocabulary;
  /** Permit slicers to yield Suspend. */
  streaming: boolean;
  /** Forget sent objects after each top-level object. */
  referenceScope: "connection" | "message";
  onFatal?: (error: ProtocolError) => void;
  logger?: Logger;
}

interface Frame {
  slicer: Slicer;
  iterator: Iterator<unknown, void, unknown>;
  /** Null for slicers that send no OPEN. */
  openId: number | null;
  /** Permission granted by the chain above; the slicer's own flag is read live. */
  inherited: boolean;
  /** Settled value of the last Suspend, handed back on the next step. */
  resumeValue: unknown;
}

interface Outgoing {
  obj: unknown;
  resolve: () => void;
  reject: (error: Error) => void;
}

export class SendStack implements SliceContext {
  readonly root: RootSlicer;
  readonly vocabulary: Vocabulary;
  private readonly frames: Frame[] = [];
  private readonly queue: Outgoing[] = [];
  private current: Outgoing | null = null;
  private openCount = 0;
  private suspended: Promise<void> | null = null;
  private dead: ProtocolError | null = null;
  private readonly log: Logger;

  constructor(
    private readonly sink: TokenSink,
    private readonly options: SendStackOptions,
  ) {
    this.root = new RootSlicer(options.registry, undefined, options.streaming);
    this.vocabulary = options.vocabulary;
    this.log = options.logger ?? createLogger("tessera:send");
  }

  /** Number of structures opened so far. */
  get opened(): number {
    return this.openCount;
  }

  /** Whether production is waiting on a Suspend. */
  get isSuspended(): boolean {
    return this.suspended !== null;
  }

  get failed(): ProtocolError | null {
    return this.dead;
  }

  /**
   * Queue `obj` for sending.
   *
   * @returns a promise that resolves once the object's last token has been
   *   written, or rejects with the Violation that aborted it or the
   *   ProtocolError that stopped the stack
   */
  send(obj: unknown): Promise<void> {
    if (this.dead) {
      return Promise.reject(this.dead);
    }
    const sent = new Promise<void>((resolve, reject) => {
      this.queue.push({ obj, resolve, reject });
    });
    this.produce();
    return sent;
  }

  /**
   * Stop for good. In-flight and queued objects are rejected with `reason`;
   * nothing more is written.
   */
  connectionLost(reason: ProtocolError): void {
    if (this.dead) return;
    this.dead = reason;
    this.frames.length = 0;
    this.suspended = null;
    const waiting = this.current ? [this.current, ...this.queue] : [...this.queue];
    this.current = null;
    this.queue.length = 0;
    for (const outgoing of waiting) {
      outgoing.reject(reason);
    }
    this.root.reset();
  }

  /** Location of the frame on top, from the root. */
  where(): string {
    return [this.root.describe(), ...this.frames.map((f) => f.slicer.describe())].join(".");
  }

  // ==========================================================================
  // Production loop
  // ==========================================================================

  private produce(): void {
    try {
      this.run();
    } catch (e) {
      this.fatal(e instanceof ProtocolError ? e : ProtocolError.internal(e));
    }
  }

  private run(): void {
    while (!this.dead && !this.suspended) {
      const frame = this.frames.at(-1);
      if (!frame) {
        if (this.current) this.finishCurrent();
        if (!this.startNext()) return;
        continue;
      }

      let step: IteratorResult<unknown, void>;
      try {
        const resumeValue = frame.resumeValue;
        frame.resumeValue = undefined;
        step = frame.iterator.next(resumeValue);
      } catch (e) {
        this.sliceFailed(e);
        continue;
      }

      if (step.done) {
        this.popFrame();
        continue;
      }

      const item = step.value;
      if (item instanceof EmitToken) {
        this.sink.writeToken(item.token);
      } else if (item instanceof Suspend) {
        this.suspend(frame, item);
      } else {
        let child: Slicer;
        try {
          child = frame.slicer.slicerForObject(item);
        } catch (e) {
          this.sliceFailed(e);
          continue;
        }
        this.pushFrame(child, frame.slicer, mayStream(frame));
      }
    }
  }

  private startNext(): boolean {
    const next = this.queue.shift();
    if (!next) return false;
    this.current = next;
    this.log.log("send", { queued: this.queue.length });

    let slicer: Slicer;
    try {
      slicer = this.root.slicerForObject(next.obj);
    } catch (e) {
      this.sliceFailed(e);
      return true;
    }
    this.pushFrame(slicer, this.root, this.root.streamable);
    return true;
  }

  private pushFrame(slicer: Slicer, parent: Slicer, parentMayStream: boolean): void {
    slicer.parent = parent;
    let openId: number | null = null;
    if (slicer.sendOpen) {
      openId = this.openCount++;
      this.sink.writeToken(openToken(openId));
      if (slicer.trackReferences) {
        try {
          slicer.registerReference(openId, slicer.obj);
        } catch (e) {
          // Numbering is bookkeeping both sides depend on; never recoverable
          throw e instanceof ProtocolError ? e : ProtocolError.internal(e);
        }
      }
    }
    this.frames.push({
      slicer,
      iterator: slicer.slice(parentMayStream, this),
      openId,
      inherited: parentMayStream,
      resumeValue: undefined,
    });
  }

  private popFrame(): void {
    const frame = this.frames.pop();
    if (frame && frame.openId !== null) {
      this.sink.writeToken(closeToken(frame.openId));
    }
  }

  private finishCurrent(): void {
    const done = this.current;
    this.current = null;
    if (this.options.referenceScope === "message") {
      this.root.reset();
    }
    done?.resolve();
  }

  // ==========================================================================
  // Suspension
  // ==========================================================================

  private suspend(frame: Frame, item: Suspend): void {
    if (!mayStream(frame)) {
      throw new ProtocolError(
        `${frame.slicer.constructor.name} suspended where streaming is not permitted`,
      );
    }
    this.log.log("suspend", { where: this.where() });
    const suspended: Promise<void> = item.promise.then(
      (value) => {
        if (this.suspended !== suspended) return;
        this.suspended = null;
        frame.resumeValue = value;
        this.produce();
      },
      (error: unknown) => {
        if (this.suspended !== suspended) return;
        this.suspended = null;
        const fatal = new ProtocolError("a suspended slicer's promise was rejected", {
          cause: error,
        });
        this.fatal(fatal);
      },
    );
    this.suspended = suspended;
  }

  // ==========================================================================
  // Failure
  // ==========================================================================

  /** A slicer, or the registry on its behalf, raised while producing. */
  private sliceFailed(error: unknown): void {
    if (!(error instanceof Violation)) {
      throw error instanceof ProtocolError ? error : ProtocolError.internal(error);
    }
    error.setLocation(this.where());
    this.abortTop(error);
  }

  /**
   * Abort the top frame, then let each parent decide whether to carry on
   * or abort in turn. With no frame left the current object is rejected.
   */
  private abortTop(violation: Violation): void {
    let failure: Violation = violation;
    while (true) {
      const frame = this.frames.pop();
      if (!frame) {
        this.rejectCurrent(failure);
        return;
      }
      if (frame.openId !== null) {
        this.log.log("abort", { id: frame.openId, error: describeError(failure) });
        this.sink.writeToken(abortToken(frame.openId));
        this.sink.writeToken(closeToken(frame.openId));
      }
      const parent = frame.slicer.parent;
      if (!parent || parent === this.root) {
        this.rejectCurrent(failure);
        return;
      }
      try {
        parent.childAborted(failure);
        return;
      } catch (e) {
        if (!(e instanceof Violation)) {
          throw e instanceof ProtocolError ? e : ProtocolError.internal(e);
        }
        e.setLocation(this.where());
        failure = e;
      }
    }
  }

  private rejectCurrent(violation: Violation): void {
    const current = this.current;
    this.current = null;
    this.frames.length = 0;
    if (this.options.referenceScope === "message") {
      this.root.reset();
    }
    current?.reject(violation);
  }

  private fatal(error: ProtocolError): void {
    if (this.dead) return;
    error.setLocation(this.where());
    this.log.log("fatal", { error: describeError(error) });
    this.connectionLost(error);
    this.options.onFatal?.(error);
  }
}

/**
 * Whether `frame` may suspend, or start a child that may. A slicer can
 * withdraw permission while slicing by clearing `streamable`.
 */
function mayStream(frame: Frame): boolean {
  return frame.inherited && frame.slicer.streamable;
}
