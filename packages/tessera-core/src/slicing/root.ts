// The bottom of the send stack.
//
// Owns the send-side reference table and the registry. Every frame above
// delegates reference registration and slicer selection down to here, so
// one table covers the whole connection (or one message, when the session
// is configured that way).

import type { Violation } from "@tessera/wire";
import { SendReferenceTable } from "../references.ts";
import type { SlicerRegistry } from "./registry.ts";
import type { Slicer } from "./slicer.ts";
import { ReferenceSlicer } from "./slicers.ts";

export class RootSlicer implements Slicer {
  readonly obj = null;
  readonly sendOpen = false;
  readonly trackReferences = false;
  parent: Slicer | null = null;
  private _streamable: boolean;

  constructor(
    private readonly registry: SlicerRegistry,
    readonly references: SendReferenceTable = new SendReferenceTable(),
    streamable = true,
  ) {
    this._streamable = streamable;
  }

  get streamable(): boolean {
    return this._streamable;
  }

  /** Permit or forbid suspension by anything sent from now on. */
  allowStreaming(streamable: boolean): void {
    this._streamable = streamable;
  }

  *slice(): Generator<unknown, void, unknown> {
    // The root has no object of its own; the send stack feeds it.
  }

  registerReference(id: number, obj: unknown): void {
    if (typeof obj === "object" && obj !== null) {
      this.references.register(id, obj);
    }
  }

  slicerForObject(obj: unknown): Slicer {
    if (typeof obj === "object" && obj !== null) {
      const id = this.references.get(obj);
      if (id !== undefined) {
        return new ReferenceSlicer(id, obj);
      }
    }
    return this.registry.slicerFor(obj);
  }

  /** A top-level object was aborted; the send stack reports it. */
  childAborted(_violation: Violation): void {}

  describe(): string {
    return "<root>";
  }

  /** Forget everything sent so far. */
  reset(): void {
    this.references.clear();
  }
}
