import { describe, it, expect } from "vitest";
import { ProtocolError, Violation, Vocabulary } from "@tessera/wire";
import { ListOf } from "@tessera/schema";
import type { Received } from "./unslicing/receive_stack.ts";
import { createSessionPair } from "./session.ts";
import { SlicerRegistry } from "./slicing/registry.ts";
import { BaseSlicer, Suspend } from "./slicing/slicer.ts";

function valueOf(result: Received | null): unknown {
  if (!result || !result.ok) {
    throw new Error("expected a value");
  }
  return result.value;
}

function fieldOf(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) {
    throw new Error("expected an object");
  }
  return Object.getOwnPropertyDescriptor(value, key)?.value;
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

function callback(): void {}

class Later {
  constructor(readonly value: Promise<number>) {}
}

class LaterSlicer extends BaseSlicer<Later> {
  override streamable = true;

  *slice(): Generator<unknown, void, unknown> {
    yield "list";
    const value = yield new Suspend(this.obj.value);
    yield value;
  }
}

function streamingSlicers(): SlicerRegistry {
  return SlicerRegistry.standard().registerClass(Later, (later) => new LaterSlicer(later));
}

describe("TokenSession", () => {
  it("round-trips every built-in kind", async () => {
    const [alice, bob] = createSessionPair();
    const value = {
      name: "probe",
      count: -5,
      big: 2n ** 70n,
      ratio: 0.5,
      flag: true,
      nothing: null,
      raw: Uint8Array.of(9),
      tags: new Set(["a"]),
      index: new Map([[1, "one"]]),
      pair: Object.freeze(["x", 1]),
      items: [1, [2]],
    };

    await alice.send(value);
    const received = valueOf(await bob.recv());
    expect(received).toEqual(value);
    expect(Object.isFrozen(fieldOf(received, "pair"))).toBe(true);
  });

  it("preserves shared and cyclic references", async () => {
    const [alice, bob] = createSessionPair();
    const shared = { k: 1 };
    const node: Record<string, unknown> = { a: shared, b: shared };
    node.self = node;

    await alice.send(node);
    const received = valueOf(await bob.recv());
    expect(fieldOf(received, "a")).toBe(fieldOf(received, "b"));
    expect(fieldOf(received, "self")).toBe(received);
  });

  it("delivers a constraint failure and keeps going", async () => {
    const [alice, bob] = createSessionPair({}, { constraint: new ListOf(String, 2) });

    await alice.send(["a", "b", "c"]);
    await alice.send(["ok"]);

    const first = await bob.recv();
    expect(first?.ok).toBe(false);
    expect(first && !first.ok && first.failure.message).toBe("more than 2 list elements");
    expect(valueOf(await bob.recv())).toEqual(["ok"]);
    expect(bob.closed).toBeNull();
  });

  it("reports an object the sender refused as aborted", async () => {
    const [alice, bob] = createSessionPair();

    await expect(alice.send([callback])).rejects.toThrow(Violation);
    await alice.send("next");

    const first = await bob.recv();
    expect(first && !first.ok && first.failure.message).toBe("structure aborted by sender");
    expect(valueOf(await bob.recv())).toBe("next");
  });

  it("substitutes vocabulary words on the wire", async () => {
    const [alice, bob] = createSessionPair({ vocabulary: new Vocabulary(["list"]) });

    await alice.send(["list"]);
    expect(alice.transport.written.map((chunk) => Array.from(chunk))).toEqual([
      [0x88],
      [0x87],
      [0x87],
      [0x89],
    ]);
    expect(valueOf(await bob.recv())).toEqual(["list"]);
  });

  it("streams an object whose parts arrive later", async () => {
    const [alice, bob] = createSessionPair({ slicers: streamingSlicers() });
    const value = deferred<number>();

    const first = alice.send(new Later(value.promise));
    const second = alice.send("after");
    value.resolve(42);
    await first;
    await second;

    expect(valueOf(await bob.recv())).toEqual([42]);
    expect(valueOf(await bob.recv())).toBe("after");
  });

  it("drops the session when streaming is forbidden", async () => {
    const [alice, bob] = createSessionPair({ slicers: streamingSlicers() });
    alice.allowStreaming(false);
    const never = new Promise<number>(() => {});

    await expect(alice.send(new Later(never))).rejects.toThrow(
      "LaterSlicer suspended where streaming is not permitted",
    );
    expect(alice.closed).toBeInstanceOf(ProtocolError);

    expect(await bob.recv()).toBeNull();
    expect(bob.closed?.message).toBe(
      "remote error: LaterSlicer suspended where streaming is not permitted",
    );
  });

  it("tells the peer about a malformed stream", async () => {
    const [alice, bob] = createSessionPair();

    bob.dataReceived(Uint8Array.of(0x8b));
    expect(bob.closed?.message).toBe("unknown token type 0x8b");
    expect(await bob.recv()).toBeNull();

    expect(await alice.recv()).toBeNull();
    expect(alice.closed?.message).toBe("remote error: unknown token type 0x8b");
    expect(alice.closed?.fromPeer).toBe(true);
    await expect(alice.send(1)).rejects.toBe(alice.closed);
  });

  it("rejects sends still waiting when the connection is lost", async () => {
    const [alice] = createSessionPair({ slicers: streamingSlicers() });
    const never = new Promise<number>(() => {});

    const sent = alice.send(new Later(never));
    alice.connectionLost("gone");
    await expect(sent).rejects.toThrow("connection lost: gone");
  });

  it("ends iteration once the peer closes", async () => {
    const [alice, bob] = createSessionPair();

    await alice.send(1);
    await alice.send(2);
    alice.close();

    const values: unknown[] = [];
    for await (const result of bob) {
      values.push(valueOf(result));
    }
    expect(values).toEqual([1, 2]);
    expect(bob.closed?.message).toBe("connection lost: peer closed the transport");
  });
});
