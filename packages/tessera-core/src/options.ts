// Session configuration.

import { Vocabulary } from "@tessera/wire";
import { type Constraint, type ConstraintLike, adapt } from "@tessera/schema";
import { SlicerRegistry } from "./slicing/registry.ts";
import { UnslicerRegistry } from "./unslicing/registry.ts";

/** Default outer limit on any long-token body: 1 MiB. */
export const DEFAULT_MAX_TOKEN_SIZE = 1024 * 1024;

/** Default limit on nesting depth. */
export const DEFAULT_MAX_DEPTH = 64;

export type ReferenceScope = "connection" | "message";

export interface SessionOptions {
  /**
   * Largest STRING, LONGINT, LONGNEG or ERROR body accepted, whatever the
   * constraints say. Defaults to 1 MiB.
   */
  maxTokenSize?: number;

  /**
   * Deepest nesting of structures accepted. Defaults to 64.
   */
  maxDepth?: number;

  /**
   * Abbreviation table for common strings. Both peers must use the same
   * table. Defaults to an empty table.
   */
  vocabulary?: Vocabulary;

  /**
   * Constraint every received top-level object must meet. Defaults to
   * none.
   */
  constraint?: ConstraintLike;

  /**
   * How long sent and received objects stay referenceable: for the whole
   * connection, or only within one top-level object. Both peers must
   * agree. Defaults to "connection".
   */
  referenceScope?: ReferenceScope;

  /**
   * Let slicers suspend production while waiting on a promise. Defaults to
   * true.
   */
  streaming?: boolean;

  /** Slicers for application types. Defaults to the built-ins only. */
  slicers?: SlicerRegistry;

  /** Unslicers for application open types. Defaults to the built-ins only. */
  unslicers?: UnslicerRegistry;

  /**
   * Debug namespace pattern, e.g. "tessera:*". Defaults to the DEBUG
   * environment variable.
   */
  debug?: string;
}

export interface ResolvedOptions {
  maxTokenSize: number;
  maxDepth: number;
  vocabulary: Vocabulary;
  constraint: Constraint | null;
  referenceScope: ReferenceScope;
  streaming: boolean;
  slicers: SlicerRegistry;
  unslicers: UnslicerRegistry;
  debug: string | undefined;
}

/**
 * Fill in defaults.
 *
 * @throws RangeError if a limit is not a positive integer
 */
export function resolveOptions(options: SessionOptions = {}): ResolvedOptions {
  const maxTokenSize = options.maxTokenSize ?? DEFAULT_MAX_TOKEN_SIZE;
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  requirePositive("maxTokenSize", maxTokenSize);
  requirePositive("maxDepth", maxDepth);

  return {
    maxTokenSize,
    maxDepth,
    vocabulary: options.vocabulary ?? new Vocabulary(),
    constraint: options.constraint === undefined ? null : adapt(options.constraint),
    referenceScope: options.referenceScope ?? "connection",
    streaming: options.streaming ?? true,
    slicers: options.slicers ?? SlicerRegistry.standard(),
    unslicers: options.unslicers ?? UnslicerRegistry.standard(),
    debug: options.debug,
  };
}

function requirePositive(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}
