// The bottom of the receive stack.
//
// Owns open-type policy for the whole stack: every index token is checked
// here and every completed open type is looked up in the registry here.
// Each finished top-level object (or its Failure) is handed to `deliver`.

import {
  ProtocolError,
  TokenType,
  Violation,
  tokenName,
} from "@tessera/wire";
import type { Constraint, OpenType } from "@tessera/schema";
import type { UnslicerRegistry } from "./registry.ts";
import { BaseUnslicer, type Opener, type Unslicer } from "./unslicer.ts";

/** Longest STRING accepted as an index token. */
export const OPENTYPE_TOKEN_LIMIT = 200;

/** Most index tokens in one open type. */
export const OPENTYPE_LENGTH_LIMIT = 8;

export class RootUnslicer extends BaseUnslicer implements Opener {
  constructor(
    private readonly registry: UnslicerRegistry,
    private readonly deliver: (child: unknown) => void,
    constraint: Constraint | null = null,
  ) {
    super();
    this.constraint = constraint;
  }

  protected override get opener(): Opener {
    return this;
  }

  /** Every top-level object is held to the session's constraint. */
  protected override childConstraint(): Constraint | null {
    return this.constraint;
  }

  override openerCheckToken(type: TokenType, size: number, opentype: OpenType): void {
    if (type !== TokenType.STRING && type !== TokenType.VOCAB) {
      throw new Violation(`open type tokens must be strings, got ${tokenName(type)}`);
    }
    if (type === TokenType.STRING && size > OPENTYPE_TOKEN_LIMIT) {
      throw Violation.tooLong("open type token", size, OPENTYPE_TOKEN_LIMIT);
    }
    if (opentype.length >= OPENTYPE_LENGTH_LIMIT) {
      throw Violation.tooMany("open type tokens", OPENTYPE_LENGTH_LIMIT);
    }
  }

  open(opentype: OpenType): Unslicer | null {
    return this.registry.create(opentype);
  }

  receiveChild(child: unknown): void {
    this.deliver(child);
  }

  receiveClose(): never {
    throw new ProtocolError("CLOSE with no structure open");
  }

  override describe(): string {
    return "<root>";
  }
}
