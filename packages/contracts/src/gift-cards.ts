/**
 * Gift Card Vault — hash-locked cards.
 *
 * A card is keyed by the SHA-256 commitment of its secret. Whoever presents
 * the secret redeems the card's value. A card may also name a designated
 * beneficiary, who can claim it without the secret and pass it on; bearer
 * cards cannot be transferred, since the secret is the only entitlement.
 */

import { createHash, timingSafeEqual } from "node:crypto";
import type { GiftCardRecord, Principal, RecordView } from "@custodia/types";
import { CustodyError } from "@custodia/custody";
import type { CallContext, CustodyEngine } from "@custodia/custody";
import { recordOfKind } from "./pages.js";

const COMMITMENT_PATTERN = /^[0-9a-f]{64}$/;

/** SHA-256 hex of the UTF-8 secret. */
export function commitmentOf(secret: string): string {
  if (secret === "") {
    throw new CustodyError("INVALID_INPUT", "Secret must be non-empty");
  }
  return createHash("sha256").update(secret, "utf8").digest("hex");
}

/** Constant-time check that `secret` opens `commitment`. */
export function opens(secret: string, commitment: string): boolean {
  if (!COMMITMENT_PATTERN.test(commitment)) {
    return false;
  }
  return timingSafeEqual(
    Buffer.from(commitmentOf(secret), "hex"),
    Buffer.from(commitment, "hex"),
  );
}

export interface CreateCard {
  readonly commitment: string;
  /** Designated holder; omitted for a bearer card */
  readonly beneficiary?: Principal | undefined;
  /** Seconds until the depositor may reclaim an unredeemed card */
  readonly duration?: number | undefined;
  readonly message?: string | undefined;
}

export class GiftCardVault {
  constructor(readonly engine: CustodyEngine) {}

  /** Lock the attached value behind a commitment. */
  create(ctx: CallContext, card: CreateCard): GiftCardRecord {
    return this.engine.run(ctx, "createCard", () => {
      if (ctx.value <= 0n) {
        throw new CustodyError("INVALID_INPUT", "A gift card needs a positive attached value", card.commitment);
      }
      if (!COMMITMENT_PATTERN.test(card.commitment)) {
        throw new CustodyError(
          "INVALID_INPUT",
          "Commitment must be 64 lowercase hex characters",
          card.commitment,
        );
      }
      this.engine.create(
        ctx,
        {
          key: card.commitment,
          kind: "gift-card",
          value: ctx.value,
          beneficiary: card.beneficiary ?? ctx.caller,
          payload: "",
          designated: card.beneficiary !== undefined,
          message: card.message ?? "",
        },
        { guard: "open", duration: card.duration },
      );
      return this.engine.requireKind(card.commitment, "gift-card");
    });
  }

  /** Present the secret; the card's value is paid to the caller. */
  redeem(ctx: CallContext, secret: string, message = ""): GiftCardRecord {
    return this.engine.run(ctx, "redeemCard", () => {
      const commitment = commitmentOf(secret);
      const card = this.engine.requireKind(commitment, "gift-card");
      if (!opens(secret, card.key)) {
        throw new CustodyError("UNAUTHORIZED", "Secret does not open this card", card.key);
      }
      this.engine.redeem(ctx, card.key, { guard: "open", note: message });
      return this.engine.requireKind(card.key, "gift-card");
    });
  }

  /** The designated beneficiary redeems without the secret. */
  claim(ctx: CallContext, commitment: string, message = ""): GiftCardRecord {
    return this.engine.run(ctx, "claimCard", () => {
      const card = this.engine.requireKind(commitment, "gift-card");
      if (!card.designated) {
        throw new CustodyError("INVALID_STATE", "Bearer cards can only be redeemed with the secret", commitment);
      }
      this.engine.redeem(ctx, commitment, { guard: "beneficiary", note: message });
      return this.engine.requireKind(commitment, "gift-card");
    });
  }

  transfer(ctx: CallContext, commitment: string, to: Principal): GiftCardRecord {
    return this.engine.run(ctx, "transferCard", () => {
      const card = this.engine.requireKind(commitment, "gift-card");
      if (!card.designated) {
        throw new CustodyError("INVALID_STATE", "Bearer cards cannot be transferred", commitment);
      }
      this.engine.transfer(ctx, commitment, to);
      return this.engine.requireKind(commitment, "gift-card");
    });
  }

  /** The depositor takes the value back. Accepts the commitment or the secret. */
  cancel(ctx: CallContext, commitmentOrSecret: string): GiftCardRecord {
    return this.engine.run(ctx, "cancelCard", () => {
      const key = this._resolve(commitmentOrSecret);
      this.engine.requireKind(key, "gift-card");
      this.engine.cancel(ctx, key);
      return this.engine.requireKind(key, "gift-card");
    });
  }

  /** Refund a lapsed card to its depositor. Open to any caller. */
  expire(ctx: CallContext, commitment: string): GiftCardRecord {
    return this.engine.run(ctx, "expireCard", () => {
      this.engine.requireKind(commitment, "gift-card");
      this.engine.expire(ctx, commitment);
      return this.engine.requireKind(commitment, "gift-card");
    });
  }

  get(commitment: string): GiftCardRecord | undefined {
    return recordOfKind(this.engine.get(commitment), "gift-card");
  }

  inspect(commitment: string): RecordView | undefined {
    return this.get(commitment) === undefined ? undefined : this.engine.inspect(commitment);
  }

  private _resolve(commitmentOrSecret: string): string {
    if (this.get(commitmentOrSecret) !== undefined) {
      return commitmentOrSecret;
    }
    return commitmentOf(commitmentOrSecret);
  }
}
