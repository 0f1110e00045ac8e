/**
 * Warranty Registry — non-monetary warranties keyed by serial number.
 *
 * Rules:
 * - Only the owner issues or voids warranties
 * - The holder may transfer or claim until the warranty expires
 * - A claim is recorded once; the warranty is then terminal
 */

import type { Principal, RecordView, WarrantyRecord } from "@custodia/types";
import type { PaginatedResponse } from "@custodia/ledger";
import type { CallContext, CustodyEngine, PageRequest } from "@custodia/custody";
import { pageOfKind, recordOfKind } from "./pages.js";

export interface IssueWarranty {
  readonly serial: string;
  readonly holder: Principal;
  /** Seconds of cover from issue */
  readonly duration: number;
  readonly payload?: string | undefined;
}

export class WarrantyRegistry {
  constructor(readonly engine: CustodyEngine) {}

  issue(ctx: CallContext, warranty: IssueWarranty): WarrantyRecord {
    return this.engine.run(ctx, "issueWarranty", () => {
      this.engine.create(
        ctx,
        {
          key: warranty.serial,
          kind: "warranty",
          value: 0n,
          beneficiary: warranty.holder,
          payload: warranty.payload ?? "",
          transferCount: 0,
        },
        { guard: "owner", duration: warranty.duration },
      );
      return this.engine.requireKind(warranty.serial, "warranty");
    });
  }

  transfer(ctx: CallContext, serial: string, to: Principal): WarrantyRecord {
    return this.engine.run(ctx, "transferWarranty", () => {
      this.engine.requireKind(serial, "warranty");
      this.engine.transfer(ctx, serial, to);
      return this.engine.requireKind(serial, "warranty");
    });
  }

  void(ctx: CallContext, serial: string, reason: string): WarrantyRecord {
    return this.engine.run(ctx, "voidWarranty", () => {
      this.engine.access.requireOwner(ctx.caller);
      this.engine.requireKind(serial, "warranty");
      this.engine.void(ctx, serial, reason);
      return this.engine.requireKind(serial, "warranty");
    });
  }

  /** The holder files a claim, ending the warranty. */
  claim(ctx: CallContext, serial: string, note: string): WarrantyRecord {
    return this.engine.run(ctx, "claimWarranty", () => {
      this.engine.requireKind(serial, "warranty");
      this.engine.redeem(ctx, serial, { guard: "beneficiary", note });
      return this.engine.requireKind(serial, "warranty");
    });
  }

  /** Anyone may write the expiry once cover has lapsed. */
  expire(ctx: CallContext, serial: string): WarrantyRecord {
    return this.engine.run(ctx, "expireWarranty", () => {
      this.engine.requireKind(serial, "warranty");
      this.engine.expire(ctx, serial);
      return this.engine.requireKind(serial, "warranty");
    });
  }

  get(serial: string): WarrantyRecord | undefined {
    return recordOfKind(this.engine.get(serial), "warranty");
  }

  inspect(serial: string): RecordView | undefined {
    return this.get(serial) === undefined ? undefined : this.engine.inspect(serial);
  }

  /** Warranties currently held by `holder`, in issue order. */
  warrantiesOf(holder: Principal, request: PageRequest = {}): PaginatedResponse<WarrantyRecord> {
    const page = this.engine.list(request, (r) => r.kind === "warranty" && r.beneficiary === holder);
    return pageOfKind(page, "warranty");
  }
}
