/**
 * Gift Registry — items the owner lists and guests buy outright.
 *
 * Rules:
 * - Only the owner lists or removes items
 * - A purchase attaches exactly the listed price, which is paid to the
 *   current owner in the same operation
 * - Each item is bought at most once
 */

import type { RecordView, RegistryItemRecord } from "@custodia/types";
import type { PaginatedResponse } from "@custodia/ledger";
import { CustodyError } from "@custodia/custody";
import type { CallContext, CustodyEngine, PageRequest } from "@custodia/custody";
import { pageOfKind, recordOfKind } from "./pages.js";

export interface AddItem {
  readonly itemId: string;
  readonly name: string;
  readonly price: bigint;
  readonly payload?: string | undefined;
}

export interface ItemFilter {
  /** Only items still open for purchase */
  readonly available?: boolean | undefined;
}

export class GiftRegistry {
  constructor(readonly engine: CustodyEngine) {}

  addItem(ctx: CallContext, item: AddItem): RegistryItemRecord {
    return this.engine.run(ctx, "addItem", () => {
      this.engine.access.requireOwner(ctx.caller);
      if (item.name.trim() === "") {
        throw new CustodyError("INVALID_INPUT", "Item name must be non-empty", item.itemId);
      }
      if (item.price <= 0n) {
        throw new CustodyError("INVALID_INPUT", `Price must be positive, got ${item.price.toString()}`, item.itemId);
      }
      this.engine.create(
        ctx,
        {
          key: item.itemId,
          kind: "registry-item",
          value: 0n,
          beneficiary: ctx.caller,
          payload: item.payload ?? "",
          name: item.name,
          price: item.price,
        },
        { guard: "owner" },
      );
      return this.engine.requireKind(item.itemId, "registry-item");
    });
  }

  /** Buy an item; the attached value must equal its price. */
  purchase(ctx: CallContext, itemId: string): RegistryItemRecord {
    return this.engine.run(ctx, "purchase", () => {
      const item = this.engine.requireKind(itemId, "registry-item");
      this.engine.redeem(ctx, itemId, {
        guard: "open",
        price: item.price,
        recipient: this.engine.access.owner,
      });
      return this.engine.requireKind(itemId, "registry-item");
    });
  }

  removeItem(ctx: CallContext, itemId: string, reason = ""): RegistryItemRecord {
    return this.engine.run(ctx, "removeItem", () => {
      this.engine.access.requireOwner(ctx.caller);
      this.engine.requireKind(itemId, "registry-item");
      this.engine.void(ctx, itemId, reason);
      return this.engine.requireKind(itemId, "registry-item");
    });
  }

  get(itemId: string): RegistryItemRecord | undefined {
    return recordOfKind(this.engine.get(itemId), "registry-item");
  }

  inspect(itemId: string): RecordView | undefined {
    return this.get(itemId) === undefined ? undefined : this.engine.inspect(itemId);
  }

  listItems(request: PageRequest = {}, filter: ItemFilter = {}): PaginatedResponse<RegistryItemRecord> {
    const page = this.engine.list(
      request,
      (r) => r.kind === "registry-item" && (filter.available !== true || r.status === "active"),
    );
    return pageOfKind(page, "registry-item");
  }
}
