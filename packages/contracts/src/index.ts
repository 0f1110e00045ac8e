/**
 * @custodia/contracts — The five custodial ledgers, each a thin façade
 * over one CustodyEngine.
 */

export { WarrantyRegistry } from "./warranty-registry.js";
export type { IssueWarranty } from "./warranty-registry.js";

export { GiftRegistry } from "./gift-registry.js";
export type { AddItem, ItemFilter } from "./gift-registry.js";

export { GiftCardVault, commitmentOf, opens } from "./gift-cards.js";
export type { CreateCard } from "./gift-cards.js";

export { SharedTreasury, DEFAULT_POOL_KEY } from "./shared-treasury.js";

export { EventEscrow, rsvpKey } from "./event-escrow.js";
export type { CreateEvent } from "./event-escrow.js";

export { pageOfKind, recordOfKind } from "./pages.js";
