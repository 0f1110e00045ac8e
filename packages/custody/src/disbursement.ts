/**
 * @custodia/custody — Disbursement.
 *
 * The only code path that moves value out of custody. By the time
 * `payout` is called the record has already been zeroed or flipped to a
 * terminal status; payout debits custody, appends the history entry and
 * only then calls the substrate. A re-entrant call made by the recipient
 * sees the post-payout record.
 */

import type { CustodyRecord, HistoryEntry } from "@custodia/types";
import type { HistoryDraft, LedgerStore } from "@custodia/ledger";
import type { Logger } from "pino";
import { CustodyError } from "./errors.js";
import type { ValueTransfer } from "./value-transfer.js";

export class Disbursement {
  private readonly _store: LedgerStore<CustodyRecord>;
  private readonly _transfer: ValueTransfer;
  private readonly _log: Logger;

  constructor(store: LedgerStore<CustodyRecord>, transfer: ValueTransfer, log: Logger) {
    this._store = store;
    this._transfer = transfer;
    this._log = log;
  }

  /**
   * Pay `order.amount` to `order.counterparty`.
   *
   * @throws {CustodyError} TRANSFER_FAILED when the substrate refuses; the
   * enclosing operation rolls back, including the debit and history entry.
   */
  payout(order: HistoryDraft): HistoryEntry {
    if (order.amount <= 0n) {
      throw new CustodyError(
        "INVALID_INPUT",
        `Payout amount must be positive, got ${order.amount.toString()}`,
        order.key,
      );
    }

    this._store.debit(order.amount);
    const entry = this._store.history.append(order);

    const outcome = this._transfer.send({
      key: order.key,
      to: order.counterparty,
      amount: order.amount,
      reason: order.action,
    });

    if (!outcome.ok) {
      this._log.warn(
        { key: order.key, to: order.counterparty, amount: order.amount.toString(), reason: outcome.reason },
        "Payout failed",
      );
      throw new CustodyError(
        "TRANSFER_FAILED",
        `Payout of ${order.amount.toString()} to ${order.counterparty} failed: ${outcome.reason}`,
        order.key,
      );
    }

    const { receipt } = outcome;
    this._store.journal.record(() => {
      this._transfer.revert(receipt);
    });

    this._log.debug(
      { key: order.key, to: order.counterparty, amount: order.amount.toString(), receipt: receipt.id },
      "Payout settled",
    );
    return entry;
  }
}
