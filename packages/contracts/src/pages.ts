import type { CustodyRecord, RecordKind, RecordKindMap } from "@custodia/types";
import { isRecordOfKind } from "@custodia/types";
import type { PaginatedResponse } from "@custodia/ledger";

/** Narrow a page whose filter already selected a single kind. */
export function pageOfKind<K extends RecordKind>(
  page: PaginatedResponse<CustodyRecord>,
  kind: K,
): PaginatedResponse<RecordKindMap[K]> {
  return {
    data: page.data.filter((r): r is RecordKindMap[K] => isRecordOfKind(r, kind)),
    pagination: page.pagination,
  };
}

/** `undefined` when the key is unassigned or holds another kind. */
export function recordOfKind<K extends RecordKind>(
  record: CustodyRecord | undefined,
  kind: K,
): RecordKindMap[K] | undefined {
  return record !== undefined && isRecordOfKind(record, kind) ? record : undefined;
}
