import type { LedgerMode } from "./config";
import { comparePageKeys } from "./pages";
import type { PageKey, TransactionRecord } from "./parsers";

export type PageRecords = {
  pageKey: PageKey;
  records: readonly TransactionRecord[];
};

function sortByPageKey(
  records: readonly TransactionRecord[]
): readonly TransactionRecord[] {
  // Array#sort is stable, so intra-page line order survives.
  return Object.freeze(
    [...records].sort((a, b) => comparePageKeys(a.pageKey, b.pageKey))
  );
}

export function buildLedger(pages: readonly PageRecords[]): TransactionRecord[] {
  return [...pages]
    .sort((a, b) => comparePageKeys(a.pageKey, b.pageKey))
    .flatMap((page) => page.records);
}

export class Ledger {
  private state: readonly TransactionRecord[];

  constructor(initial: readonly TransactionRecord[] = []) {
    this.state = sortByPageKey(initial);
  }

  get records(): readonly TransactionRecord[] {
    return this.state;
  }

  get size(): number {
    return this.state.length;
  }

  documentIds(): string[] {
    return [...new Set(this.state.map((record) => record.pageKey.documentId))];
  }

  append(records: readonly TransactionRecord[]): void {
    this.state = sortByPageKey([...this.state, ...records]);
  }

  rebuild(documentId: string, records: readonly TransactionRecord[]): void {
    const foreign = records.find(
      (record) => record.pageKey.documentId !== documentId
    );
    if (foreign) {
      throw new Error(
        `Cannot rebuild ${documentId} with a record from ${foreign.pageKey.documentId}`
      );
    }
    const kept = this.state.filter(
      (record) => record.pageKey.documentId !== documentId
    );
    this.state = sortByPageKey([...kept, ...records]);
  }

  commit(
    mode: LedgerMode,
    documentId: string,
    records: readonly TransactionRecord[]
  ): void {
    if (mode === "rebuild") {
      this.rebuild(documentId, records);
    } else {
      this.append(records);
    }
  }
}
