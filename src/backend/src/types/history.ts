import type { HistoryEntry, HistoryKind } from "@base-converter/shared";

export type NewHistoryEntry = Omit<HistoryEntry, "id" | "timestamp"> & { timestamp?: number };

export type HistoryQueryFilter = Partial<{
  kind: HistoryKind;
  since: number;
  until: number;
  limit: number;
}>;

export interface HistoryStore {
  record(entry: NewHistoryEntry): Promise<HistoryEntry>;
  query(filter?: HistoryQueryFilter): Promise<HistoryEntry[]>;
  get(id: string): Promise<HistoryEntry>;
  clear(): Promise<number>;
}
