import crypto from "crypto";
import type { HistoryEntry } from "@base-converter/shared";
import type { HistoryStore, HistoryQueryFilter, NewHistoryEntry } from "../../types/history";
import { RecordNotFound } from "../../types/errors";

export class InMemoryHistoryStore implements HistoryStore {
  private entries: HistoryEntry[] = [];

  constructor(private readonly capacity = 500) {}

  async record(entry: NewHistoryEntry): Promise<HistoryEntry> {
    const saved: HistoryEntry = { ...entry, id: crypto.randomUUID(), timestamp: entry.timestamp ?? Date.now() };
    this.entries.push(saved);
    // oldest go first
    while (this.entries.length > this.capacity) this.entries.shift();
    return saved;
  }

  async query(filter: HistoryQueryFilter = {}): Promise<HistoryEntry[]> {
    const { kind, since, until, limit = 100 } = filter;

    let out = this.entries;

    if (kind) out = out.filter(e => e.kind === kind);
    if (since) out = out.filter(e => e.timestamp >= since);
    if (until) out = out.filter(e => e.timestamp <= until);

    // newest first; equal timestamps keep reverse insertion order
    out = [...out].reverse().sort((a, b) => b.timestamp - a.timestamp);

    return out.slice(0, limit);
  }

  async get(id: string): Promise<HistoryEntry> {
    const entry = this.entries.find(e => e.id === id);
    if (!entry) throw new RecordNotFound(`History entry not found: ${id}`);
    return entry;
  }

  async clear(): Promise<number> {
    const removed = this.entries.length;
    this.entries = [];
    return removed;
  }
}
