import type { ProgressSink, ProgressSnapshot, ScanRecord, ScanStore } from '../types.js';

export type SnapshotListener = (snapshot: ProgressSnapshot) => void;

/**
 * Progress sink kept in memory. Holds the latest snapshot per scan plus a
 * bounded history; listeners are called synchronously on publish.
 */
export class InMemoryProgressSink implements ProgressSink {
  private readonly latestByScan = new Map<string, ProgressSnapshot>();
  private readonly historyByScan = new Map<string, ProgressSnapshot[]>();
  private readonly listeners = new Map<string, Set<SnapshotListener>>();

  constructor(private readonly historyLimit = 100) {}

  publish(snapshot: ProgressSnapshot): void {
    this.latestByScan.set(snapshot.scanId, snapshot);

    const history = this.historyByScan.get(snapshot.scanId) ?? [];
    history.push(snapshot);
    if (history.length > this.historyLimit) history.shift();
    this.historyByScan.set(snapshot.scanId, history);

    for (const listener of this.listeners.get(snapshot.scanId) ?? []) {
      listener(snapshot);
    }
  }

  latest(scanId: string): ProgressSnapshot | undefined {
    return this.latestByScan.get(scanId);
  }

  forget(scanId: string): void {
    this.latestByScan.delete(scanId);
    this.historyByScan.delete(scanId);
    this.listeners.delete(scanId);
  }

  history(scanId: string): ProgressSnapshot[] {
    return [...(this.historyByScan.get(scanId) ?? [])];
  }

  /**
   * Listen to one scan's snapshots. Returns the unsubscribe function.
   */
  subscribe(scanId: string, listener: SnapshotListener): () => void {
    const set = this.listeners.get(scanId) ?? new Set<SnapshotListener>();
    set.add(listener);
    this.listeners.set(scanId, set);
    return () => {
      set.delete(listener);
      if (set.size === 0) this.listeners.delete(scanId);
    };
  }
}

/**
 * Scan records kept in memory, listed newest first
 */
export class InMemoryScanStore implements ScanStore {
  private readonly records = new Map<string, ScanRecord>();

  async save(record: ScanRecord): Promise<void> {
    this.records.set(record.scanId, { ...record, errors: [...record.errors] });
  }

  async update(
    scanId: string,
    patch: Partial<Omit<ScanRecord, 'scanId'>>
  ): Promise<ScanRecord | null> {
    const current = this.records.get(scanId);
    if (!current) return null;
    const updated: ScanRecord = { ...current, ...patch, scanId };
    this.records.set(scanId, updated);
    return { ...updated };
  }

  async get(scanId: string): Promise<ScanRecord | null> {
    const record = this.records.get(scanId);
    return record ? { ...record } : null;
  }

  async list(options: { limit?: number; offset?: number } = {}): Promise<ScanRecord[]> {
    const { limit = 50, offset = 0 } = options;
    return [...this.records.values()]
      .sort((a, b) => (a.startedAt < b.startedAt ? 1 : a.startedAt > b.startedAt ? -1 : 0))
      .slice(offset, offset + limit)
      .map((record) => ({ ...record }));
  }
}
