export interface AuditRecord {
  timestamp: number;
  key: Buffer | null;
  value: Buffer;
}

export interface AuditBatchLimits {
  maxBytes: number;
  maxEntries: number;
}

/**
 * Bounded buffer of serialized audit records, delivered as one unit
 *
 * The first record is always accepted so an oversized entry still travels
 * alone instead of blocking the batch forever.
 */
export class AuditBatch {
  private readonly records: AuditRecord[] = [];
  private bytes = 0;
  private closed = false;

  constructor(private readonly limits: AuditBatchLimits) {}

  /**
   * Appends a record
   *
   * @param timestamp - epoch milliseconds, `null` for the current time
   * @returns remaining capacity in bytes, or `null` when the record does not fit
   */
  append(timestamp: number | null, key: Buffer | null, value: Buffer): number | null {
    if (this.closed) {
      throw new Error('Cannot append to a closed audit batch');
    }

    const recordSize = value.length + (key?.length ?? 0);
    const fits =
      this.records.length === 0 ||
      (this.records.length < this.limits.maxEntries && this.bytes + recordSize <= this.limits.maxBytes);

    if (!fits) {
      return null;
    }

    this.records.push({ timestamp: timestamp ?? Date.now(), key, value });
    this.bytes += recordSize;

    return Math.max(this.limits.maxBytes - this.bytes, 0);
  }

  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.records.length;
  }

  get sizeInBytes(): number {
    return this.bytes;
  }

  get isEmpty(): boolean {
    return this.records.length === 0;
  }

  getRecords(): readonly AuditRecord[] {
    return this.records;
  }
}
