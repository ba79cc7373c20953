// Record store: a JSON file holding one ordered collection of records

import * as fs from 'fs/promises';
import type { z } from 'zod';
import type { StoredRecord } from '../../models/record.js';
import { CorruptStoreError, StorageError, ValidationError, errnoCode } from '../../core/errors.js';
import { formatIssues } from '../../core/schemas.js';
import { Logger, logger as defaultLogger } from '../../core/logger.js';
import { IdGenerator, defaultIdGenerator } from '../id-generator.js';
import { writeFileAtomic } from './atomic-file.js';
import { WriteLock } from './write-lock.js';
import { chronological, countByGroup } from './ordering.js';

/**
 * Retention applied inside every mutation of a store.
 * `beforeWrite` sees the stored records before the requested change (time-driven catch-up),
 * `afterWrite` sees them after it. Both are pure and must not throw on valid records.
 */
export interface RetentionPolicy<R extends StoredRecord> {
  readonly name: string;
  beforeWrite?(records: readonly R[], now: Date): R[];
  afterWrite(records: readonly R[], now: Date): R[];
}

/**
 * Configuration shared by every record store
 */
export interface RecordStoreOptions {
  /** JSON file backing the store */
  filePath: string;
  /** Time source (default: system clock) */
  clock?: () => Date;
  idGenerator?: IdGenerator;
  logger?: Logger;
}

/**
 * Identity fields the store assigns on append
 */
export interface RecordIdentity {
  id: string;
  createdAt: Date;
}

/**
 * Count of records before and after a forced retention pass
 */
export interface RetentionOutcome {
  before: number;
  after: number;
}

/**
 * Result of a mutation: the new collection plus a value handed back to the caller
 */
export interface MutationResult<R, T> {
  records: R[];
  result: T;
}

/**
 * Base class for disk-persisted record collections.
 *
 * The whole collection is held in memory in insertion order. Every mutation runs under
 * the store's write lock and goes through the same steps: retention `beforeWrite`, the
 * change itself, retention `afterWrite`, atomic persist, and only then commit to memory.
 * A failure at any step leaves both the file and the in-memory collection untouched.
 * Reads serve the last committed snapshot and never wait for the lock.
 */
export abstract class RecordStore<R extends StoredRecord, D extends { id?: string; groupKey: string; createdAt?: Date }> {
  protected readonly filePath: string;
  protected readonly clock: () => Date;
  protected readonly logger: Logger;
  private readonly idGenerator: IdGenerator;
  private readonly lock = new WriteLock();

  private records: readonly R[] = [];
  private byId = new Map<string, R>();
  private groupIndex = new Map<string, readonly R[]>();
  private opened = false;

  /** Prefix of generated IDs */
  protected abstract readonly idPrefix: string;
  /** Label used in error messages */
  protected abstract readonly recordLabel: string;
  /** Decodes the persisted collection */
  protected abstract readonly schema: z.ZodType<R[], z.ZodTypeDef, unknown>;
  protected abstract readonly policy: RetentionPolicy<R>;

  /** Builds a full record from an append draft */
  protected abstract materialize(draft: D, identity: RecordIdentity): R;
  /** Converts a record to its persisted JSON shape */
  protected abstract encode(record: R): unknown;

  constructor(options: RecordStoreOptions) {
    this.filePath = options.filePath;
    this.clock = options.clock ?? (() => new Date());
    this.idGenerator = options.idGenerator ?? defaultIdGenerator;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Loads the persisted collection. A missing or empty file is an empty store.
   *
   * @throws CorruptStoreError if the file holds anything but a valid collection
   */
  async open(): Promise<void> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        this.commit([]);
        this.opened = true;
        return;
      }
      throw new StorageError(`Failed to read store: ${this.filePath}`, {
        filePath: this.filePath,
        cause: error instanceof Error ? error.message : String(error)
      });
    }

    if (content.trim() === '') {
      this.commit([]);
      this.opened = true;
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new CorruptStoreError(this.filePath, [
        `invalid JSON: ${error instanceof Error ? error.message : String(error)}`
      ]);
    }

    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      throw new CorruptStoreError(this.filePath, formatIssues(parsed.error));
    }

    const seen = new Set<string>();
    for (const record of parsed.data) {
      if (seen.has(record.id)) {
        throw new CorruptStoreError(this.filePath, [`duplicate id: ${record.id}`]);
      }
      seen.add(record.id);
    }

    this.commit(parsed.data);
    this.opened = true;
    this.logger.debug('Opened store', { filePath: this.filePath, records: parsed.data.length });
  }

  /**
   * Appends a record, assigning `id` and `createdAt` when absent, then applies retention
   * and persists. Returns the record as stored (it may already have been trimmed if it
   * was older than everything retention keeps).
   *
   * @throws ValidationError if the identity fields are blank or invalid, or an explicit id already exists
   */
  async append(draft: D): Promise<R> {
    if (draft.id === '') {
      throw new ValidationError(`${this.recordLabel} id must not be empty`, 'id');
    }
    if (draft.groupKey === '') {
      throw new ValidationError(`${this.recordLabel} group key must not be empty`, 'groupKey');
    }
    if (draft.createdAt !== undefined && Number.isNaN(draft.createdAt.getTime())) {
      throw new ValidationError(`${this.recordLabel} createdAt is not a valid date`, 'createdAt');
    }

    return this.mutate((records, now) => {
      const ids = new Set(records.map(record => record.id));

      if (draft.id !== undefined && ids.has(draft.id)) {
        throw new ValidationError(`${this.recordLabel} already exists: ${draft.id}`, 'id');
      }

      const createdAt = draft.createdAt ?? now;
      const record = this.materialize(draft, {
        id: draft.id ?? this.nextId(ids, createdAt),
        createdAt
      });

      return { records: [...records, record], result: record };
    });
  }

  /**
   * Up to `limit` most recent records of a group, oldest first.
   * The sequence is lazy and restartable: each iteration walks the snapshot taken by this call.
   */
  query(groupKey: string, limit: number): Iterable<R> {
    this.assertOpen();
    if (!Number.isInteger(limit) || limit < 0) {
      throw new ValidationError(`limit must be a non-negative integer (got ${limit})`, 'limit');
    }

    const bucket = this.groupIndex.get(groupKey) ?? [];
    return {
      *[Symbol.iterator]() {
        for (let index = Math.max(0, bucket.length - limit); index < bucket.length; index++) {
          yield bucket[index];
        }
      }
    };
  }

  /**
   * Full snapshot in insertion order
   */
  all(): R[] {
    this.assertOpen();
    return [...this.records];
  }

  count(): number {
    this.assertOpen();
    return this.records.length;
  }

  /**
   * Record counts per group key
   */
  groups(): Record<string, number> {
    this.assertOpen();
    return Object.fromEntries(countByGroup(this.records));
  }

  /**
   * Record by id from the committed snapshot
   */
  find(id: string): R | undefined {
    this.assertOpen();
    return this.byId.get(id);
  }

  /**
   * Runs a mutation that adds nothing, so pending time-driven transitions and caps
   * are applied and persisted.
   */
  async applyRetention(): Promise<RetentionOutcome> {
    const before = this.count();
    await this.mutate(records => ({ records, result: undefined }));
    return { before, after: this.count() };
  }

  /**
   * The single mutation path: lock, retention, change, retention, persist, commit.
   */
  protected async mutate<T>(operation: (records: R[], now: Date) => MutationResult<R, T>): Promise<T> {
    this.assertOpen();

    return this.lock.runExclusive(async () => {
      const now = this.clock();
      const swept = this.policy.beforeWrite
        ? this.policy.beforeWrite(this.records, now)
        : [...this.records];

      const { records: written, result } = operation(swept, now);
      const retained = this.policy.afterWrite(written, now);

      await this.persist(retained);
      this.commit(retained);
      this.logger.debug('Persisted store', {
        filePath: this.filePath,
        policy: this.policy.name,
        records: retained.length
      });

      return result;
    });
  }

  /**
   * Writes the collection, after checking it against the same schema `open()` applies,
   * so a store never writes a file it could not load again.
   *
   * @throws ValidationError if a record does not fit the persisted format
   */
  private async persist(records: readonly R[]): Promise<void> {
    const encoded = records.map(record => this.encode(record));
    const checked = this.schema.safeParse(encoded);
    if (!checked.success) {
      throw new ValidationError(`${this.recordLabel} does not fit the stored format`, 'record', {
        issues: formatIssues(checked.error)
      });
    }

    const content = JSON.stringify(encoded, null, 2) + '\n';
    try {
      await writeFileAtomic(this.filePath, content);
    } catch (error) {
      throw new StorageError(`Failed to persist store: ${this.filePath}`, {
        filePath: this.filePath,
        cause: error instanceof Error ? error.message : String(error)
      });
    }
  }

  private commit(records: readonly R[]): void {
    this.records = records;
    this.byId = new Map(records.map(record => [record.id, record]));

    const buckets = new Map<string, R[]>();
    for (const record of records) {
      const bucket = buckets.get(record.groupKey);
      if (bucket) {
        bucket.push(record);
      } else {
        buckets.set(record.groupKey, [record]);
      }
    }

    this.groupIndex = new Map(
      [...buckets].map(([groupKey, bucket]) => [groupKey, chronological(bucket)])
    );
  }

  private nextId(taken: ReadonlySet<string>, createdAt: Date): string {
    let id = this.idGenerator.generateId(this.idPrefix, createdAt);
    while (taken.has(id)) {
      id = this.idGenerator.generateId(this.idPrefix, createdAt);
    }
    return id;
  }

  private assertOpen(): void {
    if (!this.opened) {
      throw new StorageError(`Store has not been opened: ${this.filePath}`, { filePath: this.filePath });
    }
  }
}
