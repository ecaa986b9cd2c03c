// ═══════════════════════════════════════════════════════════════════════════════
// PROFILE STORE — Durable User Profiles with Serialized Updates
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every profile lives in one document. The committed copy is held in memory
// and the durable medium is rewritten in full on each update.
//
// Concurrency:
//   - updates for the same user run one after another (per-user lock)
//   - updates for different users never wait on each other's locks; their
//     profiles queue for the writer, which flushes everything pending in one
//     document write (group commit)
//   - the in-memory copy is committed only after the write succeeds, so a
//     failed update leaves nothing behind
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { DocumentStorage } from '../../storage/index.js';
import { KeyedLock } from '../../infrastructure/lock/index.js';
import { retryWithFixedDelay, type RetryPolicy } from '../../infrastructure/retry/index.js';
import { getLogger, toError } from '../../logging/index.js';
import type { Result } from '../../types/result.js';
import { ok, err } from '../../types/result.js';
import { StoreError, ValidationError } from './errors.js';
import { parseDocument, normalizeProfile, serializeDocument } from './schema.js';
import {
  createDefaultProfile,
  createEmptyDocument,
  type PersonalizationDocument,
  type UserProfile,
} from './types.js';
import { requireUserId } from './validation.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface ProfileStoreOptions {
  storage: DocumentStorage;

  /** Bound on waiting for a user's lock */
  lockTimeoutMs?: number;

  /** Write retries after the first attempt */
  writeMaxRetries?: number;
  writeRetryDelayMs?: number;

  /** Source of timestamps */
  clock?: () => Date;
}

/**
 * Edits a private copy of the profile. Throwing aborts the update.
 */
export type ProfileMutation = (profile: UserProfile) => void;

export interface StoreHealth {
  status: 'healthy' | 'unhealthy';
  backend: string;
  latencyMs: number;
  users?: number;
  error?: string;
}

interface PendingWrite {
  userId: string;
  profile: UserProfile;
  settle: (result: Result<UserProfile, StoreError>) => void;
}

function cloneProfile(profile: UserProfile): UserProfile {
  return structuredClone(profile);
}

function lookupProfile(document: PersonalizationDocument, userId: string): UserProfile | undefined {
  return Object.hasOwn(document.usersById, userId) ? document.usersById[userId] : undefined;
}

// ─────────────────────────────────────────────────────────────────────────────────
// PROFILE STORE
// ─────────────────────────────────────────────────────────────────────────────────

export class ProfileStore {
  private readonly storage: DocumentStorage;
  private readonly userLocks: KeyedLock;
  private readonly writePolicy: RetryPolicy;
  private readonly clock: () => Date;
  private readonly logger = getLogger({ component: 'profile-store' });

  private document: PersonalizationDocument | null = null;
  private loading: Promise<PersonalizationDocument> | null = null;

  // First-access creation times of users not yet persisted
  private readonly firstSeen = new Map<string, string>();

  private pending: PendingWrite[] = [];
  private flushing: Promise<void> | null = null;

  constructor(options: ProfileStoreOptions) {
    const lockTimeoutMs = options.lockTimeoutMs ?? 5000;

    this.storage = options.storage;
    this.userLocks = new KeyedLock({ waitTimeoutMs: lockTimeoutMs });
    this.writePolicy = retryWithFixedDelay(options.writeMaxRetries ?? 2, options.writeRetryDelayMs ?? 50);
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Current time as an ISO string, from the store's clock.
   */
  now(): string {
    return this.clock().toISOString();
  }

  get backend(): string {
    return this.storage.name;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // READS
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Snapshot of a user's committed profile, or a default for a user never
   * updated. The default is not persisted, but its `createdAt` is fixed at
   * first access and kept when the profile is first written.
   *
   * @throws StoreError (READ_FAILED) when the medium cannot be read at all
   */
  async get(userId: string): Promise<UserProfile> {
    const document = await this.loadDocument();
    const profile = lookupProfile(document, userId);
    return profile ? cloneProfile(profile) : this.defaultProfile(userId);
  }

  async listUserIds(): Promise<string[]> {
    const document = await this.loadDocument();
    return Object.keys(document.usersById);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // UPDATES
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Apply `mutate` to the user's profile and persist the whole document.
   *
   * Resolves to the committed profile. A `StoreError` result means nothing
   * was committed. Throws `ValidationError` for a blank or reserved user id,
   * or when the mutated profile no longer fits the schema; errors thrown by
   * `mutate` propagate unchanged.
   */
  async update(userId: string, mutate: ProfileMutation): Promise<Result<UserProfile, StoreError>> {
    requireUserId(userId);

    const locked = await this.userLocks.withLock(userId, () => this.applyUpdate(userId, mutate));
    if (!locked.ok) {
      this.logger.warn('Profile lock wait timed out', { userId });
      return err(new StoreError('LOCK_TIMEOUT', locked.error.message));
    }
    return locked.value;
  }

  private async applyUpdate(userId: string, mutate: ProfileMutation): Promise<Result<UserProfile, StoreError>> {
    let document: PersonalizationDocument;
    try {
      document = await this.loadDocument();
    } catch (error) {
      if (error instanceof StoreError) return err(error);
      throw error;
    }

    const current = lookupProfile(document, userId);
    const draft = current ? cloneProfile(current) : this.defaultProfile(userId);
    mutate(draft);

    const normalized = normalizeProfile(draft);
    if (!normalized.ok) {
      throw new ValidationError(`Profile update rejected: ${normalized.error}`);
    }

    return this.persist(userId, normalized.value);
  }

  private defaultProfile(userId: string): UserProfile {
    let createdAt = this.firstSeen.get(userId);
    if (createdAt === undefined) {
      createdAt = this.now();
      this.firstSeen.set(userId, createdAt);
    }
    return createDefaultProfile(createdAt);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // GROUP COMMIT
  // ─────────────────────────────────────────────────────────────────────────────

  private persist(userId: string, profile: UserProfile): Promise<Result<UserProfile, StoreError>> {
    return new Promise(settle => {
      this.pending.push({ userId, profile, settle });
      if (!this.flushing) {
        this.flushing = this.drain();
      }
    });
  }

  /**
   * Write batches until nothing is pending. Whatever queues while a write is
   * in flight goes out together in the next one.
   */
  private async drain(): Promise<void> {
    while (this.pending.length > 0) {
      const batch = this.pending;
      this.pending = [];
      await this.writeBatch(batch);
    }
    this.flushing = null;
  }

  private async writeBatch(batch: PendingWrite[]): Promise<void> {
    const userIds = batch.map(entry => entry.userId);

    let next: PersonalizationDocument;
    let contents: string;
    try {
      const base = await this.loadDocument();
      const usersById = { ...base.usersById };
      for (const entry of batch) {
        usersById[entry.userId] = entry.profile;
      }
      next = { ...base, lastUpdated: this.now(), usersById };
      contents = serializeDocument(next);
    } catch (error) {
      const failure =
        error instanceof StoreError
          ? error
          : new StoreError('WRITE_FAILED', `Failed to prepare document: ${toError(error).message}`, { cause: error });
      this.logger.error('Failed to prepare document write', failure, { userIds });
      for (const entry of batch) entry.settle(err(failure));
      return;
    }

    const result = await this.writePolicy.executeWithResult(() => this.storage.write(contents));
    if (!result.success) {
      this.logger.error('Failed to persist profiles', result.error, {
        userIds,
        backend: this.storage.name,
        attempts: result.attempts,
      });
      const failure = new StoreError(
        'WRITE_FAILED',
        `Failed to write ${this.storage.name} storage: ${result.error.message}`,
        { cause: result.error }
      );
      for (const entry of batch) entry.settle(err(failure));
      return;
    }

    this.document = next;
    this.logger.debug('Profiles persisted', { userIds, attempts: result.attempts });
    for (const entry of batch) {
      this.firstSeen.delete(entry.userId);
      entry.settle(ok(cloneProfile(entry.profile)));
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // LOADING
  // ─────────────────────────────────────────────────────────────────────────────

  private async loadDocument(): Promise<PersonalizationDocument> {
    if (this.document) return this.document;

    // Concurrent first readers share one read
    if (!this.loading) {
      this.loading = this.readDocument().finally(() => {
        this.loading = null;
      });
    }
    return this.loading;
  }

  private async readDocument(): Promise<PersonalizationDocument> {
    let raw: string | null;
    try {
      raw = await this.storage.read();
    } catch (error) {
      const cause = toError(error);
      this.logger.error('Failed to read storage', cause, { backend: this.storage.name });
      throw new StoreError('READ_FAILED', `Failed to read ${this.storage.name} storage: ${cause.message}`, { cause });
    }

    const document = raw === null ? createEmptyDocument(this.now()) : this.decode(raw);
    this.document = document;
    return document;
  }

  private decode(raw: string): PersonalizationDocument {
    const parsed = parseDocument(raw, this.now());

    if (!parsed.ok) {
      this.logger.warn('Stored document is unreadable, starting empty', {
        backend: this.storage.name,
        reason: parsed.error,
      });
      return createEmptyDocument(this.now());
    }

    if (parsed.value.migratedFrom !== null) {
      this.logger.info('Migrated legacy document', {
        from: parsed.value.migratedFrom,
        users: Object.keys(parsed.value.document.usersById).length,
      });
    }
    return parsed.value.document;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // HOUSEKEEPING
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Round-trip check against the durable medium.
   */
  async checkHealth(): Promise<StoreHealth> {
    const start = Date.now();
    try {
      await this.storage.read();
      return {
        status: 'healthy',
        backend: this.storage.name,
        latencyMs: Date.now() - start,
        users: this.document ? Object.keys(this.document.usersById).length : undefined,
      };
    } catch (error) {
      return {
        status: 'unhealthy',
        backend: this.storage.name,
        latencyMs: Date.now() - start,
        error: toError(error).message,
      };
    }
  }

  async close(): Promise<void> {
    if (this.flushing) await this.flushing;
    await this.storage.close();
    this.document = null;
    this.firstSeen.clear();
    this.logger.info('Profile store closed', { backend: this.storage.name });
  }
}
