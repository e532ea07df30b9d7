import type { Logger } from "../lakegate/log.js";
import { silentLogger } from "../lakegate/log.js";
import { deepFreeze, hashString } from "../lakegate/utils/freeze.js";
import type { ClaimSet, ScopedCredentials, SessionRecord } from "./types.js";

/**
 * Session Cache
 *
 * Session id -> validated identity, split across shards by a hash of the id.
 * Every operation is a synchronous critical section on one shard.
 */

export type SessionCacheOptions = {
  /** Default 3600 */
  ttlSeconds?: number;
  /** Default 16 */
  shards?: number;
  /** Clock in epoch ms */
  now?: () => number;
  logger?: Logger;
};

export type SessionProbe =
  | { status: "hit"; record: SessionRecord }
  | { status: "expired"; record: SessionRecord }
  | { status: "miss" };

export type StoreSessionInput = {
  claims: ClaimSet;
  tokenFingerprint: string;
  credentials?: ScopedCredentials;
};

export const DEFAULT_SESSION_TTL_SECONDS = 3600;

export class SessionCache {
  readonly ttlMs: number;
  private readonly shards: Map<string, SessionRecord>[];
  private readonly now: () => number;
  private readonly logger: Logger;
  private sweeper: ReturnType<typeof setInterval> | null = null;
  private sweepCursor = 0;

  constructor(options: SessionCacheOptions = {}) {
    this.ttlMs = (options.ttlSeconds ?? DEFAULT_SESSION_TTL_SECONDS) * 1000;
    const shardCount = Math.max(1, Math.floor(options.shards ?? 16));
    this.shards = Array.from({ length: shardCount }, () => new Map<string, SessionRecord>());
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  get size(): number {
    return this.shards.reduce((total, shard) => total + shard.size, 0);
  }

  get shardCount(): number {
    return this.shards.length;
  }

  /**
   * Live record or undefined. An expired record is removed and reported as a miss.
   */
  lookup(sessionId: string): SessionRecord | undefined {
    const probe = this.probe(sessionId);
    return probe.status === "hit" ? probe.record : undefined;
  }

  /**
   * Like lookup, but tells an expired record apart from one never stored.
   */
  probe(sessionId: string): SessionProbe {
    const shard = this.shardFor(sessionId);
    const record = shard.get(sessionId);
    if (!record) {
      return { status: "miss" };
    }
    if (this.now() >= record.expiresAt) {
      shard.delete(sessionId);
      this.logger.debug("session expired", { sessionId });
      return { status: "expired", record };
    }
    return { status: "hit", record };
  }

  /**
   * Insert or replace (last write wins). The record expires at the earlier of
   * the TTL and the token's own `exp`.
   */
  store(sessionId: string, input: StoreSessionInput): SessionRecord {
    const createdAt = this.now();
    const record: SessionRecord = deepFreeze({
      sessionId,
      subject: input.claims.subject,
      claims: structuredClone(input.claims),
      ...(input.credentials !== undefined && { credentials: structuredClone(input.credentials) }),
      tokenFingerprint: input.tokenFingerprint,
      createdAt,
      expiresAt: Math.min(createdAt + this.ttlMs, input.claims.expiresAt * 1000)
    });
    this.shardFor(sessionId).set(sessionId, record);
    return record;
  }

  /**
   * Attach exchanged credentials to a live record. Returns false when the
   * session is gone.
   */
  attachCredentials(sessionId: string, credentials: ScopedCredentials): boolean {
    const shard = this.shardFor(sessionId);
    const record = shard.get(sessionId);
    if (!record || this.now() >= record.expiresAt) {
      return false;
    }
    shard.set(sessionId, deepFreeze({ ...record, credentials: structuredClone(credentials) }));
    return true;
  }

  invalidate(sessionId: string): boolean {
    return this.shardFor(sessionId).delete(sessionId);
  }

  clear(): void {
    for (const shard of this.shards) {
      shard.clear();
    }
  }

  /**
   * Remove expired records, one shard at a time. Returns how many were removed.
   */
  evictExpired(): number {
    let evicted = 0;
    for (let i = 0; i < this.shards.length; i++) {
      evicted += this.evictShard(i);
    }
    return evicted;
  }

  /**
   * Sweep one shard per tick so no pass walks every session at once.
   */
  startSweeper(intervalMs = 60_000): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => {
      const evicted = this.evictShard(this.sweepCursor);
      this.sweepCursor = (this.sweepCursor + 1) % this.shards.length;
      if (evicted > 0) {
        this.logger.debug("evicted expired sessions", { evicted });
      }
    }, intervalMs);
    this.sweeper.unref();
  }

  stop(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  private evictShard(index: number): number {
    const shard = this.shards[index];
    if (!shard) return 0;
    const now = this.now();
    let evicted = 0;
    for (const [sessionId, record] of shard) {
      if (now >= record.expiresAt) {
        shard.delete(sessionId);
        evicted++;
      }
    }
    return evicted;
  }

  private shardFor(sessionId: string): Map<string, SessionRecord> {
    const shard = this.shards[hashString(sessionId) % this.shards.length];
    if (!shard) {
      throw new Error("Session shard index out of range");
    }
    return shard;
  }
}
