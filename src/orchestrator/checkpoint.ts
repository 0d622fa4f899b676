/**
 * Checkpoint store for analysis threads
 *
 * Get/put keyed by thread id. A missing entry is a normal outcome (fresh
 * conversation). The in-memory store copies state on the way in and out,
 * so no two runs ever hold the same AgentState object.
 *
 * Entries expire after `ttlMs` (default 24h). At `maxEntries` (default
 * 10,000) expired entries are evicted first, then the oldest write.
 */

import { log } from "../utils/telemetry.js";
import type { AgentState } from "./state.js";

export interface CheckpointStore {
  get(threadId: string): Promise<AgentState | undefined>;
  put(threadId: string, state: AgentState): Promise<void>;
  delete(threadId: string): Promise<boolean>;
}

// ============================================================================
// In-memory store
// ============================================================================

const DEFAULT_TTL_MS = 24 * 60 * 60_000;
const DEFAULT_MAX_ENTRIES = 10_000;

interface CheckpointEntry {
  state: AgentState;
  expiresAt: number;
}

export interface InMemoryCheckpointOptions {
  ttlMs?: number;
  maxEntries?: number;
}

export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly entries = new Map<string, CheckpointEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;

  constructor(options: InMemoryCheckpointOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
  }

  get size(): number {
    return this.entries.size;
  }

  async get(threadId: string): Promise<AgentState | undefined> {
    const entry = this.entries.get(threadId);
    if (!entry) return undefined;
    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(threadId);
      return undefined;
    }
    return structuredClone(entry.state);
  }

  async put(threadId: string, state: AgentState): Promise<void> {
    // Re-insert so Map order tracks write recency
    this.entries.delete(threadId);
    if (this.entries.size >= this.maxEntries) {
      this.evict();
    }
    this.entries.set(threadId, { state: structuredClone(state), expiresAt: Date.now() + this.ttlMs });
  }

  async delete(threadId: string): Promise<boolean> {
    return this.entries.delete(threadId);
  }

  private evict(): void {
    const now = Date.now();
    let evicted = 0;
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        evicted++;
      }
    }

    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      evicted++;
    }

    if (evicted > 0) {
      log.debug({ evicted, remaining: this.entries.size }, "Checkpoint store: evicted entries");
    }
  }
}
