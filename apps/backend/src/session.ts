import { v4 as uuidv4 } from "uuid";
import type { IterationRecord, PipelinePhase } from "@draftcritic/shared";
import { SessionBusyError, SessionNotFoundError } from "./errors.js";

const TRANSITIONS: Readonly<Record<PipelinePhase, readonly PipelinePhase[]>> = {
  idle: ["generating"],
  generating: ["critiquing", "idle"],
  // critiquing -> generating happens between refinement rounds
  critiquing: ["complete", "generating", "idle"],
  complete: ["generating"]
};

export type NewIterationRecord = Omit<IterationRecord, "index">;

/**
 * Session-scoped pipeline state: the phase of the run in progress and the
 * append-only iteration history. One instance per user session.
 */
export class PipelineSession {
  private readonly records: IterationRecord[] = [];
  private current: PipelinePhase = "idle";

  constructor(readonly id: string = uuidv4()) {}

  get phase(): PipelinePhase {
    return this.current;
  }

  get history(): readonly IterationRecord[] {
    return this.records;
  }

  get busy(): boolean {
    return this.current === "generating" || this.current === "critiquing";
  }

  /** Claim the session for a new run. */
  begin(): void {
    if (this.busy) {
      throw new SessionBusyError(this.id, this.current);
    }
    this.enter("generating");
  }

  enter(next: PipelinePhase): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal phase transition ${this.current} -> ${next}`);
    }
    this.current = next;
  }

  /** Release the session after a run that did not complete. */
  abort(): void {
    if (this.busy) {
      this.enter("idle");
    }
  }

  append(record: NewIterationRecord): IterationRecord {
    if (this.current !== "critiquing") {
      throw new Error(`Cannot record an iteration while ${this.current}`);
    }
    const stored: IterationRecord = Object.freeze({ ...record, index: this.records.length + 1 });
    this.records.push(stored);
    return stored;
  }
}

export interface SessionStoreOptions {
  /** Sessions unused for this long are ended and their history dropped */
  idleTtlMs?: number;
  now?: () => number;
}

export const DEFAULT_SESSION_TTL_MS = 30 * 60 * 1000;

interface StoredSession {
  session: PipelineSession;
  lastUsed: number;
}

export class SessionStore {
  private readonly sessions = new Map<string, StoredSession>();
  private readonly idleTtlMs: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions = {}) {
    this.idleTtlMs = options.idleTtlMs ?? DEFAULT_SESSION_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  create(): PipelineSession {
    this.evictIdle();
    const session = new PipelineSession();
    this.sessions.set(session.id, { session, lastUsed: this.now() });
    return session;
  }

  get(id: string): PipelineSession {
    this.evictIdle();
    const stored = this.sessions.get(id);
    if (!stored) {
      throw new SessionNotFoundError(id);
    }
    stored.lastUsed = this.now();
    return stored.session;
  }

  delete(id: string): void {
    if (!this.sessions.delete(id)) {
      throw new SessionNotFoundError(id);
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Drop idle sessions; a session mid-run is never dropped. */
  private evictIdle(): void {
    const cutoff = this.now() - this.idleTtlMs;
    for (const [id, stored] of this.sessions) {
      if (stored.lastUsed <= cutoff && !stored.session.busy) {
        this.sessions.delete(id);
      }
    }
  }
}
