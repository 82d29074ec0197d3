import { createSession, GameSession } from './gameSession';

export interface SessionRegistryOptions {
  /** Sessions idle for longer than this are removed by `sweep`. */
  timeoutMs: number;
  now?: () => number;
}

export interface SweepReport {
  removed: string[];
  remaining: number;
}

/**
 * Owns every in-memory game, one per player. Event handling for a player goes
 * through `withSession`, which runs one handler at a time per player; the idle
 * sweep leaves alone any player with a handler running or queued.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, GameSession>();
  private readonly locks = new Map<string, Promise<void>>();
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private sweeper: NodeJS.Timeout | null = null;

  constructor(options: SessionRegistryOptions) {
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  get(playerId: string): GameSession | undefined {
    return this.sessions.get(playerId);
  }

  getOrCreate(playerId: string): GameSession {
    let session = this.sessions.get(playerId);
    if (!session) {
      session = createSession(playerId, this.now());
      this.sessions.set(playerId, session);
    }
    return session;
  }

  /** Swaps in a fresh game for the player, keeping only the presentation handle. */
  replace(playerId: string): GameSession {
    const handle = this.sessions.get(playerId)?.presentationHandle ?? null;
    this.sessions.delete(playerId);
    const fresh = this.getOrCreate(playerId);
    fresh.presentationHandle = handle;
    return fresh;
  }

  delete(playerId: string): boolean {
    return this.sessions.delete(playerId);
  }

  isBusy(playerId: string): boolean {
    return this.locks.has(playerId);
  }

  async withSession<T>(playerId: string, fn: (session: GameSession) => Promise<T> | T): Promise<T> {
    const previous = this.locks.get(playerId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.locks.set(playerId, current);
    await previous;
    try {
      return await fn(this.getOrCreate(playerId));
    } finally {
      release();
      if (this.locks.get(playerId) === current) this.locks.delete(playerId);
    }
  }

  sweep(now: number = this.now()): SweepReport {
    const removed: string[] = [];
    for (const [playerId, session] of this.sessions) {
      if (this.isBusy(playerId)) continue;
      if (now - session.lastActivity > this.timeoutMs) removed.push(playerId);
    }
    for (const playerId of removed) this.sessions.delete(playerId);
    return { removed, remaining: this.sessions.size };
  }

  startSweeper(intervalMs: number, onSweep?: (report: SweepReport) => void): void {
    this.stopSweeper();
    this.sweeper = setInterval(() => {
      const report = this.sweep();
      onSweep?.(report);
    }, intervalMs);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }
}
