/**
 * Conversation Sessions
 *
 * A session is the ordered turn log of one client plus the socket
 * connections currently attached to it. Turns are append-only with
 * non-decreasing timestamps. Requests against one session run one at a time
 * in arrival order (runExclusive); different sessions run concurrently.
 *
 * Sessions outlive their sockets and are swept after SESSION_TTL_MS of
 * inactivity, unless a request is in flight or a socket is attached.
 */

import { randomUUID } from 'node:crypto';
import { ChatError } from '@/errors/chatErrors';
import type { ConversationTurn, TurnRole } from '@/types/chat';
import { logger } from '@/utils/logger';

export const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{8,64}$/;

export function isValidSessionId(value: string): boolean {
  return SESSION_ID_PATTERN.test(value);
}

export type Clock = () => number;

export class ConversationSession {
  private readonly turns: ConversationTurn[] = [];
  private readonly connections = new Set<string>();
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private lastActive: number;

  constructor(
    readonly id: string,
    private readonly clock: Clock = Date.now,
  ) {
    this.lastActive = clock();
  }

  get lastActiveAt(): number {
    return this.lastActive;
  }

  /** True while a request is queued or running. */
  get busy(): boolean {
    return this.pending > 0;
  }

  get attached(): boolean {
    return this.connections.size > 0;
  }

  get turnCount(): number {
    return this.turns.length;
  }

  append(role: TurnRole, text: string): ConversationTurn {
    const previous = this.turns.at(-1);
    const now = this.clock();
    const timestamp = previous && previous.timestamp > now ? previous.timestamp : now;

    const turn = Object.freeze({ role, text, timestamp });
    this.turns.push(turn);
    this.lastActive = Math.max(this.lastActive, timestamp);
    return turn;
  }

  /** Copy of the turn log as it stands now. */
  snapshot(): readonly ConversationTurn[] {
    return [...this.turns];
  }

  touch(): void {
    this.lastActive = Math.max(this.lastActive, this.clock());
  }

  attach(connectionId: string): void {
    this.connections.add(connectionId);
    this.touch();
  }

  detach(connectionId: string): void {
    this.connections.delete(connectionId);
    this.touch();
  }

  /**
   * Queues `task` behind every earlier task of this session. A failing task
   * rejects its own caller only; the queue keeps going.
   */
  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run.finally(() => {
      this.pending--;
      this.touch();
    });
  }
}

export interface SessionStoreOptions {
  ttlMs: number;
  clock?: Clock;
  idFactory?: () => string;
}

export class SessionStore {
  private readonly sessions = new Map<string, ConversationSession>();
  private readonly clock: Clock;
  private readonly idFactory: () => string;
  private sweeper?: ReturnType<typeof setInterval>;

  constructor(private readonly options: SessionStoreOptions) {
    this.clock = options.clock ?? Date.now;
    this.idFactory = options.idFactory ?? randomUUID;
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Existing session for `sessionId`, a new one under that id when it is
   * unknown, or a new one under a fresh id when none is given.
   */
  resolve(sessionId?: string): ConversationSession {
    if (sessionId !== undefined && !isValidSessionId(sessionId)) {
      throw new ChatError('INVALID_SESSION_ID', 'Session id must be 8-64 letters, digits, "-" or "_"', 400);
    }

    if (sessionId) {
      const existing = this.sessions.get(sessionId);
      if (existing) return existing;
    }

    const session = new ConversationSession(sessionId ?? this.idFactory(), this.clock);
    this.sessions.set(session.id, session);
    logger.debug('Session created', { sessionId: session.id, adopted: sessionId !== undefined });
    return session;
  }

  get(sessionId: string): ConversationSession | undefined {
    return this.sessions.get(sessionId);
  }

  delete(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) {
      logger.info('Session cleared', { sessionId });
    }
    return removed;
  }

  /**
   * Drops sessions idle for longer than the TTL. Busy or socket-attached
   * sessions are kept. Returns the number removed.
   */
  sweep(now: number = this.clock()): number {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (session.busy || session.attached) continue;
      if (now - session.lastActiveAt < this.options.ttlMs) continue;
      this.sessions.delete(id);
      removed++;
    }
    if (removed > 0) {
      logger.info('Expired sessions swept', { removed, remaining: this.sessions.size });
    }
    return removed;
  }

  startSweeper(intervalMs: number = Math.min(this.options.ttlMs, 60_000)): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => this.sweep(), intervalMs);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = undefined;
    }
  }
}
