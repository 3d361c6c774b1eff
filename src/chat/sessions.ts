import { randomUUID } from 'node:crypto';

export type Turn = {
  role: 'user' | 'assistant';
  content: string;
  at: Date;
};

export type Session = {
  id: string;
  createdAt: Date;
  turns: Turn[];
};

/**
 * Sessions created during this run, in creation order. Exactly one session is
 * active once the first one exists.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  private activeId: string | null = null;

  constructor(
    private readonly newId: () => string = randomUUID,
    private readonly now: () => Date = () => new Date()
  ) {}

  create(): Session {
    const session: Session = {
      id: this.newId(),
      createdAt: this.now(),
      turns: [],
    };
    this.sessions.set(session.id, session);
    this.activeId = session.id;
    return session;
  }

  active(): Session | undefined {
    if (this.activeId === null) return undefined;
    return this.sessions.get(this.activeId);
  }

  ensureActive(): Session {
    return this.active() ?? this.create();
  }

  list(): Session[] {
    return [...this.sessions.values()];
  }

  /** Records one completed exchange: the query, then the reply. */
  append(sessionId: string, query: string, reply: string): void {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new Error(`Unknown session: ${sessionId}`);
    }
    session.turns.push({ role: 'user', content: query, at: this.now() });
    session.turns.push({ role: 'assistant', content: reply, at: this.now() });
  }
}
