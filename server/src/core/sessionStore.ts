import { SlidingWindowRateLimiter } from "./rateLimiter.js";
import { Session, SessionOptions } from "./session.js";

export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly rateLimitPerMinute: number;

  constructor(rateLimitPerMinute: number) {
    this.rateLimitPerMinute = rateLimitPerMinute;
  }

  open(options: SessionOptions): Session {
    if (this.sessions.has(options.sessionId)) {
      throw new Error(`session_exists:${options.sessionId}`);
    }

    const created = new Session(options);
    this.sessions.set(options.sessionId, created);
    return created;
  }

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  async close(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return;
    }

    this.sessions.delete(sessionId);
    await session.close();
  }

  async closeAll(): Promise<void> {
    const ids = [...this.sessions.keys()];
    await Promise.all(ids.map((id) => this.close(id)));
  }

  createRateLimiter(): SlidingWindowRateLimiter {
    return new SlidingWindowRateLimiter(this.rateLimitPerMinute, 60_000);
  }
}
