import { injectable } from 'inversify';
import type { ISessionStore } from '@main/core/interfaces';
import { KeyedLock } from '@main/utils/keyed-lock';

/**
 * In-memory MCP session ids keyed by service id. Never persisted.
 */
@injectable()
export class SessionStore implements ISessionStore {
  private readonly sessions = new Map<string, string>();
  private readonly lock = new KeyedLock();

  get(key: string): string | undefined {
    return this.sessions.get(key);
  }

  set(key: string, sessionId: string): void {
    this.sessions.set(key, sessionId);
  }

  clear(key: string): void {
    this.sessions.delete(key);
  }

  runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.lock.run(key, fn);
  }
}
