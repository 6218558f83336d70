/**
 * In-process, non-blocking per-session locks. A second turn for a session
 * that is already mid-turn is refused rather than queued.
 */
export class SessionLocks {
  private readonly held = new Set<string>();

  tryAcquire(sessionId: string): boolean {
    if (this.held.has(sessionId)) return false;
    this.held.add(sessionId);
    return true;
  }

  release(sessionId: string): void {
    this.held.delete(sessionId);
  }

  isHeld(sessionId: string): boolean {
    return this.held.has(sessionId);
  }
}
