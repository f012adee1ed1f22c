import { randomBytes } from "node:crypto";

/** 32 bytes = 256 bits of entropy per state token */
const STATE_BYTES = 32;

/**
 * Outstanding CSRF state tokens for one authorizer.
 *
 * In-memory only: a process restart forgets every pending state, so a
 * browser flow started before the restart fails the state check and has
 * to be retried.
 */
export class PendingStateSet {
  private states = new Set<string>();

  /**
   * Generate a fresh state token and register it as pending.
   */
  issue(): string {
    let state = randomBytes(STATE_BYTES).toString("base64url");
    while (this.states.has(state)) {
      state = randomBytes(STATE_BYTES).toString("base64url");
    }
    this.states.add(state);
    return state;
  }

  has(state: string): boolean {
    return this.states.has(state);
  }

  /**
   * Remove a state. Returns false if it was not pending.
   */
  consume(state: string): boolean {
    return this.states.delete(state);
  }

  clear(): void {
    this.states.clear();
  }

  get size(): number {
    return this.states.size;
  }
}
