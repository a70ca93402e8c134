import {
  createDialogState,
  type DialogState,
  type SelectTypeState,
} from '../domain/entities/DialogState.js';

/**
 * In-memory dialog sessions keyed by user id.
 * At most one session per user; nothing survives a restart.
 */
export class DialogSessionStore {
  private sessions = new Map<number, DialogState>();

  get(userId: number): DialogState | null {
    return this.sessions.get(userId) ?? null;
  }

  /**
   * Starts a fresh session, replacing any dialog already in progress
   */
  create(userId: number): SelectTypeState {
    const state = createDialogState(userId);
    this.sessions.set(userId, state);
    return state;
  }

  /**
   * Stores the state reached by a transition
   */
  save(state: DialogState): void {
    this.sessions.set(state.userId, state);
  }

  delete(userId: number): boolean {
    return this.sessions.delete(userId);
  }

  size(): number {
    return this.sessions.size;
  }
}
