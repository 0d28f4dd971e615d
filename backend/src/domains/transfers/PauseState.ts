/**
 * PauseState
 *
 * Relay-wide pause flag shared by admission, the pause controller and the
 * worker loop.
 *
 * @module domains/transfers/PauseState
 */

export class PauseState {
  private paused = false;

  isPaused(): boolean {
    return this.paused;
  }

  /** Returns false when already paused */
  pause(): boolean {
    if (this.paused) {
      return false;
    }
    this.paused = true;
    return true;
  }

  /** Returns false when not paused */
  resume(): boolean {
    if (!this.paused) {
      return false;
    }
    this.paused = false;
    return true;
  }
}
