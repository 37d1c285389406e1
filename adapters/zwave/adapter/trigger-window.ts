/**
 * On-window of a sensor that reports activation but never reports it ended.
 * Each activation opens (or extends) the window; once `now` reaches
 * `expiresAt` the sensor counts as armed again. Nothing here is cached as
 * a transition result: whether the window is open is always derived from
 * `expiresAt` and the time it is asked at.
 */
export class TriggerWindow {
  private _expiresAt: number | null = null;

  constructor(readonly reArmSeconds: number) {
    if (!Number.isFinite(reArmSeconds) || reArmSeconds <= 0) {
      throw new RangeError(`reArmSeconds must be positive, got ${reArmSeconds}`);
    }
  }

  get expiresAt(): number | null {
    return this._expiresAt;
  }

  /** Opens or extends the window; returns the new expiry. */
  arm(now: number): number {
    const candidate = now + this.reArmSeconds * 1000;
    // Never pull an open window's expiry backwards, even if the clock did
    this._expiresAt = this._expiresAt === null ? candidate : Math.max(this._expiresAt, candidate);
    return this._expiresAt;
  }

  reset(): void {
    this._expiresAt = null;
  }

  isOpen(now: number): boolean {
    return this._expiresAt !== null && now < this._expiresAt;
  }

  /**
   * Called when a deferred re-check fires. Closes the window and returns true
   * if it has run out; a re-check that a later activation superseded returns
   * false and changes nothing.
   */
  expire(now: number): boolean {
    if (this._expiresAt === null || now < this._expiresAt) return false;
    this._expiresAt = null;
    return true;
  }
}
