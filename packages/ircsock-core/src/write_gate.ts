/**
 * Single-writer gate: at most one send is outstanding.
 *
 * A write requested while another is pending is refused rather than queued;
 * callers are expected to wait for `didSend` before writing again.
 */
export class WriteGate {
  private _pending = false;

  get pending(): boolean {
    return this._pending;
  }

  /** Mark a write as in flight. Returns false if one already is. */
  tryAcquire(): boolean {
    if (this._pending) return false;
    this._pending = true;
    return true;
  }

  release(): void {
    this._pending = false;
  }
}
