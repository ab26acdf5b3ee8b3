/**
 * Mute switch for forwarded log output
 */

const MUTED = 1;
const UNMUTED = 0;

/**
 * Read side of the mute switch, consulted once per forwarded line
 */
export interface MuteState {
  isMuted(): boolean;
}

/**
 * Atomic on/off flag that can be shared between threads.
 *
 * The state lives in a single 32-bit cell of a SharedArrayBuffer and is only
 * touched through `Atomics`, so a reader always sees the value before or after
 * a concurrent write. Pass `buffer` from one Muter to another (for example to a
 * worker thread through `postMessage`) to control the same state from there.
 */
export class Muter implements MuteState {
  private readonly cell: Int32Array;

  constructor(
    public readonly buffer: SharedArrayBuffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT)
  ) {
    if (buffer.byteLength < Int32Array.BYTES_PER_ELEMENT) {
      throw new Error(`Mute buffer must hold at least ${Int32Array.BYTES_PER_ELEMENT} bytes`);
    }
    this.cell = new Int32Array(buffer, 0, 1);
  }

  mute(): void {
    Atomics.store(this.cell, 0, MUTED);
  }

  unmute(): void {
    Atomics.store(this.cell, 0, UNMUTED);
  }

  isMuted(): boolean {
    return Atomics.load(this.cell, 0) === MUTED;
  }
}
