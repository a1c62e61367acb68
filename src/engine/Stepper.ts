import type { Step } from "../interfaces/interfaces";

export const EXHAUSTED: unique symbol = Symbol("EXHAUSTED");
export type Exhausted = typeof EXHAUSTED;

/**
 * Two-way navigation over a forward-only step sequence.
 *
 * Every step pulled from the source is kept in an append-only buffer, so
 * moving backwards (or forwards again) replays the buffer instead of
 * recomputing. `position` counts the steps advanced: 0 means nothing has
 * been shown yet and the current step is `steps[position - 1]`.
 */
export class Stepper {
  private buffer: Step[] = [];
  private cursor = 0;
  private done = false;

  constructor(private source: Iterator<Step, unknown, undefined>) {}

  get position() {
    return this.cursor;
  }

  get length() {
    return this.buffer.length;
  }

  get exhausted() {
    return this.done;
  }

  get current(): Step | null {
    return this.cursor > 0 ? this.buffer[this.cursor - 1] : null;
  }

  get steps(): readonly Step[] {
    return this.buffer;
  }

  at(index: number): Step | undefined {
    return this.buffer[index];
  }

  // Pull one more step into the buffer; false once the source has ended
  private pull(): boolean {
    if (this.done) return false;
    const r = this.source.next();
    if (r.done) {
      this.done = true;
      return false;
    }
    this.buffer.push(r.value);
    return true;
  }

  next(): Step | Exhausted {
    if (this.cursor === this.buffer.length && !this.pull()) return EXHAUSTED;
    this.cursor++;
    return this.buffer[this.cursor - 1];
  }

  prev(): Step | null {
    if (this.cursor > 0) this.cursor--;
    return this.current;
  }

  rewind() {
    this.cursor = 0;
  }

  seek(n: number): Step | null {
    if (Number.isNaN(n)) return this.current;
    const want = Math.max(0, Math.floor(n));
    while (this.buffer.length < want && this.pull());
    this.cursor = Math.min(want, this.buffer.length);
    return this.current;
  }

  runToEnd(): Step | null {
    while (this.pull());
    this.cursor = this.buffer.length;
    return this.current;
  }
}
