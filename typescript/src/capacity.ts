import { WriterProtocolError } from "./errors";

/**
 * Remaining element (or key/value pair) count of a definite-length container.
 * Never goes below zero.
 */
export class CapacityCounter {
  private count: number;

  constructor(count: number) {
    this.count = count;
  }

  /**
   * Returns the number of commits still required.
   */
  get remaining(): number {
    return this.count;
  }

  /**
   * Consumes one slot.
   * @throws WriterProtocolError("capacity exceeded") when no slot is left
   */
  take(): void {
    if (this.count === 0) {
      throw new WriterProtocolError("capacity exceeded");
    }
    this.count--;
  }
}
