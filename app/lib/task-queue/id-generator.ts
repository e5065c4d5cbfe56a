/**
 * Sequential task id generator
 * Ids are decimal strings starting at "1", never reused for the generator's lifetime.
 */

export interface IdGenerator {
  next(): string;
}

export class SequentialIdGenerator implements IdGenerator {
  private counter: bigint;

  constructor(start: number = 1) {
    this.counter = BigInt(start);
  }

  next(): string {
    const id = this.counter;
    this.counter += 1n;
    return id.toString(10);
  }
}
