/** Timestamp source. The engine never reads a wall clock directly. */
export interface Clock {
  now(): bigint;
}

export class SystemClock implements Clock {
  now(): bigint {
    return BigInt(Math.floor(Date.now() / 1000));
  }
}

export class ManualClock implements Clock {
  private current: bigint;

  constructor(start: bigint) {
    this.current = start;
  }

  now(): bigint {
    return this.current;
  }

  set(seconds: bigint): void {
    this.current = seconds;
  }

  advance(seconds: bigint): void {
    this.current += seconds;
  }
}
