import type { Clock } from "../../packages/core/src/index.js";

/** Clock whose sleeps return at once and advance time by the amount slept */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private time = 1_000_000) {}

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }

  advance(ms: number): void {
    this.time += ms;
  }
}
