export type CachedNetWorth = {
  value: number;
  storedAt: number;
  ageMs: number;
  /** Younger than the configured cache duration. */
  fresh: boolean;
};

export class NetWorthCache {
  private value: number | null = null;
  private storedAt = 0;

  constructor(
    private readonly durationMs: number,
    private readonly now: () => number = () => Date.now()
  ) {}

  store(value: number): void {
    this.value = value;
    this.storedAt = this.now();
  }

  read(): CachedNetWorth | null {
    if (this.value === null) return null;
    const ageMs = Math.max(0, this.now() - this.storedAt);
    return {
      value: this.value,
      storedAt: this.storedAt,
      ageMs,
      fresh: ageMs < this.durationMs
    };
  }
}
