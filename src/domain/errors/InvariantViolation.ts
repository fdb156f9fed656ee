export class InvariantViolation extends Error {
  constructor(
    public readonly reason: string,
    public readonly state?: unknown,
  ) {
    super(`Invariant violated: ${reason}`);
    this.name = "InvariantViolation";
  }
}
