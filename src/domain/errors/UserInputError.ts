export class UserInputError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "UserInputError";
  }

  static because(issues: readonly string[]): UserInputError {
    const [firstIssue] = issues;
    const message =
      issues.length === 0
        ? "Invalid input"
        : issues.length === 1
          ? (firstIssue ?? "Invalid input")
          : `Invalid input: ${issues.join("; ")}`;
    return new UserInputError(message, issues);
  }
}
