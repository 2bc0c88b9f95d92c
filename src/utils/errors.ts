/**
 * Raised when inputs fail boundary validation. Each issue reads
 * "<field path>: <message>".
 */
export class InvalidInputError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid input: ${issues.join("; ")}`);
    this.name = "InvalidInputError";
  }
}
