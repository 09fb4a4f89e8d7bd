/**
 * Raised when a caller breaks a precondition of the core, such as asking
 * an eliminated snake for a move or advancing a finished game. These are
 * programming errors and are never retried.
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContractViolationError";
  }
}
