/**
 * Action Errors
 */

/**
 * An action could not be constructed: unknown kind, malformed or mismatched
 * payload, missing identifiers, or invalid timestamps.
 */
export class ActionValidationError extends Error {
  public field: string;

  constructor(field: string, message: string) {
    super(`Invalid action ${field}: ${message}`);
    this.name = "ActionValidationError";
    this.field = field;
  }
}

export class DispatcherNotRunningError extends Error {
  constructor() {
    super("Action dispatcher is not running. Call start() first.");
    this.name = "DispatcherNotRunningError";
  }
}
