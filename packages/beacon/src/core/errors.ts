/** Configuration that fails validation. Surfaced as a blocked status. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** The waypoint deployment did not become ready before the deadline. */
export class WaypointNotReadyError extends Error {
  constructor(
    public readonly waypoint: string,
    public readonly timeoutSeconds: number,
  ) {
    super(`Waypoint ${waypoint} was not ready after ${timeoutSeconds}s`);
    this.name = 'WaypointNotReadyError';
  }
}

export class MeshPolicyValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MeshPolicyValidationError';
  }
}

/** A Juju hook tool exited with a non-zero status. */
export class HookToolError extends Error {
  constructor(
    public readonly tool: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    super(`${tool} failed (exit ${exitCode ?? 'signal'}): ${stderr.trim()}`);
    this.name = 'HookToolError';
  }
}

export class PebbleError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'PebbleError';
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
