/**
 * Invalid user input (filters, reset hour, timezone, plan). Raised before any
 * file is read.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * No data directory, no usage file or no valid record was found.
 */
export class NoDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NoDataError";
  }
}

/**
 * Sessions were handed to the block builder out of start-time order.
 */
export class BlockOrderError extends Error {
  constructor(
    readonly sessionId: string,
    readonly startTime: Date,
    readonly previousStartTime: Date,
  ) {
    super(
      `Session ${sessionId} starts at ${startTime.toISOString()}, before the previous session (${previousStartTime.toISOString()})`,
    );
    this.name = "BlockOrderError";
  }
}

export class BlockBuilderStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BlockBuilderStateError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
