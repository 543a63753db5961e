export type ErrorCode =
  | "InvalidInput"
  | "RoomNotFound"
  | "GameEnded"
  | "NotStarted"
  | "AlreadyStarted"
  | "InsufficientParticipants"
  | "MaxRoundsReached"
  | "TableNotFound"
  | "ParticipantNotFound"
  | "CustomGroupsDisabled"
  | "AlreadyReported"
  | "DuplicateParticipant"
  | "JoinClosed"
  | "RoundInProgress"
  | "Forbidden";

export interface CommandError {
  code: ErrorCode;
  message: string;
}

export type CommandResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: CommandError };

export function success<T>(value: T): CommandResult<T> {
  return { ok: true, value };
}

export function failure<T = never>(
  code: ErrorCode,
  message: string,
): CommandResult<T> {
  return { ok: false, error: { code, message } };
}

/**
 * Thrown when a generated table does not match its planned size. This is a
 * defect in the planner or selector, not a business outcome.
 */
export class InternalConsistencyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InternalConsistencyError";
  }
}
