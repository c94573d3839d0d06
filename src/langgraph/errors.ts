// Engine-level failures. Everything else the pipeline hits is recorded in state fields.

export type EngineErrorCode =
  | "CONVERSATION_NOT_FOUND"
  | "INVALID_RESUME"
  | "CHECKPOINT_CORRUPT"
  | "STEP_LIMIT_EXCEEDED"
  | "INVALID_INPUT"
  | "ENGINE_FAILURE";

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EngineError";
    this.code = code;
  }
}

export class ConversationNotFoundError extends EngineError {
  constructor(readonly threadId: string) {
    super("CONVERSATION_NOT_FOUND", `No conversation to resume for thread '${threadId}'`);
    this.name = "ConversationNotFoundError";
  }
}

export class InvalidResumeError extends EngineError {
  constructor(readonly threadId: string) {
    super("INVALID_RESUME", `Conversation '${threadId}' is not awaiting clarification`);
    this.name = "InvalidResumeError";
  }
}

export class CheckpointCorruptError extends EngineError {
  constructor(readonly threadId: string, cause?: unknown) {
    super("CHECKPOINT_CORRUPT", `Checkpoint for thread '${threadId}' could not be read`, { cause });
    this.name = "CheckpointCorruptError";
  }
}

export class StepLimitExceededError extends EngineError {
  constructor(readonly limit: number, cause?: unknown) {
    super("STEP_LIMIT_EXCEEDED", `Step limit of ${limit} reached before the pipeline halted`, { cause });
    this.name = "StepLimitExceededError";
  }
}
