export type SidekickErrorCode =
  | "tool_not_enabled"
  | "invalid_arguments"
  | "tool_timeout"
  | "decision_timeout"
  | "malformed_decision"
  | "persistence_failed"
  | "workspace_not_found"
  | "invalid_config";

export type SidekickErrorDetails = Record<string, unknown>;

type SidekickErrorInput = {
  code: SidekickErrorCode;
  message: string;
  details?: SidekickErrorDetails;
  cause?: unknown;
};

export class SidekickError extends Error {
  readonly code: SidekickErrorCode;
  readonly details?: SidekickErrorDetails;

  constructor({ code, message, details, cause }: SidekickErrorInput) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "SidekickError";
    this.code = code;
    this.details = details;
  }
}

export const isSidekickError = (error: unknown, code?: SidekickErrorCode): error is SidekickError => {
  if (!(error instanceof SidekickError)) return false;
  return code === undefined || error.code === code;
};

export const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};
