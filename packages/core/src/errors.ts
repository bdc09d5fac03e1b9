export type ConstraintCode =
  | "LAYER_NOT_EDITABLE"
  | "LAYER_NOT_FOUND"
  | "CAMERA_NOT_FOUND"
  | "DOCUMENT_READ_ONLY"
  | "TOOL_NOT_FOUND"
  | "SESSION_FAILED"
  | "CLIPBOARD_EMPTY";

export class VoxeditError extends Error {
  public readonly code: string;

  public constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Raised before any mutation when the document policy refuses an edit. */
export class ConstraintViolationError extends VoxeditError {
  public constructor(code: ConstraintCode, message: string) {
    super(code, message);
  }
}

/** The block store cannot continue; callers must not retry the edit. */
export class AllocationFailureError extends VoxeditError {
  public readonly fatal = true;

  public constructor(message: string, options?: { cause?: unknown }) {
    super("BLOCK_ALLOCATION_FAILED", message);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function isAllocationFailure(error: unknown): error is AllocationFailureError {
  return error instanceof AllocationFailureError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
