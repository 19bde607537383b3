export enum PatchErrorCode {
  TARGET_NOT_FOUND = "TARGET_NOT_FOUND",
  IO_FAILED = "IO_FAILED",
}

export class PatchError extends Error {
  constructor(
    message: string,
    public code: PatchErrorCode,
    public details?: unknown
  ) {
    super(message);
    this.name = "PatchError";
  }
}
