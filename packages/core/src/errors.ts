export type ExtractErrorCode = "MANIFEST_NOT_FOUND" | "INVALID_JSON" | "INVALID_CONFIG";

export class ExtractError extends Error {
  public readonly code: ExtractErrorCode;

  constructor(code: ExtractErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExtractError";
    this.code = code;
  }
}
