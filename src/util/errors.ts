/** A requested project, entry or photo does not exist. */
export class NotFoundError extends Error {
  constructor(
    readonly resource: "project" | "entry" | "photo",
    readonly id: number | string,
  ) {
    super(`${resource[0].toUpperCase()}${resource.slice(1)} ${id} not found`);
    this.name = "NotFoundError";
  }
}

/** Client input that fails validation. `field` names the offending key, if any. */
export class ValidationError extends Error {
  constructor(
    message: string,
    readonly field?: string,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** An upload exceeded the configured size limit. */
export class PayloadTooLargeError extends Error {
  constructor(readonly limitBytes: number) {
    super(`File exceeds the upload limit of ${limitBytes} bytes`);
    this.name = "PayloadTooLargeError";
  }
}
