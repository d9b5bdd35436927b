// Errors carry the HTTP status the error handler should answer with
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export class DocumentReadError extends HttpError {
  constructor(message: string) {
    super(422, message);
    this.name = "DocumentReadError";
  }
}

export function errorStatus(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    if ("status" in err && typeof err.status === "number") return err.status;
    if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  }
  return 500;
}
