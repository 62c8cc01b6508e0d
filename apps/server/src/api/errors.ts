/**
 * Error carrying the HTTP status to answer with
 */
export class RequestError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = "RequestError";
  }
}
