export class HttpError extends Error {
  public readonly status: number;
  public readonly code: string;
  public readonly details?: unknown;

  constructor(status: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, HttpError.prototype);
  }
}

export const persistenceError = (message = "Base de données indisponible") =>
  new HttpError(503, "PERSISTENCE_ERROR", message);

export const timeoutError = (message = "Délai dépassé pour la base de données") =>
  new HttpError(504, "TIMEOUT", message);
