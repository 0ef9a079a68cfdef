// src/lib/errors/domain-error.ts

export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code: string,
  ) {
    super(message);
  }
}

export class NotFoundError extends DomainError {
  constructor(
    public readonly entity: string,
    public readonly entityId: string,
  ) {
    super(`${entity} ${entityId} not found`, 404, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class RequestValidationError extends DomainError {
  public readonly details: Record<string, string[] | undefined>;
  constructor(details: Record<string, string[] | undefined>) {
    super("Invalid request payload", 400, "REQUEST_VALIDATION_FAILED");
    this.name = "RequestValidationError";
    this.details = details;
  }
}
