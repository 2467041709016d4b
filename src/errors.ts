export interface ErrorDetail {
  path: string
  message: string
}

export class AppError extends Error {
  readonly status: number
  readonly details?: ErrorDetail[]

  constructor(status: number, message: string, details?: ErrorDetail[]) {
    super(message)
    this.name = new.target.name
    this.status = status
    this.details = details
  }
}

export class ValidationError extends AppError {
  constructor(details: ErrorDetail[], message = 'Validation failed') {
    super(422, message, details)
  }

  static field(path: string, message: string): ValidationError {
    return new ValidationError([{ path, message }], message)
  }
}

export class BadRequestError extends AppError {
  constructor(message: string) {
    super(400, message)
  }
}

export class InvalidTransitionError extends BadRequestError {
  constructor(entity: string, from: string, to: string) {
    super(`${entity} cannot move from ${from} to ${to}`)
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Please authenticate') {
    super(401, message)
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Insufficient permissions') {
    super(403, message)
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not Found') {
    super(404, message)
  }
}
