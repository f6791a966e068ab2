// ============================================================================
// Base Error Classes
// ============================================================================

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

// ============================================================================
// HTTP Errors
// ============================================================================

export class BadRequestError extends AppError {
  constructor(message: string = 'Bad request') {
    super(message, 400, 'BAD_REQUEST');
  }
}

// ============================================================================
// Catalog Errors
// ============================================================================

/**
 * Question catalog or decision tree failed an integrity check.
 * Fatal at startup: nothing is partially loaded.
 */
export class SchemaError extends AppError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid question catalog: ${problems.join('; ')}`, 500, 'SCHEMA_ERROR', false);
    this.problems = problems;
  }
}

// ============================================================================
// Session Errors
// ============================================================================

export class SessionNotFoundError extends AppError {
  constructor(sessionId: string) {
    super(`Assessment session not found: ${sessionId}`, 404, 'SESSION_NOT_FOUND');
  }
}

export class OutOfOrderAnswerError extends AppError {
  public readonly expectedQuestionId: string | null;
  public readonly receivedQuestionId: string;

  constructor(receivedQuestionId: string, expectedQuestionId: string | null) {
    super(
      expectedQuestionId
        ? `Answer for ${receivedQuestionId} is out of order: ${expectedQuestionId} is pending`
        : `Answer for ${receivedQuestionId} is out of order: no question is pending`,
      409,
      'OUT_OF_ORDER_ANSWER'
    );
    this.expectedQuestionId = expectedQuestionId;
    this.receivedQuestionId = receivedQuestionId;
  }
}

export class InvalidAnswerValueError extends AppError {
  public readonly questionId: string;

  constructor(questionId: string, reason: string) {
    super(`Invalid answer for ${questionId}: ${reason}`, 422, 'INVALID_ANSWER_VALUE');
    this.questionId = questionId;
  }
}

export class SessionAlreadyCompletedError extends AppError {
  constructor(sessionId: string) {
    super(`Assessment session already completed: ${sessionId}`, 409, 'SESSION_ALREADY_COMPLETED');
  }
}

export class SessionNotCompletedError extends AppError {
  constructor(sessionId: string) {
    super(`Assessment session not completed yet: ${sessionId}`, 409, 'SESSION_NOT_COMPLETED');
  }
}

export class ReportNotGeneratedError extends AppError {
  constructor(sessionId: string) {
    super(`No report has been generated for session: ${sessionId}`, 409, 'REPORT_NOT_GENERATED');
  }
}

export class InvalidChatHistoryError extends AppError {
  constructor(reason: string) {
    super(`Invalid chat history: ${reason}`, 400, 'INVALID_CHAT_HISTORY');
  }
}

// ============================================================================
// External Service Errors
// ============================================================================

export class ExternalServiceError extends AppError {
  public readonly service: string;
  public readonly originalError?: Error;

  constructor(service: string, message: string, originalError?: Error) {
    super(`${service} error: ${message}`, 502, 'EXTERNAL_SERVICE_ERROR');
    this.service = service;
    this.originalError = originalError;
  }
}

/**
 * The report collaborator could not be reached or refused the call.
 */
export class AIServiceError extends ExternalServiceError {
  constructor(message: string, originalError?: Error) {
    super('AI', message, originalError);
  }
}

/**
 * The report collaborator answered, but with a payload that fails validation.
 * Kept apart from AIServiceError so callers can choose a retry policy per kind.
 */
export class MalformedReportResponseError extends AppError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Malformed report response: ${issues.join('; ')}`, 502, 'MALFORMED_REPORT_RESPONSE');
    this.issues = issues;
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isOperationalError(error: unknown): boolean {
  if (isAppError(error)) {
    return error.isOperational;
  }
  return false;
}
