/**
 * Error codes used throughout the application
 */
export const ErrorCodes = {
  /** Malformed request line, header or body */
  INVALID_REQUEST: 'invalid_request',
  /** Request body is not valid JSON */
  INVALID_JSON: 'invalid_json',
  /** Request head exceeded the configured maximum */
  HEADER_TOO_LARGE: 'header_too_large',
  /** Declared body length exceeded the configured maximum */
  BODY_TOO_LARGE: 'body_too_large',
  /** Body-carrying request without Content-Length */
  MISSING_LENGTH: 'missing_length',
  /** Peer closed the connection mid-request */
  CONNECTION_CLOSED: 'connection_closed',
  /** No route for the method and path */
  NOT_FOUND: 'not_found',
  /** Dispatch queue or job runner at capacity */
  SERVER_BUSY: 'server_busy',
  /** Worker pool no longer accepts work */
  POOL_DISCONNECTED: 'pool_disconnected',
  /** Poll without an id parameter */
  JOB_ID_REQUIRED: 'job_id_required',
  /** Video reference could not be parsed */
  INVALID_REFERENCE: 'invalid_reference',
  /** Video has no usable caption track */
  NO_CAPTIONS: 'no_captions',
  /** Transcript provider refused to answer */
  TRANSCRIPT_BLOCKED: 'transcript_blocked',
  /** Any other transcript failure */
  TRANSCRIPT_ERROR: 'transcript_error',
  /** Completion backend unreachable */
  BACKEND_UNAVAILABLE: 'backend_unavailable',
  /** Completion backend answered with a non-2xx status */
  BACKEND_ERROR: 'backend_error',
  /** Completion backend returned no text */
  EMPTY_RESPONSE: 'empty_response',
  /** Internal server error */
  INTERNAL_ERROR: 'internal_error',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Custom API error class with HTTP status code and error code
 */
export class ApiError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(statusCode: number, code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response format
   */
  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

/**
 * Factory functions for common errors
 */
export const Errors = {
  invalidRequest: (message: string) =>
    new ApiError(400, ErrorCodes.INVALID_REQUEST, message),

  invalidJson: (cause: string) =>
    new ApiError(400, ErrorCodes.INVALID_JSON, `JSON deserialization error: ${cause}`),

  headerTooLarge: (maxBytes: number) =>
    new ApiError(431, ErrorCodes.HEADER_TOO_LARGE, `Request header exceeds ${maxBytes} bytes`),

  bodyTooLarge: (declared: number, maxBytes: number) =>
    new ApiError(413, ErrorCodes.BODY_TOO_LARGE, 'Request body too large', { declared, maxBytes }),

  missingLength: () =>
    new ApiError(411, ErrorCodes.MISSING_LENGTH, 'Content-Length header is required for this method'),

  connectionClosed: () =>
    new ApiError(400, ErrorCodes.CONNECTION_CLOSED, 'Connection closed before the request was complete'),

  notFound: () =>
    new ApiError(404, ErrorCodes.NOT_FOUND, 'Not Found'),

  serverBusy: () =>
    new ApiError(503, ErrorCodes.SERVER_BUSY, 'Server is busy, please try again later.'),

  poolDisconnected: () =>
    new ApiError(500, ErrorCodes.POOL_DISCONNECTED, 'Worker pool has been disconnected.'),

  jobIdRequired: () =>
    new ApiError(400, ErrorCodes.JOB_ID_REQUIRED, 'Query parameter "id" or "job_id" is required'),

  invalidReference: (reference: string) =>
    new ApiError(400, ErrorCodes.INVALID_REFERENCE, `Transcript error: Invalid or unsupported YouTube URL: ${reference}`),

  noCaptions: (message: string) =>
    new ApiError(404, ErrorCodes.NO_CAPTIONS, `Transcript error: ${message}`),

  transcriptBlocked: () =>
    new ApiError(
      502,
      ErrorCodes.TRANSCRIPT_BLOCKED,
      'Transcript error: Video details not found in API response. Server IP likely blocked by YouTube.'
    ),

  transcriptError: (message: string) =>
    new ApiError(502, ErrorCodes.TRANSCRIPT_ERROR, `Transcript error: ${message}`),

  backendUnavailable: (cause: string) =>
    new ApiError(502, ErrorCodes.BACKEND_UNAVAILABLE, `Completion backend unavailable: ${cause}`),

  backendError: (status: number, body: string) =>
    new ApiError(502, ErrorCodes.BACKEND_ERROR, body || `Completion backend returned status ${status}`, { status }),

  emptyResponse: () =>
    new ApiError(502, ErrorCodes.EMPTY_RESPONSE, 'Completion backend returned no text'),

  internalError: (message: string = 'An unexpected error occurred') =>
    new ApiError(500, ErrorCodes.INTERNAL_ERROR, message),
};

/**
 * Convert anything thrown into an ApiError, keeping the message of plain errors
 */
export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }
  return Errors.internalError(errorMessage(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
