export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number = 500,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = 'Unauthorized', details?: unknown) {
    super(message, 401, details);
    this.name = 'UnauthorizedError';
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'Not found', details?: unknown) {
    super(message, 404, details);
    this.name = 'NotFoundError';
  }
}

/**
 * The client-credentials exchange with the identity provider failed.
 */
export class AuthenticationError extends HttpError {
  constructor(message = 'Authentication failed', details?: unknown) {
    super(message, 502, details);
    this.name = 'AuthenticationError';
  }
}

/**
 * The management API answered with a non-success status or an unreadable body.
 * `reason` is the remote reason phrase when there was one.
 */
export class RemoteApiError extends HttpError {
  constructor(
    message: string,
    public readonly remoteStatus: number,
    public readonly reason: string,
    details?: unknown,
  ) {
    super(message, 502, details);
    this.name = 'RemoteApiError';
  }
}
