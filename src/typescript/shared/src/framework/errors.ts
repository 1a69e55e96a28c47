
export class HttpError extends Error {
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(statusCode: number, message: string, details?: Record<string, unknown>) {
    super(message);
    this.statusCode = statusCode;
    this.details = details;

    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, HttpError.prototype);
    this.name = 'HttpError';
  }
}

export interface DecodeIssue {
  path: string;
  message: string;
}

/**
 * A payload did not match the shape its boundary expects.
 */
export class DecodeError extends HttpError {
  public readonly issues: DecodeIssue[];

  constructor(what: string, issues: DecodeIssue[]) {
    const summary = issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');
    super(400, `Invalid ${what}: ${summary}`, { issues });
    this.issues = issues;

    Object.setPrototypeOf(this, DecodeError.prototype);
    this.name = 'DecodeError';
  }
}

export class CredentialNotFoundError extends HttpError {
  public readonly athleteId: number;

  constructor(athleteId: number) {
    super(404, `No stored credentials for athlete ${athleteId}`, { athleteId });
    this.athleteId = athleteId;

    Object.setPrototypeOf(this, CredentialNotFoundError.prototype);
    this.name = 'CredentialNotFoundError';
  }
}

/**
 * The request body carries no Pub/Sub envelope to unwrap.
 */
export class MissingEnvelopeError extends Error {
  constructor(message = 'No Pub/Sub message found in request body') {
    super(message);

    Object.setPrototypeOf(this, MissingEnvelopeError.prototype);
    this.name = 'MissingEnvelopeError';
  }
}
