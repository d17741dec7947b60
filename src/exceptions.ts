/**
 * Base class of every error raised by this library.
 *
 * `title` is a short label suitable for a setup form, `message` carries the details.
 */
export class ImouError extends Error {
  readonly title: string;

  constructor(message: string = "", title: string = "Imou error") {
    super(message);
    this.name = new.target.name;
    this.title = title;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  getTitle(): string {
    return this.title;
  }

  override toString(): string {
    return this.message ? `${this.title}: ${this.message}` : this.title;
  }
}

/** The remote payload is missing an expected field or holds an unknown value */
export class InvalidResponseError extends ImouError {
  constructor(message: string = "") {
    super(message, "Invalid response");
  }
}

/** The cloud reported a failure for the call */
export class ApiError extends ImouError {
  readonly code: string;
  readonly method: string;

  constructor(message: string = "", method: string = "", code: string = "") {
    super(message, "API error");
    this.method = method;
    this.code = code;
  }
}

/** An operation was attempted before the credentials were checked */
export class NotConnectedError extends ImouError {
  constructor(message: string = "") {
    super(message, "Not connected");
  }
}

/** The API endpoint could not be reached or answered with an HTTP error */
export class ConnectionFailedError extends ImouError {
  constructor(message: string = "") {
    super(message, "Connection failed");
  }
}

/** The app id / app secret pair was rejected */
export class NotAuthorizedError extends ImouError {
  constructor(message: string = "") {
    super(message, "Not authorized");
  }
}

export class InvalidConfigurationError extends ImouError {
  constructor(message: string = "") {
    super(message, "Invalid configuration");
  }
}

/** Setup could not complete; the caller should retry later */
export class SetupNotReadyError extends ImouError {
  constructor(message: string = "") {
    super(message, "Setup not ready");
  }
}
