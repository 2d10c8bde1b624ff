import type { JsonValue } from "./json.js";

export class EmmaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingRequiredFieldError extends EmmaError {
  constructor(
    public readonly field: string,
    message = `Missing required field: ${field}`,
  ) {
    super(message);
  }
}

export class MissingIdentifierError extends MissingRequiredFieldError {
  constructor(field = "member_id") {
    super(field, `Missing identifier: ${field}`);
  }
}

export class MissingEmailError extends MissingRequiredFieldError {
  constructor() {
    super("email", "Missing member email");
  }
}

export class MissingStatusError extends MissingRequiredFieldError {
  constructor() {
    super("status", "Missing member status");
  }
}

export class MemberUpdateError extends EmmaError {
  constructor(public readonly memberId: number) {
    super(`Update of member ${memberId} was not acknowledged`);
  }
}

/**
 * The transport saw a status other than success or 404. Timeouts and
 * network failures use the synthetic codes 504 and 500.
 */
export class ApiRequestFailed extends EmmaError {
  constructor(
    public readonly code: number,
    message: string,
    public readonly body: JsonValue | string | null = null,
  ) {
    super(message);
  }
}

export class UnknownCodeError extends EmmaError {
  constructor(
    public readonly enumeration: string,
    public readonly code: string,
  ) {
    super(`Unknown ${enumeration} code: ${code}`);
  }
}

export class InvalidFieldError extends EmmaError {
  constructor(
    public readonly field: string,
    public readonly value: JsonValue,
  ) {
    super(`Invalid value for ${field}: ${JSON.stringify(value)}`);
  }
}

export class UnexpectedResponseError extends EmmaError {
  constructor(
    public readonly path: string,
    public readonly body: JsonValue | null,
  ) {
    super(`Unexpected response from ${path}`);
  }
}
