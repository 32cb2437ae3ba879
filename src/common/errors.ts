export type PaymentButtonErrorCode =
  | "INVALID_KEY_LENGTH"
  | "SERIALIZATION_ERROR"
  | "ENCODING_ERROR";

export class PaymentButtonError extends Error {
  constructor(
    public readonly code: PaymentButtonErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class InvalidKeyLengthError extends PaymentButtonError {
  constructor(public readonly actualLength: number, expectedLength: number) {
    super(
      "INVALID_KEY_LENGTH",
      `app secret must be ${expectedLength} bytes, got ${actualLength}`
    );
  }
}

export class SerializationError extends PaymentButtonError {
  constructor(message: string, public readonly field?: string, cause?: unknown) {
    super("SERIALIZATION_ERROR", message, cause);
  }
}

export class EncodingError extends PaymentButtonError {
  constructor(message: string, cause?: unknown) {
    super("ENCODING_ERROR", message, cause);
  }
}
