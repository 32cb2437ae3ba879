import {
  EncodingError,
  InvalidKeyLengthError,
  PaymentButtonError,
  SerializationError,
} from "../errors";

describe("PaymentButtonError", () => {
  it("should name each error after its class and keep the code", () => {
    const errors = [
      new InvalidKeyLengthError(15, 16),
      new SerializationError("amount must be a finite number", "amount"),
      new EncodingError("token is not canonical base64"),
    ];

    expect(errors.map((err) => err.name)).toEqual([
      "InvalidKeyLengthError",
      "SerializationError",
      "EncodingError",
    ]);
    expect(errors.map((err) => err.code)).toEqual([
      "INVALID_KEY_LENGTH",
      "SERIALIZATION_ERROR",
      "ENCODING_ERROR",
    ]);
    expect(errors.every((err) => err instanceof PaymentButtonError)).toBe(true);
  });

  it("should keep the underlying cause", () => {
    const cause = new TypeError("The encoded data was not valid for encoding utf-8");
    const err = new EncodingError("decrypted payload is not valid UTF-8", cause);
    expect(err.cause).toBe(cause);
  });
});
