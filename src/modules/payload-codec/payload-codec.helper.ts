import { EncodingError, InvalidKeyLengthError } from "../../common/errors";
import { AppSecret } from "./payload-codec.types";

export const BLOCK_SIZE = 16;
export const KEY_LENGTH = 16;
export const CIPHER_ALGORITHM = "aes-128-ecb";

/**
 * PKCS#7: append `p` bytes of value `p`, where `p` is always 1..blockSize.
 * Input that is already block aligned gets a whole extra block.
 */
export function pkcs7Pad(data: Buffer, blockSize = BLOCK_SIZE): Buffer {
  const pad = blockSize - (data.length % blockSize);
  return Buffer.concat([data, Buffer.alloc(pad, pad)]);
}

export function pkcs7Unpad(data: Buffer, blockSize = BLOCK_SIZE): Buffer {
  if (data.length === 0 || data.length % blockSize !== 0) {
    throw new EncodingError(
      `padded data length ${data.length} is not a positive multiple of ${blockSize}`
    );
  }

  const pad = data[data.length - 1];
  if (pad < 1 || pad > blockSize) {
    throw new EncodingError(`invalid PKCS#7 pad value ${pad}`);
  }

  for (let i = data.length - pad; i < data.length; i++) {
    if (data[i] !== pad) {
      throw new EncodingError("invalid PKCS#7 padding bytes");
    }
  }

  return data.subarray(0, data.length - pad);
}

export function toKeyBytes(secret: AppSecret): Buffer {
  const key = typeof secret === "string" ? Buffer.from(secret, "utf8") : secret;
  if (key.length !== KEY_LENGTH) {
    throw new InvalidKeyLengthError(key.length, KEY_LENGTH);
  }
  return key;
}

// Lone surrogates are replaced by U+FFFD on encode, so compare after a round trip.
export function encodeUtf8(text: string): Buffer {
  const bytes = Buffer.from(text, "utf8");
  if (bytes.toString("utf8") !== text) {
    throw new EncodingError("payload contains characters that cannot be encoded as UTF-8");
  }
  return bytes;
}

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

export function decodeUtf8(bytes: Buffer): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch (err) {
    throw new EncodingError("decrypted payload is not valid UTF-8", err);
  }
}

export function decodeBase64(token: string): Buffer {
  const bytes = Buffer.from(token, "base64");
  if (bytes.toString("base64") !== token) {
    throw new EncodingError("token is not canonical base64");
  }
  return bytes;
}
