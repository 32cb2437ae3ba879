import { injectable } from "tsyringe";
import * as crypto from "crypto";
import { EncodingError } from "../../common/errors";
import { Logger } from "../../common/logger";
import { AppSecret, IPayloadCodecService } from "./payload-codec.types";
import {
  BLOCK_SIZE,
  CIPHER_ALGORITHM,
  decodeBase64,
  decodeUtf8,
  encodeUtf8,
  pkcs7Pad,
  pkcs7Unpad,
  toKeyBytes,
} from "./payload-codec.helper";

/**
 * Encrypts button payloads the way the provider decrypts them:
 * UTF-8 bytes, PKCS#7 to 16-byte blocks, AES-128-ECB, standard base64.
 *
 * ECB takes no IV, so the same payload and secret always give the same token.
 */
@injectable()
export class PayloadCodecService implements IPayloadCodecService {
  private readonly log = new Logger("PayloadCodecService");

  public encrypt(payload: string, secret: AppSecret): string {
    const key = toKeyBytes(secret);
    const plain = encodeUtf8(payload);
    const padded = pkcs7Pad(plain);

    // Padding is applied above; the cipher must not add its own.
    const cipher = crypto.createCipheriv(CIPHER_ALGORITHM, key, null);
    cipher.setAutoPadding(false);
    const encrypted = Buffer.concat([cipher.update(padded), cipher.final()]);

    this.log.debug("encrypt:done", {
      bytes: plain.length,
      blocks: padded.length / BLOCK_SIZE,
    });

    return encrypted.toString("base64");
  }

  public decrypt(token: string, secret: AppSecret): string {
    const key = toKeyBytes(secret);
    const encrypted = decodeBase64(token);
    if (encrypted.length === 0 || encrypted.length % BLOCK_SIZE !== 0) {
      throw new EncodingError(
        `ciphertext length ${encrypted.length} is not a positive multiple of ${BLOCK_SIZE}`
      );
    }

    const decipher = crypto.createDecipheriv(CIPHER_ALGORITHM, key, null);
    decipher.setAutoPadding(false);
    const padded = Buffer.concat([decipher.update(encrypted), decipher.final()]);

    try {
      return decodeUtf8(pkcs7Unpad(padded));
    } catch (err) {
      // usually a token made with another secret
      this.log.error("decrypt:error", { err, blocks: padded.length / BLOCK_SIZE });
      throw err;
    }
  }
}
