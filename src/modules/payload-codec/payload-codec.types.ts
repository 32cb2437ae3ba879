/** Shared secret as UTF-8 text or raw key bytes. */
export type AppSecret = string | Buffer;

export interface IPayloadCodecService {
  encrypt(payload: string, secret: AppSecret): string;
  decrypt(token: string, secret: AppSecret): string;
}
