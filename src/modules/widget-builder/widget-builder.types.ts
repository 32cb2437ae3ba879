import { AppSecret } from "../payload-codec/payload-codec.types";
import { PaymentRequestConfig } from "./dto/payment-request-config.dto";

export interface WidgetIdentity {
  /** Provider endpoint that serves the widget, e.g. `https://provider.example/pay_button/show`. */
  serviceUrl: string;
  /** TPA identifier, sent in clear. */
  appId: string;
  /** 16-byte shared key. Used locally for encryption only. */
  appSecret: AppSecret;
}

/**
 * Where `pay_type` travels.
 * - `embedded`: inside the encrypted payload and in `customization` (current contract)
 * - `detached`: only in `customization` (legacy buttons)
 */
export type PayloadVariant = "embedded" | "detached";

export const PAYLOAD_VARIANTS: readonly PayloadVariant[] = ["embedded", "detached"];

export type WidgetKind = "iframe" | "div";

export interface Clock {
  now(): number;
}

export interface WidgetBuilderOptions {
  payloadVariant?: PayloadVariant;
}

export interface IWidgetBuilderService {
  serialize(config: PaymentRequestConfig): string;
  buildUrl(config: PaymentRequestConfig): string;
  buildIframeWidget(config: PaymentRequestConfig): string;
  buildDivWidget(config: PaymentRequestConfig): string;
  buildWidget(config: PaymentRequestConfig, kind: WidgetKind): string;
}
