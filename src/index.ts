/**
 * Payment button SDK
 *
 * Builds embeddable pay buttons whose configuration is encrypted with the
 * TPA's shared secret.
 *
 * @example
 * ```typescript
 * import { container } from "tsyringe";
 * import {
 *   registerDependencies,
 *   createPaymentRequestConfig,
 *   WIDGET_BUILDER_TOKENS,
 *   WidgetBuilderService,
 * } from "paybutton-sdk";
 *
 * registerDependencies({
 *   identity: { serviceUrl: "https://provider.example/pay_button/show", appId: "my-app", appSecret: secret },
 *   payloadVariant: "embedded",
 * });
 *
 * const builder = container.resolve<WidgetBuilderService>(WIDGET_BUILDER_TOKENS.WidgetBuilderService);
 * const html = builder.buildDivWidget(
 *   createPaymentRequestConfig({
 *     receiver_user_id: "r-42",
 *     receiver_user_email: "receiver@example.com",
 *     pay_object_id: "post-7",
 *     pay_type: "Tip",
 *   })
 * );
 * ```
 */
import "reflect-metadata";

export { registerDependencies } from "./container";
export { loadWidgetSettings } from "./common/config";
export type { WidgetSettings } from "./common/config";

export {
  PaymentButtonError,
  InvalidKeyLengthError,
  SerializationError,
  EncodingError,
} from "./common/errors";
export type { PaymentButtonErrorCode } from "./common/errors";

// Payload codec
export { PayloadCodecService } from "./modules/payload-codec/payload-codec.service";
export { registerPayloadCodecModule } from "./modules/payload-codec/payload-codec.module";
export { PAYLOAD_CODEC_TOKENS } from "./modules/payload-codec/tokens";
export { pkcs7Pad, pkcs7Unpad, BLOCK_SIZE, KEY_LENGTH } from "./modules/payload-codec/payload-codec.helper";
export type { AppSecret, IPayloadCodecService } from "./modules/payload-codec/payload-codec.types";

// Widget builder
export { WidgetBuilderService } from "./modules/widget-builder/widget-builder.service";
export { registerWidgetBuilderModule } from "./modules/widget-builder/widget-builder.module";
export { WIDGET_BUILDER_TOKENS } from "./modules/widget-builder/tokens";
export {
  PAY_TYPES,
  isPayType,
  createPaymentRequestConfig,
  systemClock,
} from "./modules/widget-builder/dto/payment-request-config.dto";
export type {
  PayType,
  PaymentRequestConfig,
  PaymentRequestConfigInput,
} from "./modules/widget-builder/dto/payment-request-config.dto";
export { PAYLOAD_VARIANTS } from "./modules/widget-builder/widget-builder.types";
export type {
  Clock,
  IWidgetBuilderService,
  PayloadVariant,
  WidgetBuilderOptions,
  WidgetIdentity,
  WidgetKind,
} from "./modules/widget-builder/widget-builder.types";
