import { inject, injectable } from "tsyringe";
import * as qs from "qs";
import { logger } from "../../common/logger";
import { PAYLOAD_CODEC_TOKENS } from "../payload-codec/tokens";
import { IPayloadCodecService } from "../payload-codec/payload-codec.types";
import { WIDGET_BUILDER_TOKENS } from "./tokens";
import { PaymentRequestConfig } from "./dto/payment-request-config.dto";
import {
  IWidgetBuilderService,
  PayloadVariant,
  WidgetIdentity,
  WidgetKind,
} from "./widget-builder.types";
import { formEncode, serializeCustomization, serializePaymentRequest } from "./widget-builder.helper";
import { DIV_TEMPLATE, IFRAME_TEMPLATE, renderTemplate } from "./widget-builder.templates";

/**
 * Builds embeddable payment button snippets.
 *
 * The URL has the form
 * `<serviceUrl>?app_id=<id>&button_request=<token>&customization=<json>`.
 * The provider decrypts `button_request` with the shared secret; `customization`
 * is a display hint only.
 *
 * @example
 * ```typescript
 * const builder = container.resolve<WidgetBuilderService>(WIDGET_BUILDER_TOKENS.WidgetBuilderService);
 * const html = builder.buildIframeWidget(
 *   createPaymentRequestConfig({ receiver_user_id: "r0210", receiver_user_email: "", pay_type: "Tip" })
 * );
 * ```
 */
@injectable()
export class WidgetBuilderService implements IWidgetBuilderService {
  private readonly log = logger.child({ service: "WidgetBuilderService" });
  private readonly identity: Readonly<WidgetIdentity>;

  constructor(
    @inject(WIDGET_BUILDER_TOKENS.WidgetIdentity) identity: WidgetIdentity,
    @inject(PAYLOAD_CODEC_TOKENS.PayloadCodecService) private codec: IPayloadCodecService,
    @inject(WIDGET_BUILDER_TOKENS.PayloadVariant) private readonly variant: PayloadVariant = "embedded"
  ) {
    this.identity = Object.freeze({
      serviceUrl: identity.serviceUrl,
      appId: identity.appId,
      appSecret:
        typeof identity.appSecret === "string" ? identity.appSecret : Buffer.from(identity.appSecret),
    });
  }

  public get payloadVariant(): PayloadVariant {
    return this.variant;
  }

  public serialize(config: PaymentRequestConfig): string {
    return serializePaymentRequest(config, this.variant);
  }

  public buildUrl(config: PaymentRequestConfig): string {
    const lg = this.log.child({ appId: this.identity.appId, variant: this.variant });
    lg.debug("build-url:start");

    try {
      const buttonRequest = this.codec.encrypt(this.serialize(config), this.identity.appSecret);

      const query = qs.stringify(
        {
          app_id: this.identity.appId,
          button_request: buttonRequest,
          customization: serializeCustomization(config.pay_type),
        },
        { format: "RFC1738", encoder: formEncode }
      );

      lg.debug({ tokenLength: buttonRequest.length }, "build-url:done");
      return `${this.identity.serviceUrl}?${query}`;
    } catch (err) {
      lg.error({ err }, "build-url:error");
      throw err;
    }
  }

  public buildIframeWidget(config: PaymentRequestConfig): string {
    return renderTemplate(IFRAME_TEMPLATE, this.buildUrl(config));
  }

  public buildDivWidget(config: PaymentRequestConfig): string {
    return renderTemplate(DIV_TEMPLATE, this.buildUrl(config));
  }

  public buildWidget(config: PaymentRequestConfig, kind: WidgetKind): string {
    switch (kind) {
      case "iframe":
        return this.buildIframeWidget(config);
      case "div":
        return this.buildDivWidget(config);
      default:
        throw new Error(`Unknown widget kind "${String(kind)}"`);
    }
  }
}
