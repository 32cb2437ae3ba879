import {
  createPaymentRequestConfig,
  PayloadCodecService,
  PAYLOAD_CODEC_TOKENS,
  registerDependencies,
  WIDGET_BUILDER_TOKENS,
  WidgetBuilderService,
} from "../../../index";
import { container } from "tsyringe";

describe("payment button SDK entry point", () => {
  beforeAll(() => {
    registerDependencies({
      identity: {
        serviceUrl: "http://example.com/pay_button/show",
        appId: "b91014cc28c94841",
        appSecret: "c533a6e606fb62cc",
      },
      payloadVariant: "embedded",
    });
  });

  it("should build a div widget whose payload decrypts with the shared codec", () => {
    const builder = container.resolve<WidgetBuilderService>(WIDGET_BUILDER_TOKENS.WidgetBuilderService);
    const codec = container.resolve<PayloadCodecService>(PAYLOAD_CODEC_TOKENS.PayloadCodecService);
    const config = createPaymentRequestConfig(
      {
        sender_user_email: "sender@example.com",
        sender_user_cellphone: "+5491112341234",
        receiver_user_id: "r0210",
        receiver_user_email: "receiver@example.com",
        pay_object_id: "to0210",
        amount: 0.01,
        pay_type: "Donate",
      },
      { now: () => 1410973639125 }
    );

    const html = builder.buildDivWidget(config);
    const match = /\.load\("([^"]*)"\)/.exec(html);
    expect(match).not.toBeNull();

    const url = new URL(match ? match[1] : "");
    const token = url.searchParams.get("button_request") ?? "";

    expect(codec.decrypt(token, "c533a6e606fb62cc")).toBe(builder.serialize(config));
    expect(JSON.parse(url.searchParams.get("customization") ?? "")).toEqual({ button_text: "Donate" });
  });
});
