import "reflect-metadata";
import { container } from "tsyringe";
import { registerDependencies } from "../../../container";
import { registerPayloadCodecModule } from "../../payload-codec/payload-codec.module";
import { createPaymentRequestConfig } from "../dto/payment-request-config.dto";
import { registerWidgetBuilderModule } from "../widget-builder.module";
import { WidgetBuilderService } from "../widget-builder.service";
import { WIDGET_BUILDER_TOKENS } from "../tokens";

const identity = {
  serviceUrl: "http://example.com/pay_button/show",
  appId: "test-app",
  appSecret: "test-secret-0016",
};

describe("registerWidgetBuilderModule", () => {
  beforeEach(() => {
    container.reset();
  });

  it("should require the payload codec module first", () => {
    expect(() => registerWidgetBuilderModule(identity)).toThrow(
      "PayloadCodecService is not registered. Register PayloadCodec module first."
    );
  });

  it("should register a builder with the embedded variant by default", () => {
    registerPayloadCodecModule();
    registerWidgetBuilderModule(identity);

    const builder = container.resolve<WidgetBuilderService>(WIDGET_BUILDER_TOKENS.WidgetBuilderService);
    expect(builder).toBeInstanceOf(WidgetBuilderService);
    expect(builder.payloadVariant).toBe("embedded");
    expect(container.resolve<WidgetBuilderService>(WIDGET_BUILDER_TOKENS.WidgetBuilderService)).toBe(builder);
  });

  it("should pass the variant option through", () => {
    registerPayloadCodecModule();
    registerWidgetBuilderModule(identity, { payloadVariant: "detached" });

    const builder = container.resolve<WidgetBuilderService>(WIDGET_BUILDER_TOKENS.WidgetBuilderService);
    expect(builder.payloadVariant).toBe("detached");
  });
});

describe("registerDependencies", () => {
  beforeEach(() => {
    container.reset();
  });

  it("should register both modules from explicit settings", () => {
    registerDependencies({ identity, payloadVariant: "detached" });

    const builder = container.resolve<WidgetBuilderService>(WIDGET_BUILDER_TOKENS.WidgetBuilderService);
    const url = new URL(
      builder.buildUrl(createPaymentRequestConfig({ receiver_user_id: "r1", receiver_user_email: "", pay_type: "Pay", timestamp: 1 }))
    );

    expect(builder.payloadVariant).toBe("detached");
    expect(url.searchParams.get("app_id")).toBe("test-app");
  });
});
