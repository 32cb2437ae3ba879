import { container } from "tsyringe";
import { WIDGET_BUILDER_TOKENS } from "./tokens";
import { PAYLOAD_CODEC_TOKENS } from "../payload-codec/tokens";
import { WidgetBuilderService } from "./widget-builder.service";
import { WidgetBuilderOptions, WidgetIdentity } from "./widget-builder.types";

export function registerWidgetBuilderModule(identity: WidgetIdentity, options: WidgetBuilderOptions = {}) {
  if (!container.isRegistered(PAYLOAD_CODEC_TOKENS.PayloadCodecService)) {
    throw new Error(
      "PayloadCodecService is not registered. Register PayloadCodec module first."
    );
  }

  container.registerInstance(WIDGET_BUILDER_TOKENS.WidgetIdentity, identity);
  container.registerInstance(WIDGET_BUILDER_TOKENS.PayloadVariant, options.payloadVariant ?? "embedded");

  container.registerSingleton(WIDGET_BUILDER_TOKENS.WidgetBuilderService, WidgetBuilderService);
}
