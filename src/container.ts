import { config } from "dotenv";
import { WidgetSettings, loadWidgetSettings } from "./common/config";
import { registerPayloadCodecModule } from "./modules/payload-codec/payload-codec.module";
import { registerWidgetBuilderModule } from "./modules/widget-builder/widget-builder.module";

/**
 * Registers the codec and the builder. Without explicit settings the
 * identity comes from `.env` / the process environment.
 */
export function registerDependencies(settings?: WidgetSettings) {
  if (!settings) {
    config();
    settings = loadWidgetSettings();
  }

  registerPayloadCodecModule();
  registerWidgetBuilderModule(settings.identity, {
    payloadVariant: settings.payloadVariant,
  });
}
