import { container } from "tsyringe";
import { PAYLOAD_CODEC_TOKENS } from "./tokens";
import { PayloadCodecService } from "./payload-codec.service";

export function registerPayloadCodecModule() {
  if (!container.isRegistered(PAYLOAD_CODEC_TOKENS.PayloadCodecService)) {
    container.registerSingleton(PAYLOAD_CODEC_TOKENS.PayloadCodecService, PayloadCodecService);
  }
}
