export const PAYLOAD_CODEC_TOKENS = {
  PayloadCodecService: Symbol("PayloadCodecService"),
};
