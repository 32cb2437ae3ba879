import {
  PAYLOAD_VARIANTS,
  PayloadVariant,
  WidgetIdentity,
} from "../modules/widget-builder/widget-builder.types";

export interface WidgetSettings {
  identity: WidgetIdentity;
  payloadVariant: PayloadVariant;
}

function required(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) throw new Error(`Missing ${name}`);
  return value;
}

function isPayloadVariant(value: string): value is PayloadVariant {
  return PAYLOAD_VARIANTS.some((variant) => variant === value);
}

export function loadWidgetSettings(env: NodeJS.ProcessEnv = process.env): WidgetSettings {
  const variant = env.PAYBUTTON_PAYLOAD_VARIANT || "embedded";
  if (!isPayloadVariant(variant)) {
    throw new Error(
      `Invalid PAYBUTTON_PAYLOAD_VARIANT "${variant}", expected one of ${PAYLOAD_VARIANTS.join(", ")}`
    );
  }

  return {
    identity: {
      serviceUrl: required(env, "PAYBUTTON_SERVICE_URL"),
      appId: required(env, "PAYBUTTON_APP_ID"),
      appSecret: required(env, "PAYBUTTON_APP_SECRET"),
    },
    payloadVariant: variant,
  };
}
