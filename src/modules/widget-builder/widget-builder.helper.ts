import * as qs from "qs";
import { SerializationError } from "../../common/errors";
import { PaymentRequestConfig } from "./dto/payment-request-config.dto";
import { PayloadVariant } from "./widget-builder.types";

const TEXT_FIELDS = [
  "sender_user_id",
  "sender_user_email",
  "sender_user_cellphone",
  "receiver_user_id",
  "receiver_user_email",
  "pay_object_id",
  "pay_type",
] as const;

type SerializedPaymentRequest = Omit<PaymentRequestConfig, "pay_type"> & {
  pay_type?: string;
};

export function serializePaymentRequest(
  config: PaymentRequestConfig,
  variant: PayloadVariant
): string {
  // Plain JS callers can hand in anything; the provider rejects nulls and missing keys.
  for (const field of TEXT_FIELDS) {
    if (typeof config[field] !== "string") {
      throw new SerializationError(`${field} must be a string`, field);
    }
  }
  if (typeof config.amount !== "number" || !Number.isFinite(config.amount)) {
    throw new SerializationError("amount must be a finite number", "amount");
  }
  if (!Number.isSafeInteger(config.timestamp)) {
    throw new SerializationError("timestamp must be an integer of milliseconds", "timestamp");
  }

  const payload: SerializedPaymentRequest = {
    sender_user_id: config.sender_user_id,
    sender_user_email: config.sender_user_email,
    sender_user_cellphone: config.sender_user_cellphone,
    receiver_user_id: config.receiver_user_id,
    receiver_user_email: config.receiver_user_email,
    pay_object_id: config.pay_object_id,
    amount: config.amount,
    timestamp: config.timestamp,
  };
  if (variant === "embedded") {
    payload.pay_type = config.pay_type;
  }

  return JSON.stringify(payload);
}

export function serializeCustomization(payType: string): string {
  return JSON.stringify({ button_text: payType });
}

// qs keeps "(" and ")" literal under RFC1738; form encoding escapes them.
export function formEncode(str: string, defaultEncoder: qs.defaultEncoder, charset: string): string {
  return defaultEncoder(str, defaultEncoder, charset).replace(/\(/g, "%28").replace(/\)/g, "%29");
}
