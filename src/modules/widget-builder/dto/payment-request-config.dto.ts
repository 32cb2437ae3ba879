import { Clock } from "../widget-builder.types";

export const PAY_TYPES = ["Tip", "Pay", "Deposit", "Donate"] as const;

export type PayType = (typeof PAY_TYPES)[number];

export function isPayType(value: string): value is PayType {
  return (PAY_TYPES as readonly string[]).includes(value);
}

/**
 * Button configuration. Field names are the provider's payload keys.
 * Every key is sent; unknown optional values are empty strings.
 */
export interface PaymentRequestConfig {
  readonly sender_user_id: string;
  readonly sender_user_email: string;
  readonly sender_user_cellphone: string;
  readonly receiver_user_id: string;
  readonly receiver_user_email: string;
  /** Identifier of the paid object in the TPA's own domain. */
  readonly pay_object_id: string;
  /** 0 lets the user enter the amount at payment time. */
  readonly amount: number;
  /** Milliseconds since epoch. */
  readonly timestamp: number;
  /** Button label, normally one of {@link PAY_TYPES}. Not validated here. */
  readonly pay_type: string;
}

export type PaymentRequestConfigInput = Pick<
  PaymentRequestConfig,
  "receiver_user_id" | "receiver_user_email" | "pay_type"
> &
  Partial<PaymentRequestConfig>;

export const systemClock: Clock = {
  now: () => Date.now(),
};

export function createPaymentRequestConfig(
  input: PaymentRequestConfigInput,
  clock: Clock = systemClock
): PaymentRequestConfig {
  return Object.freeze({
    sender_user_id: input.sender_user_id ?? "",
    sender_user_email: input.sender_user_email ?? "",
    sender_user_cellphone: input.sender_user_cellphone ?? "",
    receiver_user_id: input.receiver_user_id,
    receiver_user_email: input.receiver_user_email,
    pay_object_id: input.pay_object_id ?? "",
    amount: input.amount ?? 0,
    timestamp: input.timestamp ?? clock.now(),
    pay_type: input.pay_type,
  });
}
