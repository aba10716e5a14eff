import { z } from "zod";
import { Cents } from "../shared/cents";
import { ZonedDateTime } from "../shared/calendar";
import type { Payment } from "./payment-repository";

export const paymentItemRecordSchema = z.object({
  name: z.string(),
  regularPriceInCents: z.number().int(),
  finalPriceInCents: z.number().int(),
});

export const paymentRecordSchema = z.object({
  paymentDate: z.string().datetime({ offset: true }),
  user: z.object({
    email: z.string(),
  }),
  items: z.array(paymentItemRecordSchema),
});

export const paymentRecordListSchema = z.array(paymentRecordSchema);

export type PaymentRecord = z.infer<typeof paymentRecordSchema>;

export function toPayment(record: PaymentRecord): Payment {
  return {
    paymentDate: ZonedDateTime.parse(record.paymentDate),
    user: { email: record.user.email },
    items: record.items.map((item) => ({
      name: item.name,
      regularPrice: Cents.create(item.regularPriceInCents),
      finalPrice: Cents.create(item.finalPriceInCents),
    })),
  };
}
