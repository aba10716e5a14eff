import type { Cents } from "../shared/cents";
import type { ZonedDateTime } from "../shared/calendar";

export interface User {
  email: string;
}

export interface PaymentItem {
  name: string;
  regularPrice: Cents;
  finalPrice: Cents;
}

export interface Payment {
  /** Carries the zone the payment was recorded in. */
  paymentDate: ZonedDateTime;
  user: User;
  items: PaymentItem[];
}

export interface PaymentRepository {
  /**
   * Complete current snapshot. No ordering is guaranteed.
   */
  findAll(): Promise<Payment[]>;
}
