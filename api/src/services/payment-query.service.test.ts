import { PaymentQueryService } from "./payment-query.service";
import { FixedClock } from "../clock/clock-provider";
import type {
  Payment,
  PaymentRepository,
} from "../repositories/payment-repository";
import { InvalidArgumentError } from "../shared/errors";
import { YearMonth } from "../shared/year-month";
import { createMockLogger, item, payment } from "../test/helpers";

const january = payment("2023-01-10T10:00:00Z", "a@b.com", [
  item("Book", 12, 10),
  item("Pen", 25, 20),
]);
const february = payment("2023-02-03T09:00:00Z", "c@d.com", [
  item("Book", 5, 5),
]);
const earlyMay = payment("2023-05-02T12:00:00Z", "a@b.com", [
  item("Lamp", 50, 40),
  item("Book", 10, 8),
  item("Mug", 7, 7),
]);
const midMay = payment("2023-05-14T08:00:00Z", "A@b.com", [item("Mug", 8, 6)]);
const lateApril = payment("2023-04-30T23:30:00Z", "e@f.com", []);

// Each lies on the other side of the month boundary once read in UTC.
const febInItsOffset = payment("2023-02-01T00:30:00+01:00", "g@h.com", [
  item("Tea", 4, 3),
]);
const janInItsOffset = payment("2023-01-31T23:30:00-01:00", "g@h.com", [
  item("Cup", 9, 6),
]);

const allPayments = [january, february, earlyMay, midMay, lateApril];

function createRepository(payments: Payment[]): PaymentRepository {
  return { findAll: jest.fn().mockResolvedValue(payments) };
}

function createService(
  payments: Payment[] = allPayments,
  options: { now?: string; timeZone?: string } = {}
) {
  const paymentRepository = createRepository(payments);
  const timeZone = options.timeZone ?? "UTC";
  const service = new PaymentQueryService({
    paymentRepository,
    clock: new FixedClock(options.now ?? "2023-05-15T12:00:00Z", timeZone),
    logger: createMockLogger(),
  });
  return { service, paymentRepository };
}

describe("PaymentQueryService", () => {
  describe("sorting", () => {
    it("should sort by date ascending", async () => {
      const { service } = createService();

      const result = await service.sortedByDateAscending();

      expect(result).toEqual([january, february, lateApril, earlyMay, midMay]);
    });

    it("should sort by date descending", async () => {
      const { service } = createService();

      const result = await service.sortedByDateDescending();

      expect(result).toEqual([midMay, earlyMay, lateApril, february, january]);
    });

    it("should mirror ascending and descending date order when dates are distinct", async () => {
      const { service } = createService();

      const ascending = await service.sortedByDateAscending();
      const descending = await service.sortedByDateDescending();

      expect([...ascending].reverse()).toEqual(descending);
    });

    it("should keep repository order for payments with the same date", async () => {
      const first = payment("2023-03-01T00:00:00Z", "x@y.com", []);
      const second = payment("2023-03-01T00:00:00Z", "z@y.com", []);
      const older = payment("2023-02-01T00:00:00Z", "x@y.com", []);
      const { service } = createService([first, second, older]);

      expect(await service.sortedByDateAscending()).toEqual([
        older,
        first,
        second,
      ]);
      const descending = await service.sortedByDateDescending();
      expect(descending[0]).toBe(first);
      expect(descending[1]).toBe(second);
      expect(descending[2]).toBe(older);
    });

    it("should sort by item count ascending keeping ties in repository order", async () => {
      const { service } = createService();

      const result = await service.sortedByItemCountAscending();

      expect(result).toEqual([lateApril, february, midMay, january, earlyMay]);
      expect(result[1]).toBe(february);
      expect(result[2]).toBe(midMay);
    });

    it("should sort by item count descending keeping ties in repository order", async () => {
      const { service } = createService();

      const result = await service.sortedByItemCountDescending();

      expect(result).toEqual([earlyMay, january, february, midMay, lateApril]);
      expect(result[2]).toBe(february);
      expect(result[3]).toBe(midMay);
    });

    it("should not reorder the repository snapshot", async () => {
      const snapshot = [...allPayments];
      const { service } = createService(snapshot);

      await service.sortedByDateDescending();

      expect(snapshot).toEqual(allPayments);
    });
  });

  describe("forMonth", () => {
    it("should return payments of the given month in repository order", async () => {
      const { service } = createService();

      const result = await service.forMonth(YearMonth.of(2023, 5));

      expect(result).toEqual([earlyMay, midMay]);
    });

    it("should return an empty list when no payment matches", async () => {
      const { service } = createService();

      expect(await service.forMonth(YearMonth.of(2023, 3))).toEqual([]);
    });

    it("should not match the same month of another year", async () => {
      const { service } = createService();

      expect(await service.forMonth(YearMonth.of(2022, 1))).toEqual([]);
    });

    it("should read a payment's month in the offset it was recorded with", async () => {
      const { service } = createService([febInItsOffset, janInItsOffset]);

      expect(await service.forMonth(YearMonth.of(2023, 1))).toEqual([
        janInItsOffset,
      ]);
      expect(await service.forMonth(YearMonth.of(2023, 2))).toEqual([
        febInItsOffset,
      ]);
    });

    it("should not depend on the clock's zone", async () => {
      const { service } = createService([febInItsOffset], {
        timeZone: "America/New_York",
      });

      expect(await service.forMonth(YearMonth.of(2023, 2))).toEqual([
        febInItsOffset,
      ]);
    });

    it("should match payments of years before 100", async () => {
      const ancient = payment("0050-03-10T00:00:00Z", "x@y.com", []);
      const { service } = createService([ancient]);

      expect(await service.forMonth(YearMonth.of(50, 3))).toEqual([ancient]);
    });
  });

  describe("forCurrentMonth", () => {
    it("should return payments of the clock's month", async () => {
      const { service } = createService();

      expect(await service.forCurrentMonth()).toEqual([earlyMay, midMay]);
    });

    it("should return an empty list for an empty repository", async () => {
      const { service } = createService([]);

      expect(await service.forCurrentMonth()).toEqual([]);
    });

    it("should take the current month in the clock's own zone", async () => {
      const lastOfMay = payment("2023-05-31T23:00:00Z", "x@y.com", []);
      const firstOfJune = payment("2023-06-01T00:15:00+02:00", "x@y.com", []);
      const { service } = createService([lastOfMay, firstOfJune], {
        now: "2023-05-31T23:30:00Z",
        timeZone: "Europe/Warsaw",
      });

      expect(await service.forCurrentMonth()).toEqual([firstOfJune]);
    });
  });

  describe("forLastDays", () => {
    it("should return payments after the cutoff day", async () => {
      const { service } = createService();

      expect(await service.forLastDays(14)).toEqual([earlyMay, midMay]);
    });

    it("should exclude a payment on the cutoff day itself", async () => {
      const { service } = createService();

      expect(await service.forLastDays(15)).toEqual([earlyMay, midMay]);
    });

    it("should include a payment one day after the cutoff", async () => {
      const { service } = createService();

      expect(await service.forLastDays(16)).toEqual([
        earlyMay,
        midMay,
        lateApril,
      ]);
    });

    it("should return nothing for a zero day window", async () => {
      const { service } = createService();

      expect(await service.forLastDays(0)).toEqual([]);
    });

    it("should only match the cutoff's year when the window crosses new year", async () => {
      const december = payment("2022-12-28T10:00:00Z", "x@y.com", []);
      const januaryNext = payment("2023-01-03T10:00:00Z", "x@y.com", []);
      const { service } = createService([december, januaryNext], {
        now: "2023-01-05T10:00:00Z",
      });

      expect(await service.forLastDays(10)).toEqual([december]);
    });

    it("should compare days of year in each payment's own offset", async () => {
      const { service } = createService([febInItsOffset, janInItsOffset], {
        now: "2023-03-10T12:00:00Z",
      });

      expect(await service.forLastDays(38)).toEqual([febInItsOffset]);
    });

    it("should reject a negative number of days", async () => {
      const { service, paymentRepository } = createService();

      await expect(service.forLastDays(-1)).rejects.toThrow(
        InvalidArgumentError
      );
      expect(paymentRepository.findAll).not.toHaveBeenCalled();
    });

    it("should reject a fractional number of days", async () => {
      const { service } = createService();

      await expect(service.forLastDays(1.5)).rejects.toThrow(
        "Expected a non-negative integer number of days, got 1.5"
      );
    });
  });

  describe("withExactlyOneItem", () => {
    it("should return every payment with a single item exactly once", async () => {
      const { service } = createService();

      const result = await service.withExactlyOneItem();

      expect(result.size).toBe(2);
      expect(result.has(february)).toBe(true);
      expect(result.has(midMay)).toBe(true);
    });

    it("should collapse repeated references to the same payment", async () => {
      const { service } = createService([february, february, january]);

      const result = await service.withExactlyOneItem();

      expect([...result]).toEqual([february]);
    });
  });

  describe("productNamesSoldInCurrentMonth", () => {
    it("should return distinct names from payments of the current month", async () => {
      const { service } = createService();

      const result = await service.productNamesSoldInCurrentMonth();

      expect([...result]).toEqual(["Lamp", "Book", "Mug"]);
    });

    it("should not include names from other months", async () => {
      const { service } = createService();

      const result = await service.productNamesSoldInCurrentMonth();

      expect(result.has("Pen")).toBe(false);
    });
  });

  describe("totals", () => {
    it("should sum final prices for a month", async () => {
      const { service } = createService();

      expect((await service.totalForMonth(YearMonth.of(2023, 1))).value).toBe(
        3000
      );
      expect((await service.totalForMonth(YearMonth.of(2023, 5))).value).toBe(
        6100
      );
    });

    it("should return zero total for a month without payments", async () => {
      const { service } = createService();

      expect((await service.totalForMonth(YearMonth.of(2023, 3))).value).toBe(
        0
      );
    });

    it("should sum per-item discounts for a month", async () => {
      const { service } = createService();

      expect(
        (await service.totalDiscountForMonth(YearMonth.of(2023, 1))).value
      ).toBe(700);
      expect(
        (await service.totalDiscountForMonth(YearMonth.of(2023, 5))).value
      ).toBe(1400);
    });

    it("should return zero discount for a month without payments", async () => {
      const { service } = createService();

      expect(
        (await service.totalDiscountForMonth(YearMonth.of(2023, 3))).value
      ).toBe(0);
    });

    it("should return zero for a matching payment without items", async () => {
      const { service } = createService([lateApril]);

      expect((await service.totalForMonth(YearMonth.of(2023, 4))).value).toBe(
        0
      );
    });

    it("should total a month by each payment's recorded offset", async () => {
      const { service } = createService([febInItsOffset, janInItsOffset]);

      expect((await service.totalForMonth(YearMonth.of(2023, 1))).value).toBe(
        600
      );
      expect((await service.totalForMonth(YearMonth.of(2023, 2))).value).toBe(
        300
      );
      expect(
        (await service.totalDiscountForMonth(YearMonth.of(2023, 2))).value
      ).toBe(100);
    });

    it("should keep cent precision", async () => {
      const { service } = createService([
        payment("2023-06-01T00:00:00Z", "x@y.com", [
          item("A", 0.1, 0.1),
          item("B", 0.2, 0.2),
        ]),
      ]);

      const total = await service.totalForMonth(YearMonth.of(2023, 6));

      expect(total.value).toBe(30);
      expect(total.toFloat()).toBe(0.3);
    });
  });

  describe("itemsForUserEmail", () => {
    it("should return items of every payment of the user", async () => {
      const { service } = createService();

      const result = await service.itemsForUserEmail("a@b.com");

      expect(result.map((i) => i.name)).toEqual([
        "Book",
        "Pen",
        "Lamp",
        "Book",
        "Mug",
      ]);
    });

    it("should match email case-sensitively", async () => {
      const { service } = createService();

      const result = await service.itemsForUserEmail("A@b.com");

      expect(result).toEqual(midMay.items);
    });

    it("should not match a partial email", async () => {
      const { service } = createService();

      expect(await service.itemsForUserEmail("a@b")).toEqual([]);
    });

    it("should treat an absent email as no match", async () => {
      const { service, paymentRepository } = createService();

      expect(await service.itemsForUserEmail(undefined)).toEqual([]);
      expect(await service.itemsForUserEmail(null)).toEqual([]);
      expect(paymentRepository.findAll).not.toHaveBeenCalled();
    });
  });

  describe("paymentsWithValueOver", () => {
    it("should include only payments strictly above the threshold", async () => {
      const { service } = createService();

      const result = await service.paymentsWithValueOver(25);

      expect([...result]).toEqual([january, earlyMay]);
    });

    it("should exclude a payment whose value equals the threshold", async () => {
      const { service } = createService();

      const result = await service.paymentsWithValueOver(30);

      expect([...result]).toEqual([earlyMay]);
    });

    it("should compare payments without items as zero", async () => {
      const { service } = createService([lateApril]);

      expect((await service.paymentsWithValueOver(0)).size).toBe(0);
      expect((await service.paymentsWithValueOver(-1)).size).toBe(1);
    });

    it("should reject a fractional threshold", async () => {
      const { service } = createService();

      await expect(service.paymentsWithValueOver(2.5)).rejects.toThrow(
        InvalidArgumentError
      );
    });
  });

  describe("two payment snapshot", () => {
    const p1 = payment("2023-01-15T10:00:00Z", "a@b.com", [
      item("A", 10, 10),
      item("B", 20, 20),
    ]);
    const p2 = payment("2023-02-15T10:00:00Z", "a@b.com", [item("C", 5, 5)]);

    it("should answer totals and thresholds", async () => {
      const { service } = createService([p1, p2]);

      expect((await service.totalForMonth(YearMonth.of(2023, 1))).value).toBe(
        3000
      );
      expect((await service.totalForMonth(YearMonth.of(2023, 3))).value).toBe(
        0
      );
      expect([...(await service.paymentsWithValueOver(25))]).toEqual([p1]);
      expect((await service.paymentsWithValueOver(30)).size).toBe(0);
    });
  });

  describe("collaborators", () => {
    it("should read the repository once per query", async () => {
      const { service, paymentRepository } = createService();

      await service.productNamesSoldInCurrentMonth();
      await service.totalDiscountForMonth(YearMonth.of(2023, 5));

      expect(paymentRepository.findAll).toHaveBeenCalledTimes(2);
    });

    it("should propagate repository failures unchanged", async () => {
      const failure = new Error("connection refused");
      const service = new PaymentQueryService({
        paymentRepository: { findAll: jest.fn().mockRejectedValue(failure) },
        clock: new FixedClock("2023-05-15T12:00:00Z"),
        logger: createMockLogger(),
      });

      await expect(service.forCurrentMonth()).rejects.toBe(failure);
    });

    it("should propagate clock failures unchanged", async () => {
      const failure = new Error("clock unavailable");
      const service = new PaymentQueryService({
        paymentRepository: createRepository(allPayments),
        clock: {
          now: () => {
            throw failure;
          },
        },
        logger: createMockLogger(),
      });

      await expect(service.forLastDays(3)).rejects.toBe(failure);
    });
  });
});
