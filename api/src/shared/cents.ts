export class Cents {
  readonly value: number;

  private constructor(value: number) {
    this.value = value;
  }

  public static zero(): Cents {
    return new Cents(0);
  }

  public static fromFloat(value: number): Cents {
    return new Cents(Math.round(value * 100));
  }

  public static create(valueInCents: number): Cents {
    return new Cents(Math.round(valueInCents));
  }

  public add(other: Cents): Cents {
    return new Cents(this.value + other.value);
  }

  public subtract(other: Cents): Cents {
    return new Cents(this.value - other.value);
  }

  public isGreaterThan(other: Cents): boolean {
    return this.value > other.value;
  }

  public equals(other: Cents): boolean {
    return this.value === other.value;
  }

  public toFloat(): number {
    return this.value / 100.0;
  }

  public static sum(values: Cents[]): Cents {
    return values.reduce((total, value) => total.add(value), Cents.zero());
  }
}
