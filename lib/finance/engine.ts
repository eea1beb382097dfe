import { formatPrice } from "../catalog/schema";

export const MIN_TERM_YEARS = 3;
export const MAX_TERM_YEARS = 6;

export type FinancingPlan = Readonly<{
  price: number;
  down_payment: number;
  annual_rate: number;
  financed_amount: number;
  monthly_payment: number;
  total_paid: number;
  total_interest: number;
  term_years: number;
  term_months: number;
}>;

export class FinancingValidationError extends Error {
  name = "FinancingValidationError";
}

export class InvalidTermError extends FinancingValidationError {
  name = "InvalidTermError";

  constructor(readonly termYears: number) {
    super(`Term must be a whole number of years between ${MIN_TERM_YEARS} and ${MAX_TERM_YEARS}, got ${termYears}`);
  }
}

export class InvalidDownPaymentError extends FinancingValidationError {
  name = "InvalidDownPaymentError";

  constructor(readonly downPayment: number, readonly price: number) {
    super(`Down payment ${downPayment} must be between 0 and the price ${price}`);
  }
}

export function isValidTerm(termYears: number): boolean {
  return Number.isInteger(termYears) && termYears >= MIN_TERM_YEARS && termYears <= MAX_TERM_YEARS;
}

/** Half-up to `decimals` places; toPrecision absorbs binary noise like 1.005 * 100 = 100.4999... */
export function roundHalfUp(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  const sign = value < 0 ? -1 : 1;
  return (sign * Math.round(Number((Math.abs(value) * factor).toPrecision(15)))) / factor;
}

/**
 * Fixed-rate amortization. Rejects (never clamps) an out-of-range term or a
 * down payment above the price. Monetary outputs are rounded to cents.
 */
export function calculateFinancing(
  price: number,
  downPayment: number,
  annualRate: number,
  termYears: number
): FinancingPlan {
  if (!isValidTerm(termYears)) throw new InvalidTermError(termYears);
  if (!Number.isFinite(price) || price < 0) {
    throw new FinancingValidationError(`Price must be a non-negative number, got ${price}`);
  }
  if (!Number.isFinite(annualRate) || annualRate < 0) {
    throw new FinancingValidationError(`Annual rate must be a non-negative number, got ${annualRate}`);
  }
  if (!Number.isFinite(downPayment) || downPayment < 0 || downPayment > price) {
    throw new InvalidDownPaymentError(downPayment, price);
  }

  const financed = price - downPayment;
  if (financed <= 0) {
    return {
      price,
      down_payment: downPayment,
      annual_rate: annualRate,
      financed_amount: 0,
      monthly_payment: 0,
      total_paid: roundHalfUp(downPayment),
      total_interest: 0,
      term_years: 0,
      term_months: 0,
    };
  }

  const n = termYears * 12;
  const r = annualRate / 12;
  const monthly = r === 0 ? financed / n : (r * financed) / (1 - Math.pow(1 + r, -n));

  return {
    price,
    down_payment: downPayment,
    annual_rate: annualRate,
    financed_amount: roundHalfUp(financed),
    monthly_payment: roundHalfUp(monthly),
    total_paid: roundHalfUp(monthly * n + downPayment),
    total_interest: r === 0 ? 0 : roundHalfUp(monthly * n - financed),
    term_years: termYears,
    term_months: n,
  };
}

const DOWN_PAYMENT_SHARES = [0.1, 0.2, 0.3] as const;

/**
 * Every 10/20/30% down x 3..6 year combination, cheapest monthly payment first
 * (shorter term wins a tie). `maxMonthlyPayment` drops plans above it.
 */
export function financingOptions(price: number, annualRate: number, maxMonthlyPayment?: number): FinancingPlan[] {
  const options: FinancingPlan[] = [];

  for (const share of DOWN_PAYMENT_SHARES) {
    for (let years = MIN_TERM_YEARS; years <= MAX_TERM_YEARS; years++) {
      const plan = calculateFinancing(price, roundHalfUp(price * share), annualRate, years);
      if (maxMonthlyPayment == null || plan.monthly_payment <= maxMonthlyPayment) options.push(plan);
    }
  }

  return options.sort((a, b) => a.monthly_payment - b.monthly_payment || a.term_months - b.term_months);
}

export function describePlan(plan: FinancingPlan, currency = "MXN"): string {
  const money = (n: number) => `$${n.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 })} ${currency}`;

  if (plan.financed_amount === 0) {
    return [
      `Car price: ${formatPrice(plan.price, currency)}`,
      `Down payment: ${money(plan.down_payment)}`,
      "Nothing left to finance: the down payment covers the full price.",
    ].join("\n");
  }

  return [
    `Car price: ${formatPrice(plan.price, currency)}`,
    `Down payment: ${money(plan.down_payment)}`,
    `Financed amount: ${money(plan.financed_amount)}`,
    `Term: ${plan.term_years} years (${plan.term_months} months)`,
    `Annual rate: ${roundHalfUp(plan.annual_rate * 100, 2)}%`,
    `Monthly payment: ${money(plan.monthly_payment)}`,
    `Total paid: ${money(plan.total_paid)}`,
    `Total interest: ${money(plan.total_interest)}`,
  ].join("\n");
}
