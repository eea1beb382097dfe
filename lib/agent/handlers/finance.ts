import { formatPrice } from "../../catalog/schema";
import type { VehicleRecord } from "../../catalog/schema";
import type { CatalogStore } from "../../catalog/store";
import { calculateFinancing, describePlan, isValidTerm } from "../../finance/engine";
import type { FinancingPlan } from "../../finance/engine";
import { FinanceExtractionSchema, parseModelJson } from "../modelSchema";
import type { FinanceExtraction } from "../modelSchema";
import { financeExtractionPrompt, financePhrasingPrompt, withSystem } from "../prompts";
import type { ResponseTemplates } from "../responses";
import type { Handler, HandlerResult, TextGeneration } from "../schema";

export type FinanceHandlerDeps = {
  generation: TextGeneration;
  catalog: CatalogStore;
  responses: ResponseTemplates;
  annualRate: number;
  defaultTermYears: number;
  currency: string;
};

export function createFinanceHandler(deps: FinanceHandlerDeps): Handler {
  const money = (n: number) => formatPrice(n, deps.currency);

  async function phrase(plan: FinancingPlan, query: string, history: string): Promise<string> {
    const summary = describePlan(plan, deps.currency);
    try {
      return await deps.generation.complete(withSystem(financePhrasingPrompt(summary), query, history));
    } catch (e) {
      console.warn("[finance] phrasing failed, returning plan summary:", e instanceof Error ? e.message : e);
      return summary;
    }
  }

  async function plan(params: FinanceExtraction, query: string, history: string): Promise<HandlerResult> {
    const downPayment = params.down_payment;
    if (downPayment === undefined) {
      return { text: deps.responses.render("finance_missing_down_payment") };
    }

    let price = params.price;
    let car: VehicleRecord | undefined;
    if (price === undefined) {
      if (!params.car_name) return { text: deps.responses.render("finance_missing_price") };

      car = deps.catalog.byName(params.car_name);
      if (!car) {
        return {
          text: deps.responses.render("finance_car_not_found", {
            car_name: params.car_name,
            down_payment: money(downPayment),
          }),
        };
      }
      price = car.price;
    }

    let termYears = params.term_years;
    if (termYears === undefined || !isValidTerm(termYears)) {
      console.info(`[finance] term ${termYears ?? "missing"}, using ${deps.defaultTermYears} years`);
      termYears = deps.defaultTermYears;
    }

    if (downPayment > price) {
      return {
        text: deps.responses.render("finance_down_payment_exceeds_price", {
          down_payment: money(downPayment),
          price: money(price),
        }),
      };
    }

    const financing = calculateFinancing(price, downPayment, deps.annualRate, termYears);
    console.info(`[finance] monthly payment ${financing.monthly_payment} over ${financing.term_months} months`);

    return {
      text: await phrase(financing, query, history),
      financing_plan: financing,
      ...(car && { cars: [car] }),
    };
  }

  return {
    intent: "FINANCE_CALCULATION",
    async handle({ query, history }) {
      try {
        const raw = await deps.generation.complete(withSystem(financeExtractionPrompt(), query, history));
        return await plan(parseModelJson(raw, FinanceExtractionSchema), query, history);
      } catch (e) {
        console.error("[finance] could not build a plan:", e instanceof Error ? e.message : e);
        return { text: deps.responses.render("finance_recovery") };
      }
    },
  };
}
