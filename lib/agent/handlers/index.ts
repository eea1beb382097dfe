import type { HandlerTable } from "../schema";
import { createCatalogHandler } from "./catalog";
import type { CatalogHandlerDeps } from "./catalog";
import { createFinanceHandler } from "./finance";
import type { FinanceHandlerDeps } from "./finance";
import { createGeneralHandler } from "./general";
import type { GeneralHandlerDeps } from "./general";

export { createCatalogHandler, createFinanceHandler, createGeneralHandler };
export type { CatalogHandlerDeps, FinanceHandlerDeps, GeneralHandlerDeps };

export function createHandlerTable(deps: {
  general: GeneralHandlerDeps;
  catalog: CatalogHandlerDeps;
  finance: FinanceHandlerDeps;
}): HandlerTable {
  return {
    GENERAL: createGeneralHandler(deps.general),
    CATALOG_SEARCH: createCatalogHandler(deps.catalog),
    FINANCE_CALCULATION: createFinanceHandler(deps.finance),
  };
}
