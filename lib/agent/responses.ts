import { readFile } from "node:fs/promises";
import path from "node:path";

export const RESPONSE_KEYS = [
  "general_unavailable",
  "catalog_unavailable",
  "catalog_no_matches",
  "finance_missing_down_payment",
  "finance_missing_price",
  "finance_car_not_found",
  "finance_down_payment_exceeds_price",
  "finance_recovery",
  "pipeline_failure",
] as const;

export type ResponseKey = (typeof RESPONSE_KEYS)[number];

/**
 * Fixed user-facing replies, kept out of code so wording can change without a deploy.
 * File format: "## key" headings, body is the template, "{name}" placeholders.
 */
export class ResponseTemplates {
  private constructor(private readonly templates: ReadonlyMap<ResponseKey, string>) {}

  static fromMarkdown(markdown: string): ResponseTemplates {
    const found = new Map<string, string>();
    for (const chunk of markdown.replace(/\r\n/g, "\n").split(/^## /m).slice(1)) {
      const [key, ...rest] = chunk.split("\n");
      found.set(key.trim(), rest.join("\n").trim());
    }

    const templates = new Map<ResponseKey, string>();
    const missing: string[] = [];
    for (const key of RESPONSE_KEYS) {
      const body = found.get(key);
      if (body) templates.set(key, body);
      else missing.push(key);
    }
    if (missing.length) throw new Error(`Response templates missing: ${missing.join(", ")}`);

    return new ResponseTemplates(templates);
  }

  static async load(filePath: string): Promise<ResponseTemplates> {
    const resolved = path.resolve(process.cwd(), filePath);
    return ResponseTemplates.fromMarkdown(await readFile(resolved, "utf8"));
  }

  /** Unknown placeholders are left as written. */
  render(key: ResponseKey, vars: Record<string, string | number> = {}): string {
    const template = this.templates.get(key) ?? "";
    return template.replace(/\{(\w+)\}/g, (whole, name: string) => (name in vars ? String(vars[name]) : whole));
  }
}
