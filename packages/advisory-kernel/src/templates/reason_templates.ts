// Advisory Kernel - Reason templates (v1)
//
// One sentence per decision, always carrying the computed numbers.

import type { IsoDate } from "@bhoomi/contracts";
import type { ReasonTemplateIdV1 } from "../ruleset/types";

export type ReasonFactsV1 = {
  quantity: number;
  current_price: number;
  peak_price: number;
  current_total_value: number;
  future_total_value: number;
  profit_delta: number;
  profit_percentage: number;
  min_gain_pct: number;
  days_to_peak: number;
  peak_date: IsoDate;
};

export function formatRupees(v: number): string {
  const abs = Math.abs(v).toFixed(2);
  return v < 0 ? `-₹${abs}` : `₹${abs}`;
}

function pct(v: number): string {
  return `${v.toFixed(2)}%`;
}

function qtl(v: number): string {
  return `${v.toFixed(2)} quintals`;
}

function horizon(f: ReasonFactsV1): string {
  return f.days_to_peak === 0 ? "the current peak window" : `${f.peak_date} (${f.days_to_peak} days)`;
}

export function renderReasonV1(templateId: ReasonTemplateIdV1, f: ReasonFactsV1): string {
  switch (templateId) {
    case "ZERO_YIELD":
      return `Predicted yield is ${qtl(f.quantity)}, so storing cannot add value (${pct(f.profit_percentage)} gain). Sell whatever produce remains now.`;
    case "URGENT_CASH":
      return `Urgent cash need: sell ${qtl(f.quantity)} now for ${formatRupees(f.current_total_value)}. Waiting until ${horizon(f)} could change the value by ${formatRupees(f.profit_delta)} (${pct(f.profit_percentage)}).`;
    case "NO_COLD_STORAGE":
      return `No cold storage available: sell ${qtl(f.quantity)} now for ${formatRupees(f.current_total_value)}. Holding until ${horizon(f)} for a ${pct(f.profit_percentage)} change (${formatRupees(f.profit_delta)}) needs storage.`;
    case "INSUFFICIENT_GAIN":
      return `Expected gain of ${pct(f.profit_percentage)} (${formatRupees(f.profit_delta)}) by ${horizon(f)} is below the ${pct(f.min_gain_pct)} threshold. Sell ${qtl(f.quantity)} now for ${formatRupees(f.current_total_value)}.`;
    case "STORE_FOR_PEAK":
      return `Store ${qtl(f.quantity)} and sell around ${horizon(f)}: expected ${formatRupees(f.future_total_value)} at ${formatRupees(f.peak_price)}/quintal versus ${formatRupees(f.current_total_value)} today, a gain of ${formatRupees(f.profit_delta)} (${pct(f.profit_percentage)}).`;
    default: {
      // Exhaustiveness guard.
      const _never: never = templateId;
      throw new Error(`UNKNOWN_TEMPLATE_ID: ${String(_never)}`);
    }
  }
}
