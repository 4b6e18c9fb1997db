import { parseDataset, parseEngineConfig, type EngineConfigInput } from "@ip-valuation/engine";
import { createToolContext, type ToolContext } from "../src/context.js";

function period(label: string, revenue: number, netIncome: number, taxExpense: number) {
  return {
    period_label: label,
    revenue,
    gross_profit: revenue * 0.6,
    operating_income: revenue * 0.25,
    net_income: netIncome,
    r_and_d_expense: revenue * 0.12,
    tax_expense: taxExpense,
    interest_expense: 10,
    total_debt: 200,
    total_assets: 2000,
    total_equity: 1000,
    cash: 150,
    shares_outstanding: 100,
  };
}

export const TEST_DATASET = parseDataset({
  companies: {
    ACME: {
      name: "Acme Instruments",
      snapshot: { price: 10, market_cap: 800 },
      statements: [
        period("FY2024", 1100, 200, 50),
        period("FY2023", 1000, 180, 45),
        period("FY2022", 1000, 160, 40),
      ],
      segments: [
        { period_label: "FY2024", segments: [{ label: "Cloud", revenue: 440 }, { label: "Devices", revenue: 660 }] },
        { period_label: "FY2023", segments: [{ label: "Cloud", revenue: 400 }, { label: "Devices", revenue: 600 }] },
        { period_label: "FY2022", segments: [{ label: "Cloud", revenue: 380 }, { label: "Devices", revenue: 620 }] },
      ],
    },
  },
});

export function testContext(config: EngineConfigInput = {}): ToolContext {
  return createToolContext(TEST_DATASET, parseEngineConfig(config));
}

export const ASSUMPTIONS = { wacc: 0.095, tax_rate: 0.21, terminal_growth: 0.025 };

/** Parse the JSON body of a tool result. */
export function bodyOf(result: { content: Array<{ type: "text"; text: string }> }): unknown {
  return JSON.parse(result.content[0].text);
}
