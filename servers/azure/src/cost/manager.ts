/**
 * Azure Cost Management Manager
 *
 * Usage queries and forecasts via @azure/arm-costmanagement, budgets via
 * @azure/arm-consumption.
 */

import type { Budget as SdkBudget } from "@azure/arm-consumption";
import type { QueryResult } from "@azure/arm-costmanagement";
import { NotFoundError, ToolInputError } from "../../../../src/index.js";
import { collectAll } from "../pagination.js";
import { getOrNull, withAzureRetry } from "../retry.js";
import { iso, type AzureCredentialProvider, type AzureRetryOptions } from "../types.js";
import type { Budget, CostGranularity, CostQueryOptions, CostReport } from "./types.js";

const DAY_MS = 86_400_000;
const COST_COLUMNS = ["Cost", "PreTaxCost", "CostUSD"];

const AGGREGATION = { totalCost: { name: "Cost", function: "Sum" } };

/**
 * Turn column/row arrays into objects keyed by column name and sum the cost
 * column per currency.
 */
export function toCostReport(
  result: QueryResult,
  granularity: CostGranularity,
  period?: { from: Date; to: Date },
): CostReport {
  const columns = (result.columns ?? []).map((c, i) => c.name ?? `column${i}`);
  const rowValues: unknown[][] = result.rows ?? [];
  const rows = rowValues.map((values) => Object.fromEntries(columns.map((name, i) => [name, values[i]])));

  const costColumn = columns.find((name) => COST_COLUMNS.includes(name));
  const totals: Record<string, number> = {};
  if (costColumn) {
    for (const row of rows) {
      const amount = Number(row[costColumn]);
      if (Number.isNaN(amount)) continue;
      const currency = typeof row.Currency === "string" && row.Currency ? row.Currency : "unknown";
      totals[currency] = Math.round(((totals[currency] ?? 0) + amount) * 100) / 100;
    }
  }

  return { from: period && iso(period.from), to: period && iso(period.to), granularity, columns, rows, totals };
}

function sortByCost(report: CostReport): CostReport {
  const costColumn = report.columns.find((name) => COST_COLUMNS.includes(name));
  if (!costColumn) return report;
  const rows = [...report.rows].sort((a, b) => Number(b[costColumn]) - Number(a[costColumn]));
  return { ...report, rows };
}

function mapBudget(budget: SdkBudget): Budget {
  const current = budget.currentSpend?.amount;
  return {
    id: budget.id ?? "",
    name: budget.name ?? "",
    amount: budget.amount,
    category: budget.category,
    timeGrain: budget.timeGrain,
    startDate: iso(budget.timePeriod?.startDate),
    endDate: iso(budget.timePeriod?.endDate),
    currentSpend: current,
    forecastSpend: budget.forecastSpend?.amount,
    unit: budget.currentSpend?.unit,
    percentUsed:
      current !== undefined && budget.amount ? Math.round((current / budget.amount) * 10_000) / 100 : undefined,
    notifications: Object.entries(budget.notifications ?? {}).map(([name, n]) => ({
      name,
      enabled: n.enabled,
      operator: n.operator,
      threshold: n.threshold,
      contactEmails: n.contactEmails,
    })),
  };
}

function checkDays(days: number): void {
  if (!Number.isInteger(days) || days < 1 || days > 365) {
    throw new ToolInputError("days must be an integer between 1 and 365", { field: "days" });
  }
}

export class AzureCostManager {
  private credentials: AzureCredentialProvider;
  private subscriptionId: string;
  private retryOptions?: AzureRetryOptions;

  constructor(credentials: AzureCredentialProvider, subscriptionId: string, retryOptions?: AzureRetryOptions) {
    this.credentials = credentials;
    this.subscriptionId = subscriptionId;
    this.retryOptions = retryOptions;
  }

  private get scope(): string {
    return `/subscriptions/${this.subscriptionId}`;
  }

  private async getCostClient() {
    const { CostManagementClient } = await import("@azure/arm-costmanagement");
    const { credential } = await this.credentials.getCredential();
    return new CostManagementClient(credential);
  }

  private async getConsumptionClient() {
    const { ConsumptionManagementClient } = await import("@azure/arm-consumption");
    const { credential } = await this.credentials.getCredential();
    return new ConsumptionManagementClient(credential, this.subscriptionId);
  }

  async queryCosts(options: CostQueryOptions = {}): Promise<CostReport> {
    const { from, to } = options;
    if ((from === undefined) !== (to === undefined)) {
      throw new ToolInputError("from and to must be given together", { field: from ? "to" : "from" });
    }
    if (from && to && from >= to) {
      throw new ToolInputError("from must be before to", { field: "from" });
    }
    const granularity = options.granularity ?? "None";
    const grouping = (options.groupBy ?? []).map((name) => ({ type: "Dimension", name }));
    const period = from && to ? { from, to } : undefined;

    const client = await this.getCostClient();
    const result = await withAzureRetry(
      () =>
        client.query.usage(this.scope, {
          type: "ActualCost",
          timeframe: period ? "Custom" : "MonthToDate",
          timePeriod: period,
          dataset: {
            granularity,
            aggregation: AGGREGATION,
            grouping: grouping.length > 0 ? grouping : undefined,
          },
        }),
      this.retryOptions,
    );
    return toCostReport(result, granularity, period);
  }

  getCurrentMonthCosts(): Promise<CostReport> {
    return this.queryCosts();
  }

  getCostsForPeriod(from: Date, to: Date, granularity: CostGranularity = "None"): Promise<CostReport> {
    return this.queryCosts({ from, to, granularity });
  }

  async getCostsByService(from?: Date, to?: Date): Promise<CostReport> {
    return sortByCost(await this.queryCosts({ from, to, groupBy: ["ServiceName"] }));
  }

  async getCostsByResourceGroup(from?: Date, to?: Date): Promise<CostReport> {
    return sortByCost(await this.queryCosts({ from, to, groupBy: ["ResourceGroupName"] }));
  }

  getDailyCosts(days = 30): Promise<CostReport> {
    checkDays(days);
    const to = new Date();
    return this.queryCosts({ from: new Date(to.getTime() - days * DAY_MS), to, granularity: "Daily" });
  }

  /** Daily forecast for the next `days` days. */
  async getForecast(days = 30): Promise<CostReport> {
    checkDays(days);
    const from = new Date();
    const to = new Date(from.getTime() + days * DAY_MS);
    const client = await this.getCostClient();
    const result = await withAzureRetry(
      () =>
        client.forecast.usage(this.scope, {
          type: "ActualCost",
          timeframe: "Custom",
          timePeriod: { from, to },
          dataset: { granularity: "Daily", aggregation: AGGREGATION },
          includeActualCost: false,
          includeFreshPartialCost: false,
        }),
      this.retryOptions,
    );
    return toCostReport(result, "Daily", { from, to });
  }

  private budgetScope(resourceGroup?: string): string {
    return resourceGroup ? `${this.scope}/resourceGroups/${resourceGroup}` : this.scope;
  }

  async listBudgets(resourceGroup?: string): Promise<Budget[]> {
    const client = await this.getConsumptionClient();
    return withAzureRetry(
      () => collectAll(client.budgets.list(this.budgetScope(resourceGroup)), mapBudget),
      this.retryOptions,
    );
  }

  async getBudget(name: string, resourceGroup?: string): Promise<Budget> {
    const client = await this.getConsumptionClient();
    const budget = await getOrNull(() => client.budgets.get(this.budgetScope(resourceGroup), name), this.retryOptions);
    if (!budget) throw new NotFoundError("Budget", name);
    return mapBudget(budget);
  }
}
