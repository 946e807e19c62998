/**
 * Cost Management tools: usage, forecasts and budgets.
 */

import { Type } from "@sinclair/typebox";
import { defineTool, parseDate, parseOptionalDate, stringEnum, type ToolDefinition } from "../../../../src/index.js";
import { OptionalResourceGroup, SubscriptionId, optional } from "../params.js";
import type { AzureServerState } from "../state.js";

const SERVICE = "cost";

const Period = {
  from: Type.Optional(Type.String({ description: "Start date (ISO or relative, e.g. -30d); month to date when omitted" })),
  to: Type.Optional(Type.String({ description: "End date; required with from" })),
  subscriptionId: SubscriptionId,
};

const Days = Type.Integer({ minimum: 1, maximum: 365, default: 30 });

export function createCostTools(state: AzureServerState): ToolDefinition[] {
  return [
    defineTool({
      name: "azure_get_current_month_costs",
      label: "Get Current Month Costs",
      description: "Actual cost of the subscription for the month to date.",
      service: SERVICE,
      parameters: Type.Object({ subscriptionId: SubscriptionId }),
      async run(params) {
        return { costs: await (await state.cost(params.subscriptionId)).getCurrentMonthCosts() };
      },
    }),

    defineTool({
      name: "azure_get_costs_for_period",
      label: "Get Costs For Period",
      description: "Actual cost between two dates.",
      service: SERVICE,
      parameters: Type.Object({
        from: Type.String({ description: "Start date (ISO or relative, e.g. -30d)" }),
        to: Type.String({ default: "now" }),
        granularity: stringEnum(["None", "Daily", "Monthly"], { default: "None" }),
        subscriptionId: SubscriptionId,
      }),
      async run(params) {
        const manager = await state.cost(params.subscriptionId);
        return {
          costs: await manager.getCostsForPeriod(parseDate(params.from, "from"), parseDate(params.to, "to"), params.granularity),
        };
      },
    }),

    defineTool({
      name: "azure_get_costs_by_service",
      label: "Get Costs By Service",
      description: "Cost grouped by service name, highest first.",
      service: SERVICE,
      parameters: Type.Object(Period),
      async run(params) {
        const manager = await state.cost(params.subscriptionId);
        return {
          costs: await manager.getCostsByService(parseOptionalDate(params.from, "from"), parseOptionalDate(params.to, "to")),
        };
      },
    }),

    defineTool({
      name: "azure_get_costs_by_resource_group",
      label: "Get Costs By Resource Group",
      description: "Cost grouped by resource group, highest first.",
      service: SERVICE,
      parameters: Type.Object(Period),
      async run(params) {
        const manager = await state.cost(params.subscriptionId);
        return {
          costs: await manager.getCostsByResourceGroup(
            parseOptionalDate(params.from, "from"),
            parseOptionalDate(params.to, "to"),
          ),
        };
      },
    }),

    defineTool({
      name: "azure_get_daily_costs",
      label: "Get Daily Costs",
      description: "Daily cost for the last N days.",
      service: SERVICE,
      parameters: Type.Object({ days: Days, subscriptionId: SubscriptionId }),
      async run(params) {
        return { costs: await (await state.cost(params.subscriptionId)).getDailyCosts(params.days) };
      },
    }),

    defineTool({
      name: "azure_get_cost_forecast",
      label: "Get Cost Forecast",
      description: "Daily cost forecast for the next N days.",
      service: SERVICE,
      parameters: Type.Object({ days: Days, subscriptionId: SubscriptionId }),
      async run(params) {
        return { forecast: await (await state.cost(params.subscriptionId)).getForecast(params.days) };
      },
    }),

    defineTool({
      name: "azure_list_budgets",
      label: "List Budgets",
      description: "Budgets of the subscription or a resource group, with current spend.",
      service: SERVICE,
      parameters: Type.Object({ resourceGroup: OptionalResourceGroup, subscriptionId: SubscriptionId }),
      async run(params) {
        const budgets = await (await state.cost(params.subscriptionId)).listBudgets(optional(params.resourceGroup));
        return { budgets, count: budgets.length };
      },
    }),

    defineTool({
      name: "azure_get_budget",
      label: "Get Budget",
      description: "A budget with its notifications and percentage used.",
      service: SERVICE,
      parameters: Type.Object({
        name: Type.String({ minLength: 1 }),
        resourceGroup: OptionalResourceGroup,
        subscriptionId: SubscriptionId,
      }),
      async run(params) {
        return {
          budget: await (await state.cost(params.subscriptionId)).getBudget(params.name, optional(params.resourceGroup)),
        };
      },
    }),
  ];
}
