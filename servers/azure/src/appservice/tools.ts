/**
 * App Service tools: web apps, slots, settings and plans.
 */

import { Type } from "@sinclair/typebox";
import { defineTool, parseStringMap, type ToolDefinition } from "../../../../src/index.js";
import { Name, OptionalResourceGroup, ResourceGroup, SubscriptionId, optional } from "../params.js";
import type { AzureServerState } from "../state.js";

const SERVICE = "appservice";

const AppParams = {
  resourceGroup: ResourceGroup,
  name: Name("Web app name"),
  subscriptionId: SubscriptionId,
};

export function createAppServiceTools(state: AzureServerState): ToolDefinition[] {
  const lifecycle = (action: "start" | "stop" | "restart", verb: string) =>
    defineTool({
      name: `azure_${action}_web_app`,
      label: `${verb} Web App`,
      description: `${verb} a web app.`,
      service: SERVICE,
      parameters: Type.Object(AppParams),
      async run(params) {
        const manager = await state.appService(params.subscriptionId);
        if (action === "start") await manager.startWebApp(params.resourceGroup, params.name);
        else if (action === "stop") await manager.stopWebApp(params.resourceGroup, params.name);
        else await manager.restartWebApp(params.resourceGroup, params.name);
        return { name: params.name, action, message: `Web app ${params.name}: ${action} requested` };
      },
    });

  return [
    defineTool({
      name: "azure_list_web_apps",
      label: "List Web Apps",
      description: "Web apps and function apps of the subscription or a resource group.",
      service: SERVICE,
      parameters: Type.Object({ resourceGroup: OptionalResourceGroup, subscriptionId: SubscriptionId }),
      async run(params) {
        const webApps = await (await state.appService(params.subscriptionId)).listWebApps(optional(params.resourceGroup));
        return { webApps, count: webApps.length };
      },
    }),

    defineTool({
      name: "azure_get_web_app",
      label: "Get Web App",
      description: "State, host names and runtime configuration of a web app.",
      service: SERVICE,
      parameters: Type.Object(AppParams),
      async run(params) {
        return { webApp: await (await state.appService(params.subscriptionId)).getWebApp(params.resourceGroup, params.name) };
      },
    }),

    lifecycle("start", "Start"),
    lifecycle("stop", "Stop"),
    lifecycle("restart", "Restart"),

    defineTool({
      name: "azure_get_application_logs",
      label: "Get Application Logs",
      description:
        "Where a web app's application logs can be read: its diagnostic log settings, the Kudu log stream URL and a Log Analytics query for azure_query_logs.",
      service: SERVICE,
      parameters: Type.Object({ ...AppParams, hours: Type.Integer({ minimum: 1, maximum: 720, default: 24 }) }),
      async run(params) {
        return { logs: await (await state.appService(params.subscriptionId)).getApplicationLogs(params.resourceGroup, params.name, params.hours) };
      },
    }),

    defineTool({
      name: "azure_list_deployment_slots",
      label: "List Deployment Slots",
      description: "Deployment slots of a web app.",
      service: SERVICE,
      parameters: Type.Object(AppParams),
      async run(params) {
        const slots = await (await state.appService(params.subscriptionId)).listSlots(params.resourceGroup, params.name);
        return { name: params.name, slots, count: slots.length };
      },
    }),

    defineTool({
      name: "azure_start_slot",
      label: "Start Deployment Slot",
      description: "Start one deployment slot of a web app.",
      service: SERVICE,
      parameters: Type.Object({ ...AppParams, slot: Name("Slot name, e.g. staging") }),
      async run(params) {
        await (await state.appService(params.subscriptionId)).startSlot(params.resourceGroup, params.name, params.slot);
        return { name: params.name, slot: params.slot, action: "start", message: `Slot ${params.slot} of ${params.name}: start requested` };
      },
    }),

    defineTool({
      name: "azure_stop_slot",
      label: "Stop Deployment Slot",
      description: "Stop one deployment slot of a web app.",
      service: SERVICE,
      parameters: Type.Object({ ...AppParams, slot: Name("Slot name, e.g. staging") }),
      async run(params) {
        await (await state.appService(params.subscriptionId)).stopSlot(params.resourceGroup, params.name, params.slot);
        return { name: params.name, slot: params.slot, action: "stop", message: `Slot ${params.slot} of ${params.name}: stop requested` };
      },
    }),

    defineTool({
      name: "azure_swap_slots",
      label: "Swap Deployment Slots",
      description: "Swap two deployment slots, e.g. staging into production.",
      service: SERVICE,
      parameters: Type.Object({
        ...AppParams,
        sourceSlot: Name("Source slot, e.g. staging"),
        targetSlot: Type.String({ minLength: 1, default: "production" }),
      }),
      async run(params) {
        await (await state.appService(params.subscriptionId)).swapSlots(
          params.resourceGroup,
          params.name,
          params.sourceSlot,
          params.targetSlot,
        );
        return { message: `Swapped ${params.sourceSlot} with ${params.targetSlot} on ${params.name}` };
      },
    }),

    defineTool({
      name: "azure_get_app_settings",
      label: "Get App Settings",
      description: "Application settings of a web app.",
      service: SERVICE,
      parameters: Type.Object(AppParams),
      async run(params) {
        const settings = await (await state.appService(params.subscriptionId)).getAppSettings(params.resourceGroup, params.name);
        return { name: params.name, settings, count: Object.keys(settings).length };
      },
    }),

    defineTool({
      name: "azure_update_app_settings",
      label: "Update App Settings",
      description: "Set application settings. With merge=false the given settings replace all existing ones.",
      service: SERVICE,
      parameters: Type.Object({
        ...AppParams,
        settings: Type.String({ minLength: 2, description: 'JSON object, e.g. {"FEATURE_X":"on"}' }),
        merge: Type.Boolean({ default: true }),
      }),
      async run(params) {
        const settings = await (await state.appService(params.subscriptionId)).updateAppSettings(
          params.resourceGroup,
          params.name,
          parseStringMap(params.settings, "settings"),
          params.merge,
        );
        return { name: params.name, settings, count: Object.keys(settings).length };
      },
    }),

    defineTool({
      name: "azure_get_connection_strings",
      label: "Get Connection Strings",
      description: "Connection strings of a web app. Values are masked unless reveal is true.",
      service: SERVICE,
      parameters: Type.Object({ ...AppParams, reveal: Type.Boolean({ default: false }) }),
      async run(params) {
        const connectionStrings = await (await state.appService(params.subscriptionId)).getConnectionStrings(
          params.resourceGroup,
          params.name,
          params.reveal,
        );
        return { name: params.name, connectionStrings, count: connectionStrings.length, masked: !params.reveal };
      },
    }),

    defineTool({
      name: "azure_list_app_service_plans",
      label: "List App Service Plans",
      description: "App Service plans with SKU and app counts.",
      service: SERVICE,
      parameters: Type.Object({ resourceGroup: OptionalResourceGroup, subscriptionId: SubscriptionId }),
      async run(params) {
        const plans = await (await state.appService(params.subscriptionId)).listAppServicePlans(optional(params.resourceGroup));
        return { plans, count: plans.length };
      },
    }),

    defineTool({
      name: "azure_get_app_service_plan",
      label: "Get App Service Plan",
      description: "SKU, worker count and status of a plan.",
      service: SERVICE,
      parameters: Type.Object({ resourceGroup: ResourceGroup, name: Name("Plan name"), subscriptionId: SubscriptionId }),
      async run(params) {
        return { plan: await (await state.appService(params.subscriptionId)).getAppServicePlan(params.resourceGroup, params.name) };
      },
    }),

    defineTool({
      name: "azure_scale_app_service_plan",
      label: "Scale App Service Plan",
      description: "Set the number of workers of a plan.",
      service: SERVICE,
      parameters: Type.Object({
        resourceGroup: ResourceGroup,
        name: Name("Plan name"),
        capacity: Type.Integer({ minimum: 1, maximum: 100 }),
        subscriptionId: SubscriptionId,
      }),
      async run(params) {
        const plan = await (await state.appService(params.subscriptionId)).scaleAppServicePlan(
          params.resourceGroup,
          params.name,
          params.capacity,
        );
        return { plan, message: `Plan ${params.name} scaled to ${params.capacity} workers` };
      },
    }),
  ];
}
