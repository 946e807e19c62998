/**
 * Subscription, location, resource group and resource tools.
 */

import { Type } from "@sinclair/typebox";
import { defineTool, parseStringMap, type ToolDefinition } from "../../../../src/index.js";
import type { AzureServerState } from "../state.js";

const SERVICE = "resources";

const ResourceGroupName = Type.String({ minLength: 1, maxLength: 90 });

export function createResourceTools(state: AzureServerState): ToolDefinition[] {
  return [
    defineTool({
      name: "azure_list_subscriptions",
      label: "List Subscriptions",
      description: "Subscriptions visible to the current identity.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        const subscriptions = await (await state.resources()).listSubscriptions();
        return { subscriptions, count: subscriptions.length, current: state.credentials.getSubscriptionId() };
      },
    }),

    defineTool({
      name: "azure_get_subscription",
      label: "Get Subscription",
      description: "Details of a subscription (the current one when omitted).",
      service: SERVICE,
      parameters: Type.Object({ subscriptionId: Type.Optional(Type.String()) }),
      async run(params) {
        return { subscription: await (await state.resources()).getSubscription(params.subscriptionId || undefined) };
      },
    }),

    defineTool({
      name: "azure_list_locations",
      label: "List Locations",
      description: "Regions available to the subscription.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        const locations = await (await state.resources()).listLocations();
        return { locations, count: locations.length };
      },
    }),

    defineTool({
      name: "azure_list_resource_groups",
      label: "List Resource Groups",
      description: "Resource groups of the subscription.",
      service: SERVICE,
      parameters: Type.Object({ limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 1000 })) }),
      async run(params) {
        const result = await (await state.resources()).listResourceGroups(params.limit);
        return { resourceGroups: result.items, count: result.items.length, hasMore: result.hasMore };
      },
    }),

    defineTool({
      name: "azure_get_resource_group",
      label: "Get Resource Group",
      description: "Location, tags and state of a resource group.",
      service: SERVICE,
      parameters: Type.Object({ name: ResourceGroupName }),
      async run(params) {
        return { resourceGroup: await (await state.resources()).getResourceGroup(params.name) };
      },
    }),

    defineTool({
      name: "azure_create_resource_group",
      label: "Create Resource Group",
      description: "Create or update a resource group.",
      service: SERVICE,
      parameters: Type.Object({
        name: ResourceGroupName,
        location: Type.String({ minLength: 1, description: "e.g. eastus" }),
        tags: Type.Optional(Type.String({ description: 'JSON object, e.g. {"env":"dev"}' })),
      }),
      async run(params) {
        const tags = parseStringMap(params.tags, "tags");
        const resourceGroup = await (await state.resources()).createResourceGroup(params.name, params.location, tags);
        return { resourceGroup, message: `Resource group ${params.name} is ready in ${params.location}` };
      },
    }),

    defineTool({
      name: "azure_delete_resource_group",
      label: "Delete Resource Group",
      description: "Delete a resource group and everything in it. Waits for completion.",
      service: SERVICE,
      parameters: Type.Object({ name: ResourceGroupName }),
      async run(params) {
        await (await state.resources()).deleteResourceGroup(params.name);
        return { message: `Resource group ${params.name} deleted` };
      },
    }),

    defineTool({
      name: "azure_list_resources",
      label: "List Resources",
      description: "Resources of the subscription or of one resource group, optionally of one type.",
      service: SERVICE,
      parameters: Type.Object({
        resourceGroup: Type.Optional(Type.String()),
        resourceType: Type.Optional(Type.String({ description: "e.g. Microsoft.Web/sites" })),
        limit: Type.Integer({ minimum: 1, maximum: 5000, default: 500 }),
      }),
      async run(params) {
        const result = await (await state.resources()).listResources({
          resourceGroup: params.resourceGroup || undefined,
          resourceType: params.resourceType || undefined,
          limit: params.limit,
        });
        return { resources: result.items, count: result.items.length, hasMore: result.hasMore };
      },
    }),

    defineTool({
      name: "azure_get_resource_count_by_type",
      label: "Count Resources by Type",
      description: "Number of resources per resource type.",
      service: SERVICE,
      parameters: Type.Object({ resourceGroup: Type.Optional(Type.String()) }),
      async run(params) {
        return { ...(await (await state.resources()).countResourcesByType(params.resourceGroup || undefined)) };
      },
    }),
  ];
}
