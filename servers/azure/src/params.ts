/**
 * Parameter schemas shared by the Azure tools.
 */

import { Type } from "@sinclair/typebox";

export const SubscriptionId = Type.Optional(
  Type.String({ description: "Subscription id; defaults to the configured or first visible subscription" }),
);

export const ResourceGroup = Type.String({ minLength: 1, description: "Resource group name" });

export const OptionalResourceGroup = Type.Optional(Type.String({ description: "Limit to one resource group" }));

export const Name = (description: string) => Type.String({ minLength: 1, description });

/** Empty strings from loosely typed callers count as "not given". */
export function optional(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}
