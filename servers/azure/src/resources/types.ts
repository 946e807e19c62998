/**
 * Azure Resource Manager types.
 */

export type AzureSubscription = {
  subscriptionId: string;
  displayName?: string;
  state?: string;
  tenantId?: string;
};

export type AzureLocation = {
  name: string;
  displayName?: string;
  regionalDisplayName?: string;
  regionType?: string;
};

export type ResourceGroup = {
  id: string;
  name: string;
  location: string;
  tags?: Record<string, string>;
  provisioningState?: string;
  managedBy?: string;
};

export type GenericResource = {
  id: string;
  name: string;
  type: string;
  resourceGroup: string;
  location?: string;
  kind?: string;
  sku?: { name?: string; tier?: string; capacity?: number };
  tags?: Record<string, string>;
  provisioningState?: string;
  createdTime?: string;
  changedTime?: string;
};

export type ResourceTypeCount = {
  type: string;
  count: number;
};
