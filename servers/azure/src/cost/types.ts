/**
 * Azure Cost Management types.
 */

export type CostGranularity = "None" | "Daily" | "Monthly";

export type CostQueryOptions = {
  /** Month to date when no period is given. */
  from?: Date;
  to?: Date;
  granularity?: CostGranularity;
  groupBy?: string[];
};

export type CostReport = {
  from?: string;
  to?: string;
  granularity: CostGranularity;
  columns: string[];
  rows: Array<Record<string, unknown>>;
  /** Cost summed per currency. */
  totals: Record<string, number>;
};

export type BudgetNotification = {
  name: string;
  enabled: boolean;
  operator: string;
  threshold: number;
  contactEmails: string[];
};

export type Budget = {
  id: string;
  name: string;
  amount?: number;
  category?: string;
  timeGrain?: string;
  startDate?: string;
  endDate?: string;
  currentSpend?: number;
  forecastSpend?: number;
  unit?: string;
  percentUsed?: number;
  notifications: BudgetNotification[];
};
