export type PortfolioRef = {
  id: number;
  name: string;
  initialValue: string; // fixed-point, 2 dp
  startDate: string;
};

export type PortfolioSummary = PortfolioRef & {
  totalAssets: number;
  weightsTotal: string; // Decimal string, ~1 for clean data
  assets: Array<{
    symbol: string;
    name: string;
    initialWeight: number; // 0..1 fraction
    initialQuantity: string; // Decimal string, "0" when never derived
  }>;
};

export type PortfolioListItem = PortfolioRef & {
  weights: Array<{
    symbol: string;
    weight: number;
    weightPercentage: number;
  }>;
};

export type MetricsPoint = {
  date: string;
  portfolioValue: string; // fixed-point, 2 dp
  weights: Record<string, number>;
  assetValues: Record<string, string>; // fixed-point, 2 dp
};

export type PortfolioMetrics = {
  portfolio: PortfolioRef;
  query: {
    portfolio_id: number;
    fecha_inicio: string;
    fecha_fin: string;
    total_days: number;
  };
  metrics: MetricsPoint[];
};

export type DerivedQuantities = {
  portfolio: PortfolioRef;
  holdings: Array<{
    symbol: string;
    weight: string;
    price: string;
    quantity: string;
    value: string;
  }>;
  totalValue: string;
  difference: string;
  warnings?: {
    noWeights?: boolean;
    missingPrices?: string[];
    reconciliation?: { expected: string; actual: string; difference: string };
  };
};

export type SetWeightsResult = {
  updated: number;
  skipped: string[];
  total: string;
  balanced: boolean;
};
