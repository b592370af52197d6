export type Order = {
  id: string;
  customerId: string;
  productId: string;
  quantity: number;
  unitPrice: number;
  placedAt: string;
};

export type Product = {
  id: string;
  name: string;
  stock: number;
};

export type SalesAnalytics = {
  orderCount: number;
  revenue: number;
  averageOrderValue: number;
  topProductId: string | null;
};

export type Forecast = {
  nextPeriodRevenue: number;
  basis: number;
};

export type ReportContext = {
  userId: string | null;
};

export interface ISalesRepository {
  listOrders(customerId?: string | null): Promise<Order[]>;
  listProducts(): Promise<Product[]>;
  /** Simulates an expensive projection; honours the abort signal. */
  forecast(orders: Order[], signal: AbortSignal): Promise<Forecast>;
}
