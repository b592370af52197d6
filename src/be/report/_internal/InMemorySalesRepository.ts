import { setTimeout as sleep } from "node:timers/promises";
import type { Forecast, ISalesRepository, Order, Product } from "../api";

export type SalesData = {
  orders: Order[];
  products: Product[];
};

export class InMemorySalesRepository implements ISalesRepository {
  constructor(
    private readonly data: SalesData,
    private readonly forecastLatencyMs: number = 0,
  ) {}

  async listOrders(customerId?: string | null): Promise<Order[]> {
    if (!customerId) return [...this.data.orders];
    return this.data.orders.filter((order) => order.customerId === customerId);
  }

  async listProducts(): Promise<Product[]> {
    return [...this.data.products];
  }

  async forecast(orders: Order[], signal: AbortSignal): Promise<Forecast> {
    if (this.forecastLatencyMs > 0) {
      await sleep(this.forecastLatencyMs, undefined, { signal });
    }
    const basis = orders.reduce((sum, order) => sum + order.quantity * order.unitPrice, 0);
    // Naive projection: flat 10% growth
    return { nextPeriodRevenue: Math.round(basis * 1.1 * 100) / 100, basis };
  }
}
