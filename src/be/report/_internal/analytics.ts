import type { Order, SalesAnalytics } from "../api";

export const computeAnalytics = (orders: Order[]): SalesAnalytics => {
  const revenueByProduct = new Map<string, number>();
  let revenue = 0;

  for (const order of orders) {
    const amount = order.quantity * order.unitPrice;
    revenue += amount;
    revenueByProduct.set(order.productId, (revenueByProduct.get(order.productId) ?? 0) + amount);
  }

  let topProductId: string | null = null;
  let topRevenue = -1;
  for (const [productId, amount] of revenueByProduct) {
    if (amount > topRevenue) {
      topProductId = productId;
      topRevenue = amount;
    }
  }

  return {
    orderCount: orders.length,
    revenue,
    averageOrderValue: orders.length === 0 ? 0 : Math.round((revenue / orders.length) * 100) / 100,
    topProductId,
  };
};
