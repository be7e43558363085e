import { defineGroup } from "../src/suite";

type Order = {
  id: string;
  lines: Array<{ sku: string; quantity: number }>;
  total: number;
};

const placeOrder = (id: string, quantities: Record<string, number>): Order => {
  const lines = Object.entries(quantities).map(([sku, quantity]) => ({ sku, quantity }));
  return { id, lines, total: lines.reduce((sum, line) => sum + line.quantity * 5, 0) };
};

const arithmetic = defineGroup("arithmetic", (test) => {
  test("adds", async ({ autoAssert }) => {
    await autoAssert(2 + 2);
  });

  test("formats", async ({ autoAssert }) => {
    await autoAssert((1234.5).toFixed(2));
  });
});

const orders = defineGroup("orders", (test) => {
  test("places an order", async ({ autoAssert }) => {
    await autoAssert(placeOrder("A-1", { apple: 2, pear: 1 }));
  });

  test("collects skus", async ({ autoAssert }) => {
    const order = placeOrder("A-2", { plum: 3 });
    await autoAssert(new Set(order.lines.map((line) => line.sku)));
  });
});

export const groups = [arithmetic, orders];
