import { KeyedMutex } from "../concurrency";

describe("KeyedMutex", () => {
  it("returns the section's result and clears the key afterwards", async () => {
    const mutex = new KeyedMutex();
    const pending = mutex.run("a", async () => 42);
    expect(mutex.activeKeys).toBe(1);

    await expect(pending).resolves.toBe(42);
    expect(mutex.activeKeys).toBe(0);
  });

  it("runs queued sections in arrival order", async () => {
    const mutex = new KeyedMutex();
    const order: number[] = [];
    const delays = [30, 10, 0];

    await Promise.all(delays.map((ms, i) =>
      mutex.run("a", async () => {
        await new Promise((resolve) => setTimeout(resolve, ms));
        order.push(i);
      }),
    ));

    expect(order).toEqual([0, 1, 2]);
    expect(mutex.activeKeys).toBe(0);
  });
});
