import { describe, it, expect } from "vitest";
import { ConcurrencyGate } from "./concurrency-gate.js";

/** Let pending promise callbacks run */
const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("ConcurrencyGate", () => {
  it.each([0, -1, 1.5])("rejects limit %j", (limit) => {
    expect(() => new ConcurrencyGate(limit)).toThrow(RangeError);
  });

  it("hands out slots up to the limit immediately", async () => {
    const gate = new ConcurrencyGate(2);
    await gate.acquire();
    await gate.acquire();

    expect(gate.inFlight).toBe(2);
    expect(gate.waiting).toBe(0);
  });

  it("queues callers beyond the limit until a slot is released", async () => {
    const gate = new ConcurrencyGate(1);
    const release = await gate.acquire();

    let acquired = false;
    const pending = gate.acquire().then((r) => {
      acquired = true;
      return r;
    });
    await flush();
    expect(acquired).toBe(false);
    expect(gate.waiting).toBe(1);

    release();
    await pending;
    expect(acquired).toBe(true);
    expect(gate.inFlight).toBe(1);
    expect(gate.waiting).toBe(0);
  });

  it("serves waiters in arrival order", async () => {
    const gate = new ConcurrencyGate(1);
    const first = await gate.acquire();
    const order: number[] = [];

    const second = gate.acquire().then((r) => {
      order.push(2);
      return r;
    });
    const third = gate.acquire().then((r) => {
      order.push(3);
      return r;
    });

    first();
    const releaseSecond = await second;
    await flush();
    expect(order).toEqual([2]);

    releaseSecond();
    const releaseThird = await third;
    expect(order).toEqual([2, 3]);

    releaseThird();
    expect(gate.inFlight).toBe(0);
  });

  it("ignores repeated releases", async () => {
    const gate = new ConcurrencyGate(2);
    const release = await gate.acquire();
    await gate.acquire();

    release();
    release();
    expect(gate.inFlight).toBe(1);
  });
});
