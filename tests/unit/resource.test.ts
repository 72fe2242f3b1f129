/**
 * Unit tests for shutdown ordering.
 */

import pino from "pino";
import { closeAll, type Resource } from "../../src/resource";

class Tracked implements Resource {
  constructor(private readonly name: string, private readonly order: string[], private readonly error?: Error) {}

  async start(): Promise<void> {}

  async close(): Promise<void> {
    this.order.push(this.name);
    if (this.error) throw this.error;
  }
}

describe("closeAll", () => {
  it("closes in reverse order and keeps going past a failing close", async () => {
    const lines: string[] = [];
    const log = pino({ base: null, timestamp: false }, { write: (line: string) => void lines.push(line) });
    const order: string[] = [];
    const resources = [
      new Tracked("sink", order),
      new Tracked("serial", order, new Error("port busy")),
      new Tracked("worker", order),
    ];

    await closeAll(resources, log);

    expect(order).toEqual(["worker", "serial", "sink"]);
    expect(lines.map((l) => JSON.parse(l))).toEqual([
      { level: 40, event: "RESOURCE_CLOSE_FAILED", err: "port busy", msg: "Resource failed to close" },
    ]);
  });
});
