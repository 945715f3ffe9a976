import { describe, expect, it } from "vitest";
import { createMetrics, type MetricRecord } from "../src/metrics";

describe("createMetrics", () => {
  it("emits counters with default value and tags", () => {
    const records: MetricRecord[] = [];
    const metrics = createMetrics({ service: "ingest", emit: (record) => records.push(record), now: () => 7 });

    metrics.count("ingest.rows_rejected", undefined, { reason: "range" });

    expect(records).toEqual([
      {
        name: "ingest.rows_rejected",
        type: "counter",
        value: 1,
        tags: { reason: "range" },
        service: "ingest",
        ts: 7
      }
    ]);
  });

  it("records elapsed time from startTimer", () => {
    const records: MetricRecord[] = [];
    const clock = [100, 135, 135];
    const metrics = createMetrics({
      emit: (record) => records.push(record),
      now: () => clock.shift() ?? 0
    });

    const stop = metrics.startTimer("query.execute_ms");
    const elapsed = stop();

    expect(elapsed).toBe(35);
    expect(records[0]?.type).toBe("timing");
    expect(records[0]?.value).toBe(35);
  });
});
