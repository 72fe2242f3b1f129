import { getLastTurnMetrics, recordTurnMetrics } from "../../../src/metrics";
import { formatTurnMetrics } from "../../../src/main";

describe("turn metrics", () => {
  it("keeps a copy of the last record", () => {
    recordTurnMetrics({ turnId: "t1", source: "typed", outcome: "completed", firstChunkMs: 420, totalMs: 2100, winner: "primary" });
    const last = getLastTurnMetrics();
    expect(last).toEqual({ turnId: "t1", source: "typed", outcome: "completed", firstChunkMs: 420, totalMs: 2100, winner: "primary" });
    if (last) last.totalMs = 1;
    expect(getLastTurnMetrics()?.totalMs).toBe(2100);
  });

  it("formats the last record for /stats", () => {
    expect(formatTurnMetrics(null)).toBe("No turns yet.");
    expect(
      formatTurnMetrics({ turnId: "t2", source: "voice", outcome: "completed", sttLatencyMs: 300, firstChunkMs: 900, totalMs: 4000, winner: "secondary" })
    ).toBe("Last turn (voice, completed): winner=secondary\n  stt 300 ms, first token -, first audio 900 ms, total 4000 ms");
  });
});
