import { beforeAll, describe, expect, it } from "vitest";
import { ReplayConfig } from "../src/config/types.js";
import { formatReport, runReplay } from "../src/replay/index.js";
import { setLogLevel } from "../src/util/logging.js";
import { ArraySource, FakeTransport, makeEvent, ManualClock, respondWith } from "./helpers.js";

const config: ReplayConfig = {
  logFile: "/unused/slow.log",
  format: "slowlog",
  host: "localhost",
  port: 9200,
  speedMultiplier: 1,
  runTimeMinutes: 10
};

describe("runReplay", () => {
  beforeAll(() => {
    setLogLevel("error");
  });

  it("keeps pace with a healthy target for the whole budget", async () => {
    const clock = new ManualClock();
    const transport = new FakeTransport(clock, respondWith(200, { took: 1 }));
    const source = new ArraySource([makeEvent(0), makeEvent(1000), makeEvent(2000)]);

    const report = await runReplay(config, { clock, transport, source });

    // one pass is 2s long, so the first pass sends 3 and each later pass
    // repeats 2s on: 3 + 298 * 3 + 2 requests fit before the 600s mark
    expect(report.run_information).toMatchObject({
      run_time_minutes: 10,
      num_sent_requests: 899,
      num_cancelled_requests: 0,
      seconds_behind: 0,
      percentage_behind: 0
    });
    expect(report.run_information.average_requests_per_second).toBeCloseTo(899 / 600, 10);
    expect(report.accumulator_information).toEqual({
      completion_status_counts: { "200": 899 },
      successful_requests: 899,
      average_time_per_successful_request: 1,
      average_client_latency_ms: 1
    });
    expect(transport.closed).toBe(true);
  });

  it("closes the transport when the run fails", async () => {
    const clock = new ManualClock();
    const transport = new FakeTransport(clock, respondWith(200, { took: 1 }));

    await expect(runReplay(config, { clock, transport, source: new ArraySource([]) })).rejects.toThrow(
      "Request source memory produced no events"
    );
    expect(transport.closed).toBe(true);
  });

  it("formats the report with four-space indentation", () => {
    const text = formatReport({
      run_information: {
        run_time_minutes: 1,
        num_sent_requests: 2,
        average_requests_per_second: 2 / 60,
        num_outstanding_requests: 0,
        num_cancelled_requests: 0,
        seconds_behind: 0,
        percentage_behind: 0
      },
      accumulator_information: { completion_status_counts: { "200": 2 } }
    });

    expect(text.split("\n")[1]).toBe('    "run_information": {');
    expect(JSON.parse(text).accumulator_information).toEqual({ completion_status_counts: { "200": 2 } });
  });
});
