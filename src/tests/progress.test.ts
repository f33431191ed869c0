import { StructuredLogger, type LogEntry } from "../logger.js";
import { LoggerProgressReporter, describeProgress } from "../progress.js";

describe("progress", () => {
  test("connection lines", () => {
    expect(describeProgress({ host: "mon0", phase: "connecting", status: "pending" })).toBe(
      `Host: ${"mon0".padEnd(20)}  connection: [connecting]`,
    );
    expect(describeProgress({ host: "mon0", phase: "connecting", status: "failure" })).toBe(
      `Host: ${"mon0".padEnd(20)}  connection: [failed]`,
    );
  });

  test("collection lines", () => {
    expect(describeProgress({ host: "osd0", phase: "paths", status: "pending" })).toBe(
      `Host: ${"osd0".padEnd(20)}  collecting: [paths]`,
    );
    expect(describeProgress({ host: "osd0", phase: "ceph", status: "success" })).toBe(
      `Host: ${"osd0".padEnd(20)}  collecting: [ceph] done`,
    );
  });

  test("failures are logged as warnings", () => {
    const entries: LogEntry[] = [];
    const reporter = new LoggerProgressReporter(
      new StructuredLogger({ sink: (e) => entries.push(e) }),
    );
    reporter.notify("mon0", "connecting", "success");
    reporter.notify("mon1", "connecting", "failure");
    expect(entries.map((e) => e.level)).toEqual(["info", "warn"]);
    expect(entries[1].message).toBe(`Host: ${"mon1".padEnd(20)}  connection: [failed]`);
  });
});
