import { describe, it, expect } from "vitest";
import { createSnapshot, mentionsLine, toRecord } from "../normalize.js";
import { FetchFailure } from "../../errors.js";

const line = { id: "29", name: "Harbour Express" };

describe("mentionsLine", () => {
  it("matches the id as a whole word", () => {
    expect(mentionsLine("Bus 29 is delayed", line)).toBe(true);
    expect(mentionsLine("29: cancelled", line)).toBe(true);
    expect(mentionsLine("Lines 28/29 affected", line)).toBe(true);
  });

  it("does not match the id inside a longer number", () => {
    expect(mentionsLine("Bus 129 is delayed", line)).toBe(false);
    expect(mentionsLine("Bus 290 is delayed", line)).toBe(false);
  });

  it("matches the name case-insensitively", () => {
    expect(mentionsLine("HARBOUR EXPRESS replaced by taxis", line)).toBe(true);
  });
});

describe("toRecord", () => {
  it("drops empty id and details", () => {
    expect(toRecord({ id: "", header: "Delay", details: "" })).toEqual({
      header: "Delay",
      activePeriods: [],
    });
  });
});

describe("createSnapshot", () => {
  const capturedAt = new Date("2026-03-01T08:00:00.000Z");

  it("keeps the first record for a repeated id", () => {
    const snapshot = createSnapshot(
      "test",
      [
        toRecord({ id: "A", header: "first" }),
        toRecord({ id: "A", header: "second" }),
        toRecord({ id: "B", header: "other" }),
      ],
      capturedAt,
    );

    expect(snapshot.capturedAt).toBe("2026-03-01T08:00:00.000Z");
    expect(snapshot.records.map((r) => r.header)).toEqual(["first", "other"]);
  });

  it("keeps every record without an id", () => {
    const snapshot = createSnapshot("test", [toRecord({ header: "a" }), toRecord({ header: "a" })], capturedAt);
    expect(snapshot.records).toHaveLength(2);
  });

  it("wraps schema failures in FetchFailure", () => {
    const bogus = { header: "x", activePeriods: [{ start: "" }] };
    try {
      createSnapshot("test", [bogus], capturedAt);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(FetchFailure);
      expect(err).toMatchObject({ reason: "payload", source: "test" });
    }
  });
});
