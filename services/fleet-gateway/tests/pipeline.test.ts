import { describe, expect, it } from "vitest";
import type { FrameOutcome } from "@fleet-link/metrics";
import { ProtocolCodec, SequenceGuard } from "../src/core/codec";
import type { OrderStateReport } from "../src/core/mission-dispatcher";
import { IngestPipeline } from "../src/core/pipeline";
import { TelemetryStore } from "../src/core/telemetry-store";
import { connectionFrame, stateFrame, topicFor } from "./support/frames";

const VEHICLE = "acme/agv-7";

function setup(errorBufferSize?: number) {
  let clock = 10_000;
  const store = new TelemetryStore();
  const reports: Array<{ vehicleId: string; report: OrderStateReport }> = [];
  const frames: string[] = [];
  const decodeErrors: string[] = [];
  const pipeline = new IngestPipeline({
    codec: new ProtocolCodec("uagv/v2"),
    guard: new SequenceGuard(),
    store,
    dispatcher: { handleState: (vehicleId, report) => reports.push({ vehicleId, report }) },
    metrics: {
      recordFrame: (topic: string, outcome: FrameOutcome) => frames.push(`${topic}:${outcome}`),
      recordDecodeError: (reason) => decodeErrors.push(reason)
    },
    now: () => clock,
    errorBufferSize
  });
  const send = (segment: string, payload: unknown) =>
    pipeline.handle(topicFor(VEHICLE, segment), typeof payload === "string" ? payload : JSON.stringify(payload));
  return {
    pipeline,
    store,
    reports,
    frames,
    decodeErrors,
    send,
    advance: (ms: number) => {
      clock += ms;
    }
  };
}

describe("IngestPipeline", () => {
  it("stores an accepted state frame and hands it to the dispatcher", () => {
    const { pipeline, store, reports, frames, send } = setup();

    send("state", stateFrame(VEHICLE, 1, { orderId: "job-1", orderUpdateId: 2, batteryCharge: 64 }));

    const record = store.get(VEHICLE);
    expect(record).toMatchObject({ connectionState: "ONLINE", lastSeenAt: 10_000, lastHeaderId: 1 });
    expect(record?.state).toMatchObject({ batteryCharge: 64, orderId: "job-1", orderUpdateId: 2, lastNodeId: "dock" });
    expect(store.events(VEHICLE, "state")).toHaveLength(1);
    expect(store.events(VEHICLE, "state")[0]).toMatchObject({ receivedAt: 10_000, headerId: 1 });
    expect(reports).toHaveLength(1);
    expect(reports[0].vehicleId).toBe(VEHICLE);
    expect(reports[0].report).toMatchObject({ orderId: "job-1", orderUpdateId: 2, errors: [] });
    expect(frames).toEqual(["state:accepted"]);
    expect(pipeline.stats().counters).toEqual({
      received: 1,
      accepted: 1,
      duplicates: 0,
      decodeErrors: 0,
      unknownTopics: 0
    });
  });

  it("drops replayed frames", () => {
    const { pipeline, store, reports, frames, send, advance } = setup();
    send("state", stateFrame(VEHICLE, 5));
    advance(1_000);
    send("state", stateFrame(VEHICLE, 5));
    send("state", stateFrame(VEHICLE, 4));

    expect(store.get(VEHICLE)?.lastSeenAt).toBe(10_000);
    expect(reports).toHaveLength(1);
    expect(frames).toEqual(["state:accepted", "state:duplicate", "state:duplicate"]);
    expect(pipeline.stats().counters.duplicates).toBe(2);
  });

  it("accepts a lower headerId after a fullResync", () => {
    const { store, send } = setup();
    send("state", stateFrame(VEHICLE, 40));
    send("state", stateFrame(VEHICLE, 0, { fullResync: true, batteryCharge: 99 }));
    expect(store.get(VEHICLE)?.state?.batteryCharge).toBe(99);
  });

  it("records malformed frames without throwing", () => {
    const { pipeline, store, frames, decodeErrors, send } = setup();
    const topic = topicFor(VEHICLE, "state");

    expect(() => send("state", "{oops")).not.toThrow();

    expect(store.get(VEHICLE)).toBeUndefined();
    expect(decodeErrors).toEqual(["json"]);
    expect(frames).toEqual(["state:decode_error"]);
    const stats = pipeline.stats();
    expect(stats.counters).toMatchObject({ received: 1, decodeErrors: 1, accepted: 0 });
    expect(stats.recentErrors).toHaveLength(1);
    expect(stats.recentErrors[0]).toMatchObject({
      at: new Date(10_000).toISOString(),
      message: `Malformed JSON on ${topic}`,
      meta: { topic, reason: "json" }
    });
  });

  it("counts schema failures under their reason", () => {
    const { decodeErrors, send } = setup();
    send("state", { ...stateFrame(VEHICLE, 1), operatingMode: "DANCING" });
    send("connection", connectionFrame("acme/agv-8", 1, "ONLINE"));
    expect(decodeErrors).toEqual(["schema", "identity"]);
  });

  it("counts topics outside the namespace and unknown segments", () => {
    const { pipeline, store, frames, send } = setup();
    pipeline.handle("factory/line-3/temp", "{}");
    send("factsheet", { typeSpecification: {} });

    expect(frames).toEqual(["unknown:unknown_topic", "factsheet:unknown_topic"]);
    expect(pipeline.stats().counters.unknownTopics).toBe(2);
    expect(pipeline.stats().recentErrors.map((error) => error.message)).toEqual([
      "Topic outside namespace uagv/v2: factory/line-3/temp"
    ]);
    expect(store.size).toBe(0);
  });

  it("applies connection and visualization frames", () => {
    const { store, send } = setup();
    send("state", stateFrame(VEHICLE, 1));
    send("visualization", {
      headerId: 1,
      timestamp: "2026-01-05T08:00:01.000Z",
      version: "2.0.0",
      manufacturer: "acme",
      serialNumber: "agv-7",
      agvPosition: { x: 4, y: 5, theta: 0.5, mapId: "hall-a" },
      velocity: { vx: 1.2 }
    });
    expect(store.get(VEHICLE)?.state?.position).toEqual({ x: 4, y: 5, theta: 0.5, mapId: "hall-a" });
    expect(store.get(VEHICLE)?.velocity).toEqual({ vx: 1.2 });

    send("connection", connectionFrame(VEHICLE, 1, "OFFLINE"));
    expect(store.get(VEHICLE)).toMatchObject({ reportedConnection: "OFFLINE", connectionState: "OFFLINE" });
    expect(store.eventTopics(VEHICLE)).toEqual(["connection", "state", "visualization"]);
  });

  it("keeps only the newest errors", () => {
    const { pipeline, send } = setup(2);
    send("state", "{1");
    send("state", "{2");
    send("state", "{3");
    expect(pipeline.stats().recentErrors).toHaveLength(2);
    expect(pipeline.stats().counters.decodeErrors).toBe(3);
  });
});
