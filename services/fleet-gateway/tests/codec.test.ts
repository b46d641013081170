import { describe, expect, it } from "vitest";
import { ProtocolCodec, SequenceGuard } from "../src/core/codec";
import { ProtocolError } from "../src/core/errors";
import { fleetSubscriptions, parseTopic, parseVehicleId } from "../src/core/topics";
import { connectionFrame, stateFrame, topicFor } from "./support/frames";

const VEHICLE = "acme/agv-7";
const FIXED = new Date("2026-03-01T12:00:00.000Z");

function decodeError(fn: () => unknown): ProtocolError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ProtocolError) return err;
    throw err;
  }
  throw new Error("expected a ProtocolError");
}

const NODES = [
  { nodeId: "n1", sequenceId: 0, released: true, actions: [] },
  { nodeId: "n2", sequenceId: 2, released: true, actions: [] }
];
const EDGES = [{ edgeId: "n1--n2", sequenceId: 1, released: true, startNodeId: "n1", endNodeId: "n2", actions: [] }];

describe("topics", () => {
  it("splits a topic under a multi-segment interface name", () => {
    expect(parseTopic("uagv/v2", "uagv/v2/acme/agv-7/state")).toEqual({
      manufacturer: "acme",
      serialNumber: "agv-7",
      segment: "state",
      vehicleId: "acme/agv-7"
    });
  });

  it("rejects topics outside the namespace or with the wrong depth", () => {
    expect(parseTopic("uagv/v2", "other/v2/acme/agv-7/state")).toBeNull();
    expect(parseTopic("uagv/v2", "uagv/v2/acme/state")).toBeNull();
    expect(parseTopic("uagv/v2", "uagv/v2/acme/agv-7/state/extra")).toBeNull();
  });

  it("parses vehicle ids", () => {
    expect(parseVehicleId("acme/agv-7")).toEqual({ manufacturer: "acme", serialNumber: "agv-7" });
    expect(parseVehicleId("acme")).toBeNull();
    expect(parseVehicleId("acme/")).toBeNull();
  });

  it("subscribes with single-level wildcards", () => {
    expect(fleetSubscriptions("uagv/v2")).toEqual([
      "uagv/v2/+/+/state",
      "uagv/v2/+/+/connection",
      "uagv/v2/+/+/visualization",
      "uagv/v2/+/+/factsheet"
    ]);
  });
});

describe("ProtocolCodec.decode", () => {
  const codec = new ProtocolCodec("uagv/v2");

  it("decodes a state frame and fills schema defaults", () => {
    const decoded = codec.decode(topicFor(VEHICLE, "state"), JSON.stringify(stateFrame(VEHICLE, 4)));
    expect(decoded.kind).toBe("state");
    expect(decoded.vehicleId).toBe(VEHICLE);
    if (decoded.kind !== "state") return;
    expect(decoded.message.headerId).toBe(4);
    expect(decoded.message.driving).toBe(false);
    expect(decoded.message.nodeStates).toEqual([]);
    expect(decoded.message.batteryState.batteryCharge).toBe(80);
  });

  it("decodes connection frames from a Buffer", () => {
    const decoded = codec.decode(
      topicFor(VEHICLE, "connection"),
      Buffer.from(JSON.stringify(connectionFrame(VEHICLE, 1, "CONNECTIONBROKEN")))
    );
    expect(decoded.kind).toBe("connection");
    if (decoded.kind !== "connection") return;
    expect(decoded.message.connectionState).toBe("CONNECTIONBROKEN");
  });

  it("passes unknown segments through untouched", () => {
    const decoded = codec.decode(topicFor(VEHICLE, "factsheet"), JSON.stringify({ typeSpecification: {} }));
    expect(decoded.kind).toBe("unknown");
    if (decoded.kind !== "unknown") return;
    expect(decoded.segment).toBe("factsheet");
    expect(decoded.payload).toEqual({ typeSpecification: {} });
  });

  it("classifies each kind of bad frame", () => {
    expect(decodeError(() => codec.decode("elsewhere/acme/agv-7/state", "{}")).reason).toBe("topic");
    expect(decodeError(() => codec.decode(topicFor(VEHICLE, "state"), "{not json")).reason).toBe("json");

    const missingBattery = { ...stateFrame(VEHICLE, 1), batteryState: undefined };
    expect(decodeError(() => codec.decode(topicFor(VEHICLE, "state"), JSON.stringify(missingBattery))).reason).toBe(
      "schema"
    );

    const impostor = stateFrame("acme/agv-8", 1);
    const err = decodeError(() => codec.decode(topicFor(VEHICLE, "state"), JSON.stringify(impostor)));
    expect(err.reason).toBe("identity");
    expect(err.message).toBe("Payload identity acme/agv-8 does not match topic acme/agv-7");
  });
});

describe("ProtocolCodec.encode", () => {
  it("builds an order frame with header fields", () => {
    const codec = new ProtocolCodec("uagv/v2", () => FIXED);
    const frame = codec.encode({ manufacturer: "acme", serialNumber: "agv-7", orderId: "o-1", nodes: NODES, edges: EDGES });

    expect(frame.topic).toBe("uagv/v2/acme/agv-7/order");
    expect(frame.payload).toMatchObject({
      headerId: 0,
      timestamp: "2026-03-01T12:00:00.000Z",
      version: "2.0.0",
      manufacturer: "acme",
      serialNumber: "agv-7",
      orderId: "o-1",
      orderUpdateId: 0
    });
    expect(JSON.parse(frame.body)).toEqual(frame.payload);
  });

  it("counts headerIds per vehicle and topic", () => {
    const codec = new ProtocolCodec("uagv/v2", () => FIXED);
    const target = { manufacturer: "acme", serialNumber: "agv-7" };
    const action = { actionType: "cancelOrder", actionId: "a1", blockingType: "HARD" as const, actionParameters: [] };

    expect(codec.encode({ ...target, orderId: "o-1", nodes: NODES, edges: EDGES }).payload.headerId).toBe(0);
    expect(codec.encode({ ...target, orderId: "o-2", nodes: NODES, edges: EDGES }).payload.headerId).toBe(1);
    expect(codec.encodeInstantActions(target, [action]).payload.headerId).toBe(0);
    expect(
      codec.encode({ manufacturer: "acme", serialNumber: "agv-8", orderId: "o-3", nodes: NODES, edges: EDGES }).payload
        .headerId
    ).toBe(0);
  });

  it("increments orderUpdateId for repeated orders and rejects going backwards", () => {
    const codec = new ProtocolCodec();
    const draft = { manufacturer: "acme", serialNumber: "agv-7", orderId: "o-1", nodes: NODES, edges: EDGES };

    expect(codec.encode(draft).payload.orderUpdateId).toBe(0);
    expect(codec.encode(draft).payload.orderUpdateId).toBe(1);
    expect(codec.encode({ ...draft, orderUpdateId: 5 }).payload.orderUpdateId).toBe(5);

    const err = decodeError(() => codec.encode({ ...draft, orderUpdateId: 5 }));
    expect(err.reason).toBe("sequence");
    expect(err.message).toBe("orderUpdateId 5 for o-1 must exceed 5");
  });

  it("gives back a reserved orderUpdateId", () => {
    const codec = new ProtocolCodec();
    const draft = { manufacturer: "acme", serialNumber: "agv-7", orderId: "o-1", nodes: NODES, edges: EDGES };

    codec.encode(draft);
    codec.encode(draft);
    codec.releaseOrderUpdate("o-1", 1);
    expect(codec.lastOrderUpdateId("o-1")).toBe(0);

    codec.releaseOrderUpdate("o-1", 0);
    expect(codec.lastOrderUpdateId("o-1")).toBeUndefined();
  });

  it("reproduces a decoded order when encoding it again", () => {
    const inbound = {
      headerId: 0,
      timestamp: FIXED.toISOString(),
      version: "2.0.0",
      manufacturer: "acme",
      serialNumber: "agv-7",
      orderId: "o-7",
      orderUpdateId: 3,
      zoneSetId: "hall-a",
      nodes: [
        {
          nodeId: "n1",
          sequenceId: 0,
          released: true,
          nodePosition: { x: 1.5, y: -2, theta: 0.5, mapId: "hall-a" },
          actions: [
            {
              actionType: "pick",
              actionId: "pick-1",
              blockingType: "HARD",
              actionParameters: [{ key: "stationType", value: "floor" }]
            }
          ]
        },
        { nodeId: "n2", sequenceId: 2, released: false, actions: [] }
      ],
      edges: [
        { edgeId: "n1--n2", sequenceId: 1, released: false, startNodeId: "n1", endNodeId: "n2", maxSpeed: 1.2, actions: [] }
      ]
    };
    const decoded = new ProtocolCodec("uagv/v2").decode(topicFor(VEHICLE, "order"), JSON.stringify(inbound));
    if (decoded.kind !== "order") throw new Error(`decoded as ${decoded.kind}`);
    const { message } = decoded;

    const frame = new ProtocolCodec("uagv/v2", () => FIXED).encode({
      manufacturer: message.manufacturer,
      serialNumber: message.serialNumber,
      orderId: message.orderId,
      orderUpdateId: message.orderUpdateId,
      zoneSetId: message.zoneSetId,
      nodes: message.nodes,
      edges: message.edges
    });

    expect(frame.topic).toBe(topicFor(VEHICLE, "order"));
    expect(frame.payload).toEqual(inbound);
  });

  it("forgets the orderUpdateId history of an order", () => {
    const codec = new ProtocolCodec();
    const draft = { manufacturer: "acme", serialNumber: "agv-7", orderId: "o-1", nodes: NODES, edges: EDGES };
    codec.encode(draft);
    codec.encode({ ...draft, orderId: "o-2" });

    codec.forgetOrder("o-1");

    expect(codec.lastOrderUpdateId("o-1")).toBeUndefined();
    expect(codec.trackedOrders).toBe(1);
    expect(codec.encode(draft).payload.orderUpdateId).toBe(0);
  });

  it("refuses an order without nodes", () => {
    const codec = new ProtocolCodec();
    const err = decodeError(() =>
      codec.encode({ manufacturer: "acme", serialNumber: "agv-7", orderId: "o-1", nodes: [], edges: [] })
    );
    expect(err.reason).toBe("schema");
  });
});

describe("SequenceGuard", () => {
  it("drops frames at or below the last accepted headerId", () => {
    const guard = new SequenceGuard();
    expect(guard.check(VEHICLE, "state", 5)).toEqual({ accepted: true, last: undefined });
    expect(guard.check(VEHICLE, "state", 5)).toEqual({ accepted: false, last: 5 });
    expect(guard.check(VEHICLE, "state", 3)).toEqual({ accepted: false, last: 5 });
    expect(guard.check(VEHICLE, "state", 6)).toEqual({ accepted: true, last: 5 });
  });

  it("keeps separate baselines per topic and vehicle", () => {
    const guard = new SequenceGuard();
    guard.check(VEHICLE, "state", 10);
    expect(guard.check(VEHICLE, "visualization", 1).accepted).toBe(true);
    expect(guard.check("acme/agv-8", "state", 1).accepted).toBe(true);
  });

  it("clears every baseline of a vehicle on fullResync", () => {
    const guard = new SequenceGuard();
    guard.check(VEHICLE, "state", 10);
    guard.check(VEHICLE, "visualization", 10);

    expect(guard.check(VEHICLE, "state", 0, true).accepted).toBe(true);
    expect(guard.check(VEHICLE, "visualization", 1).accepted).toBe(true);
  });
});
