import { afterEach, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import type { Database } from "@fleet-link/database";
import { Registry } from "@fleet-link/metrics";
import { loadGatewayConfig } from "../src/core/config";
import type { FleetLink } from "../src/core/fleet-link";
import { openGatewayDatabase } from "../src/db/connection";
import { OPERATOR_HEADER } from "../src/routes/saved-routes";
import { buildGateway } from "../src/server";
import { BROKER, stateFrame, topicFor } from "./support/frames";
import { FakeBroker } from "./support/fake-broker";

const VEHICLE = "acme/agv-7";
const ORDER_ID = /^ORDER-\d{8}-\d{6}-s\d+$/;

interface Harness {
  app: FastifyInstance;
  fleet: FleetLink;
  broker: FakeBroker;
  db: Database;
}

let harness: Harness | null = null;

async function setup(env: NodeJS.ProcessEnv = {}, keepAlive = false): Promise<Harness> {
  const broker = new FakeBroker();
  const db = await openGatewayDatabase(":memory:");
  let suffix = 0;
  const { app, fleet } = await buildGateway({
    config: loadGatewayConfig({ FLEET_KEEP_ALIVE: String(keepAlive), ...env }),
    db,
    credentialKey: Buffer.alloc(32, 7),
    transportFactory: broker.factory,
    logger: false,
    registry: new Registry(),
    collectDefaultMetrics: false,
    orderIdSuffix: () => {
      suffix += 1;
      return `s${suffix}`;
    }
  });
  harness = { app, fleet, broker, db };
  return harness;
}

/** Stores broker settings, opens the session and lets one vehicle report in. */
async function connectedWithVehicle(env: NodeJS.ProcessEnv = {}): Promise<Harness> {
  const h = await setup(env);
  await h.app.inject({ method: "PUT", url: "/config", payload: BROKER });
  await h.fleet.acquire();
  h.broker.current.emit(topicFor(VEHICLE, "state"), stateFrame(VEHICLE, 1));
  return h;
}

afterEach(async () => {
  if (harness) {
    await harness.app.close();
    await harness.db.close();
    harness = null;
  }
});

describe("fleet-gateway service", () => {
  it("reports status without touching the broker", async () => {
    const { app, broker } = await setup();

    const response = await app.inject({ method: "GET", url: "/status" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      initialized: false,
      leases: 0,
      session: { state: "DISCONNECTED" },
      health: { status: "HEALTHY" },
      vehicles: { ONLINE: 0, STALE: 0, OFFLINE: 0 }
    });
    expect(broker.attempts).toHaveLength(0);
  });

  it("serves liveness, readiness and metrics", async () => {
    const { app } = await setup();

    expect((await app.inject({ method: "GET", url: "/health" })).json()).toMatchObject({
      status: "healthy",
      service: "fleet-gateway"
    });

    const ready = await app.inject({ method: "GET", url: "/ready" });
    expect(ready.statusCode).toBe(200);
    expect(ready.json()).toMatchObject({
      status: "degraded",
      checks: {
        database: { status: "healthy" },
        broker: { status: "unhealthy", message: "Broker session DISCONNECTED" }
      }
    });

    const metrics = await app.inject({ method: "GET", url: "/metrics" });
    expect(metrics.statusCode).toBe(200);
    expect(metrics.body).toContain('fleetlink_connection_state{state="DISCONNECTED"} 1');
  });

  it("holds a lease for the server's lifetime when keep-alive is on", async () => {
    const { app, fleet, broker } = await setup({ BROKER_HOST: "127.0.0.1" }, true);

    await app.ready();

    expect(fleet.leaseCount).toBe(1);
    expect(broker.attempts).toHaveLength(1);
    expect(fleet.connection.state.get()).toBe("CONNECTED");
  });

  describe("config", () => {
    it("stores broker settings and never returns the password", async () => {
      const { app } = await setup();

      const put = await app.inject({ method: "PUT", url: "/config", payload: BROKER });
      expect(put.statusCode).toBe(200);
      expect(put.json().broker).toEqual({
        host: "127.0.0.1",
        port: 1883,
        useTls: false,
        username: "fleet",
        clientId: "fleet-link-test",
        keepaliveSeconds: 60,
        passwordSet: true
      });

      const get = await app.inject({ method: "GET", url: "/config" });
      expect(get.json()).toMatchObject({
        interfaceName: "uagv/v2",
        mapServiceKeySet: false,
        broker: { stored: { host: "127.0.0.1", passwordSet: true }, effective: { host: "127.0.0.1" } }
      });
      expect(get.body).not.toContain("test-secret");
    });

    it("keeps the stored password when an update omits it", async () => {
      const { app, fleet } = await setup();
      await app.inject({ method: "PUT", url: "/config", payload: BROKER });

      await app.inject({ method: "PUT", url: "/config", payload: { host: "10.0.0.9", clientId: "fleet-link-test" } });

      expect(await fleet.resolveConfig()).toMatchObject({ host: "10.0.0.9", password: "test-secret" });
    });

    it("rejects a malformed body", async () => {
      const { app } = await setup();
      const response = await app.inject({ method: "PUT", url: "/config", payload: { host: "", clientId: "x" } });
      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe("Invalid broker config");
    });

    it("shows why no broker is usable yet", async () => {
      const { app } = await setup();
      const response = await app.inject({ method: "GET", url: "/config" });
      expect(response.json().broker).toEqual({
        stored: null,
        effective: null,
        error: "No broker configured: store one via PUT /config or set BROKER_HOST"
      });
    });
  });

  describe("connection", () => {
    it("reconnects on demand", async () => {
      const { app, broker } = await setup();
      await app.inject({ method: "PUT", url: "/config", payload: BROKER });

      const response = await app.inject({ method: "POST", url: "/connection/reconnect" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        session: { state: "CONNECTED", brokerUrl: "mqtt://127.0.0.1:1883" },
        health: { status: "HEALTHY" }
      });
      expect(broker.current.subscriptions).toContain("uagv/v2/+/+/state");

      const session = await app.inject({ method: "GET", url: "/connection" });
      expect(session.json().session.state).toBe("CONNECTED");
    });
  });

  describe("vehicles", () => {
    it("lists and describes reporting vehicles", async () => {
      const { app } = await connectedWithVehicle();

      const list = await app.inject({ method: "GET", url: "/vehicles" });
      expect(list.json()).toHaveLength(1);
      expect(list.json()[0]).toMatchObject({ vehicleId: VEHICLE, connectionState: "ONLINE" });

      expect((await app.inject({ method: "GET", url: "/vehicles?state=offline" })).json()).toEqual([]);
      expect((await app.inject({ method: "GET", url: "/vehicles?state=lost" })).statusCode).toBe(400);

      const detail = await app.inject({ method: "GET", url: "/vehicles/acme/agv-7" });
      expect(detail.json()).toMatchObject({ vehicleId: VEHICLE, manufacturer: "acme", topics: ["state"] });

      expect((await app.inject({ method: "GET", url: "/vehicles/acme/agv-99" })).statusCode).toBe(404);
    });

    it("returns the recent events of a topic", async () => {
      const { app, broker } = await connectedWithVehicle();
      broker.current.emit(topicFor(VEHICLE, "state"), stateFrame(VEHICLE, 2));

      const all = await app.inject({ method: "GET", url: "/vehicles/acme/agv-7/events" });
      expect(all.json().events.map((event: { headerId: number }) => event.headerId)).toEqual([1, 2]);

      const latest = await app.inject({ method: "GET", url: "/vehicles/acme/agv-7/events?topic=state&limit=1" });
      expect(latest.json()).toMatchObject({ vehicleId: VEHICLE, topic: "state" });
      expect(latest.json().events).toHaveLength(1);
      expect(latest.json().events[0].headerId).toBe(2);

      expect((await app.inject({ method: "GET", url: "/vehicles/acme/agv-7/events?limit=0" })).statusCode).toBe(400);
    });
  });

  describe("missions", () => {
    it("dispatches text input, cancels and retries", async () => {
      const { app, broker } = await connectedWithVehicle();

      const created = await app.inject({
        method: "POST",
        url: "/missions",
        payload: { vehicleId: VEHICLE, nodesText: "dock,0,0,0\nshelf-a,5,0,0", mapId: "hall-a" }
      });
      expect(created.statusCode).toBe(201);
      const { order, warnings } = created.json();
      expect(order.orderId).toMatch(ORDER_ID);
      expect(order.ackState).toBe("PENDING");
      expect(order.nodes[1].nodePosition).toEqual({ x: 5, y: 0, theta: 0, mapId: "hall-a" });
      expect(warnings).toEqual([]);
      expect(broker.current.published[0].topic).toBe("uagv/v2/acme/agv-7/order");

      expect((await app.inject({ method: "GET", url: "/missions" })).json()).toHaveLength(1);
      expect((await app.inject({ method: "GET", url: `/missions/${order.orderId}` })).json().ackState).toBe("PENDING");

      const retryPending = await app.inject({ method: "POST", url: `/missions/${order.orderId}/retry` });
      expect(retryPending.statusCode).toBe(409);
      expect(retryPending.json().code).toBe("ORDER_PENDING");

      const cancel = await app.inject({ method: "POST", url: "/vehicles/acme/agv-7/cancel" });
      expect(cancel.json()).toEqual({ vehicleId: VEHICLE, actionId: "cancel-s2", cancelled: [order.orderId] });
      expect((await app.inject({ method: "GET", url: "/missions?state=failed" })).json()).toHaveLength(1);

      const retried = await app.inject({ method: "POST", url: `/missions/${order.orderId}/retry` });
      expect(retried.statusCode).toBe(201);
      expect(retried.json().order).toMatchObject({ retryOf: order.orderId, ackState: "PENDING" });
      expect(retried.json().order.orderId).toMatch(/-s3$/);
    });

    it("reports close nodes as warnings", async () => {
      const { app } = await connectedWithVehicle();
      const response = await app.inject({
        method: "POST",
        url: "/missions",
        payload: { vehicleId: VEHICLE, nodesText: "a,0,0,0\nb,0.05,0,0" }
      });
      expect(response.statusCode).toBe(201);
      expect(response.json().warnings).toEqual(["Nodes 'a' and 'b' are very close (0.05m)"]);
    });

    it("dispatches a saved route", async () => {
      const { app } = await connectedWithVehicle();
      const saved = await app.inject({
        method: "POST",
        url: "/routes",
        headers: { [OPERATOR_HEADER]: "alice" },
        payload: { name: "Dock loop", mapId: "hall-b", nodesText: "dock,0,0,0\nshelf-a,5,0,0" }
      });
      expect(saved.statusCode).toBe(201);

      const response = await app.inject({
        method: "POST",
        url: "/missions",
        payload: { vehicleId: VEHICLE, routeId: saved.json().route.id }
      });
      expect(response.statusCode).toBe(201);
      expect(response.json().order.nodes.map((node: { nodeId: string }) => node.nodeId)).toEqual(["dock", "shelf-a"]);
      expect(response.json().order.nodes[0].nodePosition.mapId).toBe("hall-b");

      const missing = await app.inject({ method: "POST", url: "/missions", payload: { vehicleId: VEHICLE, routeId: 42 } });
      expect(missing.statusCode).toBe(404);
      expect(missing.json().error).toBe("Route 42 not found");
    });

    it("maps validation failures onto 4xx responses", async () => {
      const { app } = await connectedWithVehicle({ FLEET_MAX_NODES: "2" });

      const both = await app.inject({
        method: "POST",
        url: "/missions",
        payload: { vehicleId: VEHICLE, nodesText: "a,0,0,0", routeId: 1 }
      });
      expect(both.statusCode).toBe(400);
      expect(both.json().error).toBe("Invalid mission request");

      const badText = await app.inject({
        method: "POST",
        url: "/missions",
        payload: { vehicleId: VEHICLE, nodesText: "a,zero,0,0" }
      });
      expect(badText.json()).toEqual({ error: "Line 1: invalid number format", code: "INVALID_ORDER" });

      const tooMany = await app.inject({
        method: "POST",
        url: "/missions",
        payload: { vehicleId: VEHICLE, nodesText: "a,0,0,0\nb,1,0,0\nc,2,0,0" }
      });
      expect(tooMany.statusCode).toBe(400);
      expect(tooMany.json().error).toBe("Too many nodes: 3 (maximum: 2)");

      const unknown = await app.inject({
        method: "POST",
        url: "/missions",
        payload: { vehicleId: "acme/agv-99", nodesText: "a,0,0,0" }
      });
      expect(unknown.statusCode).toBe(404);
      expect(unknown.json().code).toBe("UNKNOWN_VEHICLE");

      expect((await app.inject({ method: "GET", url: "/missions/nope" })).statusCode).toBe(404);
      expect((await app.inject({ method: "GET", url: "/missions?state=lost" })).statusCode).toBe(400);
    });

    it("refuses to dispatch over a degraded session", async () => {
      const { app, fleet, broker } = await connectedWithVehicle();
      fleet.connection.markDegraded();

      const response = await app.inject({
        method: "POST",
        url: "/missions",
        payload: { vehicleId: VEHICLE, nodesText: "a,0,0,0" }
      });

      expect(response.statusCode).toBe(409);
      expect(response.json().code).toBe("NOT_CONNECTED");
      expect(broker.current.published).toEqual([]);
      expect((await app.inject({ method: "GET", url: "/missions" })).json()).toEqual([]);
    });
  });

  describe("saved routes", () => {
    it("requires an operator to save or delete", async () => {
      const { app } = await setup();
      const response = await app.inject({
        method: "POST",
        url: "/routes",
        payload: { name: "Dock loop", nodesText: "a,0,0,0" }
      });
      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe("x-fleet-operator header is required");
      expect((await app.inject({ method: "DELETE", url: "/routes/1" })).statusCode).toBe(400);
    });

    it("saves, lists, searches and deletes routes", async () => {
      const { app } = await setup();
      const alice = { [OPERATOR_HEADER]: "alice" };

      const created = await app.inject({
        method: "POST",
        url: "/routes",
        headers: alice,
        payload: { name: "Dock loop", description: "morning", nodes: [{ nodeId: "a", x: 0, y: 0, theta: 0 }] }
      });
      expect(created.statusCode).toBe(201);
      const { route } = created.json();
      expect(route).toMatchObject({ id: 1, name: "Dock loop", createdBy: "alice", mapId: "default" });

      const duplicate = await app.inject({
        method: "POST",
        url: "/routes",
        headers: alice,
        payload: { name: "Dock loop", nodesText: "a,0,0,0" }
      });
      expect(duplicate.statusCode).toBe(409);

      expect((await app.inject({ method: "GET", url: "/routes" })).json()).toHaveLength(1);
      expect((await app.inject({ method: "GET", url: "/routes?q=morn" })).json()).toHaveLength(1);
      expect((await app.inject({ method: "GET", url: "/routes?q=evening" })).json()).toEqual([]);
      expect((await app.inject({ method: "GET", url: `/routes/${route.id}` })).json().name).toBe("Dock loop");
      expect((await app.inject({ method: "GET", url: "/routes/abc" })).statusCode).toBe(400);
      expect((await app.inject({ method: "GET", url: "/routes/99" })).statusCode).toBe(404);

      const forbidden = await app.inject({
        method: "DELETE",
        url: `/routes/${route.id}`,
        headers: { [OPERATOR_HEADER]: "bob" }
      });
      expect(forbidden.statusCode).toBe(403);
      expect(forbidden.json().code).toBe("FORBIDDEN");

      const deleted = await app.inject({ method: "DELETE", url: `/routes/${route.id}`, headers: alice });
      expect(deleted.statusCode).toBe(204);
      expect((await app.inject({ method: "GET", url: "/routes" })).json()).toEqual([]);
    });
  });
});
