import type { BrokerConfig } from "@fleet-link/schemas";

export const INTERFACE = "uagv/v2";
export const TIMESTAMP = "2026-01-05T08:00:00.000Z";

export const BROKER: BrokerConfig = {
  host: "127.0.0.1",
  port: 1883,
  useTls: false,
  username: "fleet",
  password: "test-secret",
  clientId: "fleet-link-test",
  keepaliveSeconds: 60
};

export function topicFor(vehicleId: string, segment: string): string {
  return `${INTERFACE}/${vehicleId}/${segment}`;
}

function identity(vehicleId: string): { manufacturer: string; serialNumber: string } {
  const [manufacturer, serialNumber] = vehicleId.split("/");
  return { manufacturer, serialNumber };
}

export interface StateOverrides {
  orderId?: string;
  orderUpdateId?: number;
  batteryCharge?: number;
  errors?: unknown[];
  fullResync?: boolean;
  position?: { x: number; y: number; theta: number; mapId: string };
}

export function stateFrame(vehicleId: string, headerId: number, overrides: StateOverrides = {}): Record<string, unknown> {
  return {
    headerId,
    timestamp: TIMESTAMP,
    version: "2.0.0",
    ...identity(vehicleId),
    orderId: overrides.orderId ?? "",
    orderUpdateId: overrides.orderUpdateId ?? 0,
    lastNodeId: "dock",
    operatingMode: "AUTOMATIC",
    batteryState: { batteryCharge: overrides.batteryCharge ?? 80, charging: false },
    errors: overrides.errors ?? [],
    ...(overrides.position ? { agvPosition: overrides.position } : {}),
    ...(overrides.fullResync !== undefined ? { fullResync: overrides.fullResync } : {})
  };
}

export function connectionFrame(
  vehicleId: string,
  headerId: number,
  connectionState: "ONLINE" | "OFFLINE" | "CONNECTIONBROKEN"
): Record<string, unknown> {
  return { headerId, timestamp: TIMESTAMP, version: "2.0.0", ...identity(vehicleId), connectionState };
}
