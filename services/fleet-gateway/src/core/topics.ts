import type { VdaTopic } from "@fleet-link/schemas";

export const DEFAULT_INTERFACE_NAME = "uagv/v2";

/** Topics the gateway listens to for every vehicle. */
export const INBOUND_TOPICS: readonly VdaTopic[] = ["state", "connection", "visualization", "factsheet"];

export interface VehicleRef {
  manufacturer: string;
  serialNumber: string;
}

export interface ParsedTopic extends VehicleRef {
  vehicleId: string;
  /** Trailing segment as received; not necessarily a known VDA5050 topic. */
  segment: string;
}

export function vehicleIdOf(ref: VehicleRef): string {
  return `${ref.manufacturer}/${ref.serialNumber}`;
}

export function parseVehicleId(vehicleId: string): VehicleRef | null {
  const parts = vehicleId.split("/");
  if (parts.length !== 2) return null;
  const [manufacturer, serialNumber] = parts;
  if (!manufacturer || !serialNumber) return null;
  return { manufacturer, serialNumber };
}

export function buildTopic(interfaceName: string, ref: VehicleRef, topic: VdaTopic): string {
  return `${interfaceName}/${ref.manufacturer}/${ref.serialNumber}/${topic}`;
}

/**
 * Splits `<interfaceName>/<manufacturer>/<serialNumber>/<topic>`. The
 * interface name may itself contain slashes, so it is matched as a prefix.
 */
export function parseTopic(interfaceName: string, topic: string): ParsedTopic | null {
  const prefix = `${interfaceName}/`;
  if (!topic.startsWith(prefix)) return null;
  const rest = topic.slice(prefix.length).split("/");
  if (rest.length !== 3) return null;
  const [manufacturer, serialNumber, segment] = rest;
  if (!manufacturer || !serialNumber || !segment) return null;
  return { manufacturer, serialNumber, segment, vehicleId: `${manufacturer}/${serialNumber}` };
}

export function fleetSubscriptions(interfaceName: string): string[] {
  return INBOUND_TOPICS.map((topic) => `${interfaceName}/+/+/${topic}`);
}
