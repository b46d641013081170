export * from "./common/scalars";
export * from "./vda5050/header";
export * from "./vda5050/order";
export * from "./vda5050/state";
export * from "./vda5050/connection";
export * from "./fleet/broker-config";
