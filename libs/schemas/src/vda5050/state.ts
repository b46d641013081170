import { z } from "zod";
import { BoundedPercentageSchema, NonEmptyStringSchema, NonNegativeIntSchema } from "../common/scalars";
import { AgvPositionSchema, HeaderSchema, VelocitySchema } from "./header";
import { NodePositionSchema } from "./order";

export const OperatingModeSchema = z.enum(["AUTOMATIC", "SEMIAUTOMATIC", "MANUAL", "SERVICE", "TEACHIN"]);
export type OperatingMode = z.infer<typeof OperatingModeSchema>;

export const ErrorReferenceSchema = z.object({
  referenceKey: NonEmptyStringSchema,
  referenceValue: z.string()
});

export const AgvErrorSchema = z.object({
  errorType: NonEmptyStringSchema,
  errorLevel: z.enum(["WARNING", "FATAL"]),
  errorDescription: z.string().optional(),
  errorReferences: z.array(ErrorReferenceSchema).default([])
});

export type AgvError = z.infer<typeof AgvErrorSchema>;

export const BatteryStateSchema = z.object({
  batteryCharge: BoundedPercentageSchema,
  batteryVoltage: z.number().optional(),
  batteryHealth: BoundedPercentageSchema.optional(),
  charging: z.boolean(),
  reach: z.number().nonnegative().optional()
});

export type BatteryState = z.infer<typeof BatteryStateSchema>;

export const ActionStatusSchema = z.enum(["WAITING", "INITIALIZING", "RUNNING", "PAUSED", "FINISHED", "FAILED"]);

export const ActionStateSchema = z.object({
  actionId: NonEmptyStringSchema,
  actionType: z.string().optional(),
  actionStatus: ActionStatusSchema,
  resultDescription: z.string().optional()
});

export type ActionState = z.infer<typeof ActionStateSchema>;

export const NodeStateSchema = z.object({
  nodeId: NonEmptyStringSchema,
  sequenceId: NonNegativeIntSchema,
  released: z.boolean(),
  nodePosition: NodePositionSchema.optional()
});

export const EdgeStateSchema = z.object({
  edgeId: NonEmptyStringSchema,
  sequenceId: NonNegativeIntSchema,
  released: z.boolean()
});

export const StateMessageSchema = HeaderSchema.extend({
  orderId: z.string().default(""),
  orderUpdateId: NonNegativeIntSchema.default(0),
  zoneSetId: z.string().optional(),
  lastNodeId: z.string(),
  lastNodeSequenceId: NonNegativeIntSchema.default(0),
  driving: z.boolean().default(false),
  paused: z.boolean().optional(),
  operatingMode: OperatingModeSchema,
  nodeStates: z.array(NodeStateSchema).default([]),
  edgeStates: z.array(EdgeStateSchema).default([]),
  agvPosition: AgvPositionSchema.optional(),
  velocity: VelocitySchema.optional(),
  batteryState: BatteryStateSchema,
  errors: z.array(AgvErrorSchema),
  actionStates: z.array(ActionStateSchema).default([]),
  safetyState: z
    .object({
      eStop: z.string(),
      fieldViolation: z.boolean()
    })
    .optional(),
  /** Set by a vehicle after a restart so receivers drop their headerId baseline. */
  fullResync: z.boolean().optional()
});

export type StateMessage = z.infer<typeof StateMessageSchema>;
