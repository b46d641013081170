import { z } from "zod";
import { NonEmptyStringSchema, NonNegativeIntSchema } from "../common/scalars";
import { HeaderSchema } from "./header";

export const BlockingTypeSchema = z.enum(["NONE", "SOFT", "HARD"]);

export const ActionParameterSchema = z.object({
  key: NonEmptyStringSchema,
  value: z.unknown()
});

export const ActionSchema = z.object({
  actionType: NonEmptyStringSchema,
  actionId: NonEmptyStringSchema,
  actionDescription: z.string().optional(),
  blockingType: BlockingTypeSchema.default("HARD"),
  actionParameters: z.array(ActionParameterSchema).default([])
});

export type Action = z.infer<typeof ActionSchema>;

export const NodePositionSchema = z.object({
  x: z.number(),
  y: z.number(),
  theta: z.number().optional(),
  allowedDeviationXY: z.number().nonnegative().optional(),
  allowedDeviationTheta: z.number().nonnegative().optional(),
  mapId: NonEmptyStringSchema
});

export type NodePosition = z.infer<typeof NodePositionSchema>;

export const OrderNodeSchema = z.object({
  nodeId: NonEmptyStringSchema,
  sequenceId: NonNegativeIntSchema,
  nodeDescription: z.string().optional(),
  released: z.boolean().default(true),
  nodePosition: NodePositionSchema.optional(),
  actions: z.array(ActionSchema).default([])
});

export type OrderNode = z.infer<typeof OrderNodeSchema>;

export const OrderEdgeSchema = z.object({
  edgeId: NonEmptyStringSchema,
  sequenceId: NonNegativeIntSchema,
  edgeDescription: z.string().optional(),
  released: z.boolean().default(true),
  startNodeId: NonEmptyStringSchema,
  endNodeId: NonEmptyStringSchema,
  maxSpeed: z.number().positive().optional(),
  actions: z.array(ActionSchema).default([])
});

export type OrderEdge = z.infer<typeof OrderEdgeSchema>;

export const OrderMessageSchema = HeaderSchema.extend({
  orderId: NonEmptyStringSchema,
  orderUpdateId: NonNegativeIntSchema,
  zoneSetId: z.string().optional(),
  nodes: z.array(OrderNodeSchema).min(1),
  edges: z.array(OrderEdgeSchema).default([])
});

export type OrderMessage = z.infer<typeof OrderMessageSchema>;

export const InstantActionsMessageSchema = HeaderSchema.extend({
  actions: z.array(ActionSchema).min(1)
});

export type InstantActionsMessage = z.infer<typeof InstantActionsMessageSchema>;
