import { z } from "zod";
import { IsoDateTimeSchema, NonEmptyStringSchema, NonNegativeIntSchema } from "../common/scalars";

/**
 * Fields every VDA5050 message carries. `headerId` increases per topic and
 * vehicle; receivers use it to discard replays.
 */
export const HeaderSchema = z.object({
  headerId: NonNegativeIntSchema,
  timestamp: IsoDateTimeSchema,
  version: NonEmptyStringSchema,
  manufacturer: NonEmptyStringSchema,
  serialNumber: NonEmptyStringSchema
});

export type Header = z.infer<typeof HeaderSchema>;

export const VdaTopicSchema = z.enum([
  "order",
  "instantActions",
  "state",
  "connection",
  "visualization",
  "factsheet"
]);

export type VdaTopic = z.infer<typeof VdaTopicSchema>;

export const AgvPositionSchema = z.object({
  x: z.number(),
  y: z.number(),
  theta: z.number(),
  mapId: NonEmptyStringSchema,
  positionInitialized: z.boolean().default(true),
  localizationScore: z.number().min(0).max(1).optional()
});

export type AgvPosition = z.infer<typeof AgvPositionSchema>;

export const VelocitySchema = z.object({
  vx: z.number().optional(),
  vy: z.number().optional(),
  omega: z.number().optional()
});

export type Velocity = z.infer<typeof VelocitySchema>;
