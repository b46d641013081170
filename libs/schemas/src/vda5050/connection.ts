import { z } from "zod";
import { AgvPositionSchema, HeaderSchema, VelocitySchema } from "./header";

export const ReportedConnectionStateSchema = z.enum(["ONLINE", "OFFLINE", "CONNECTIONBROKEN"]);
export type ReportedConnectionState = z.infer<typeof ReportedConnectionStateSchema>;

export const ConnectionMessageSchema = HeaderSchema.extend({
  connectionState: ReportedConnectionStateSchema,
  fullResync: z.boolean().optional()
});

export type ConnectionMessage = z.infer<typeof ConnectionMessageSchema>;

export const VisualizationMessageSchema = HeaderSchema.extend({
  agvPosition: AgvPositionSchema.optional(),
  velocity: VelocitySchema.optional()
});

export type VisualizationMessage = z.infer<typeof VisualizationMessageSchema>;
