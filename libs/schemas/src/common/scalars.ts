import { z } from "zod";

export const NonEmptyStringSchema = z.string().min(1);
export const IdentifierSchema = NonEmptyStringSchema;
export const IsoDateTimeSchema = z.string().datetime({ offset: true });
export const NonNegativeIntSchema = z.number().int().nonnegative();
export const BoundedPercentageSchema = z.number().min(0).max(100);
export const PortSchema = z.number().int().min(1).max(65535);
