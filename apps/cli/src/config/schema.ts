import { z } from "zod";

export const SequenceSchema = z.object({
  num: z.number().int().gt(1).default(50),
  endpoint: z.boolean().default(true),
});

export const InterpolationSchema = z.object({
  method: z.enum(["loglog", "xlog", "ylog"]).default("loglog"),
  // numbers reach the interpolant as is: log-space levels for loglog and ylog
  extrapolation: z.union([z.number(), z.enum(["throw", "flat", "linear"])]).optional(),
});

export const LoggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("warn"),
});

export const OutputSchema = z.object({
  precision: z.number().int().min(1).max(17).default(17),
});

export const AppConfigSchema = z.object({
  sequence: SequenceSchema.default({}),
  interpolation: InterpolationSchema.default({}),
  logging: LoggingSchema.default({}),
  output: OutputSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
