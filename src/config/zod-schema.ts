import { z } from "zod";

const LogLevelSchema = z.union([
  z.literal("silent"),
  z.literal("fatal"),
  z.literal("error"),
  z.literal("warn"),
  z.literal("info"),
  z.literal("debug"),
  z.literal("trace"),
]);

export const BotSchema = z
  .object({
    token: z.string().optional(),
    mode: z.union([z.literal("websocket"), z.literal("webhook")]).optional(),
    api: z
      .object({
        baseUrl: z.string().url().optional(),
        deviceUrl: z.string().url().optional(),
      })
      .strict()
      .optional(),
    device: z
      .object({
        preferExisting: z.boolean().optional(),
        name: z.string().min(1).optional(),
        deviceName: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    transport: z
      .object({
        connectTimeoutMs: z.number().int().positive().optional(),
        closeTimeoutMs: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    webhook: z
      .object({
        host: z.string().optional(),
        port: z.number().int().min(0).max(65535).optional(),
        path: z
          .string()
          .refine((value) => value.startsWith("/"), { message: "path must start with /" })
          .optional(),
        secret: z.string().optional(),
      })
      .strict()
      .optional(),
    commands: z
      .object({
        modules: z.array(z.string().min(1)).optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: LogLevelSchema.optional(),
        consoleStyle: z.union([z.literal("pretty"), z.literal("json")]).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();
