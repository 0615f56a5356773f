import { z } from "zod";

const TABLE_NAME_PATTERN = /^[a-zA-Z0-9_]+$/;

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export const ServiceNowSettingsSchema = z
  .object({
    instanceUrl: z
      .string({ required_error: "SERVICENOW_INSTANCE_URL is required" })
      .trim()
      .min(1, "SERVICENOW_INSTANCE_URL is required")
      .url("Instance URL must be a valid URL with a host")
      .refine((url) => /^https?:\/\//.test(url), "Instance URL must start with https:// or http://")
      .transform((url) => url.replace(/\/+$/, "")),
    authMode: z.enum(["basic", "bearer"]),
    username: optionalString,
    authId: optionalString,
    passwordSecretId: z.string().trim().min(1),
    allowedTables: z
      .array(
        z.string().regex(TABLE_NAME_PATTERN, {
          message: "Table names must contain only letters, numbers, and underscores",
        }),
      )
      .min(1, "At least one allowed table is required"),
    apiTimeoutSeconds: z.number().min(5).max(120),
    maxRecords: z.number().int().min(1).max(1000),
    maxRetries: z.number().int().min(0).max(10),
    retryDelaySeconds: z.number().min(0.1).max(30),
    retryJitterMs: z.number().int().min(0).max(5000),
    maxConnections: z.number().int().min(1).max(100),
  })
  .superRefine((settings, ctx) => {
    if (settings.authMode === "basic" && !settings.username) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["username"],
        message: "SERVICENOW_USERNAME is required for basic authentication",
      });
    }
  });

export type ServiceNowSettingsInput = z.input<typeof ServiceNowSettingsSchema>;
