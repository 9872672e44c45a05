import { z } from "zod";

export const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export type LogLevel = z.infer<typeof logLevelSchema>;

const settingsSchema = z.object({
  LOG_LEVEL: logLevelSchema.default("info"),
  WEBHOOK_ALLOWED_RATE: z.coerce.number().int().positive().optional(),
});

export type Settings = {
  logLevel: LogLevel;
  /** Echoed as WebHook-Allowed-Rate on the validation handshake when set. */
  webhookAllowedRate?: number;
};

/**
 * Read an app setting. Blank values count as unset, which is what the portal
 * leaves behind when a setting is cleared.
 */
export function env(
  name: string,
  source: NodeJS.ProcessEnv = process.env
): string | undefined {
  const v = source[name];
  if (v === undefined || v.trim() === "") return undefined;
  return v.trim();
}

export function loadSettings(source: NodeJS.ProcessEnv = process.env): Settings {
  const result = settingsSchema.safeParse({
    LOG_LEVEL: env("LOG_LEVEL", source)?.toLowerCase(),
    WEBHOOK_ALLOWED_RATE: env("WEBHOOK_ALLOWED_RATE", source),
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid app settings: ${issues}`);
  }

  return {
    logLevel: result.data.LOG_LEVEL,
    webhookAllowedRate: result.data.WEBHOOK_ALLOWED_RATE,
  };
}
