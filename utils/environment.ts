import { z } from "zod";

const logLevels = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof logLevels)[number];

const schema = z.object({
  HOSTNAME_ENCODER_LOG_LEVEL: z.enum(logLevels).default("warn"),
});

export type Environment = z.infer<typeof schema>;

export function readEnvironment(
  source: Record<string, string | undefined> = process.env
): Environment {
  const parsed = schema.safeParse({
    HOSTNAME_ENCODER_LOG_LEVEL:
      source.HOSTNAME_ENCODER_LOG_LEVEL?.toLowerCase() || undefined,
  });

  if (!parsed.success) {
    console.error(parsed.error.format());
    throw new Error("Missing or invalid environment variables.");
  }

  return parsed.data;
}

export const variables = readEnvironment();
