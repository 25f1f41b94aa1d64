import { z } from "zod";

export const BOT_CAPABILITIES = [
  "can_manage_chat",
  "can_delete_messages",
  "can_restrict_members",
  "can_promote_members",
  "can_change_info",
  "can_invite_users",
  "can_pin_messages"
] as const;

export type BotCapability = (typeof BOT_CAPABILITIES)[number];

const capabilityListSchema = z
  .string()
  .default("can_restrict_members,can_delete_messages")
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  )
  .pipe(z.array(z.enum(BOT_CAPABILITIES)));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  DATABASE_URL: z.string().url(),
  UPSTASH_REDIS_REST_URL: z.string().url(),
  UPSTASH_REDIS_REST_TOKEN: z.string().min(1),
  APPROVAL_TIMEOUT_SECONDS: z.coerce.number().int().min(5).max(300).default(10),
  REVIEWER_ROLE_ID: z.string().min(1).optional(),
  COMMAND_PREFIX: z.string().min(1).max(3).default("/"),
  REQUIRED_BOT_CAPABILITIES: capabilityListSchema,
  AUDIT_WRITE_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  AUDIT_RETRY_DELAY_MS: z.coerce.number().int().min(0).max(10000).default(250),
  POLL_TIMEOUT_SECONDS: z.coerce.number().int().min(1).max(50).default(30),
  POLL_RETRY_MS: z.coerce.number().int().min(100).max(60000).default(1000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info")
});

export type AppEnv = z.infer<typeof envSchema>;

let cachedEnv: AppEnv | null = null;

export function parseEnv(source: Record<string, string | undefined>): AppEnv {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }

  return parsed.data;
}

export function getEnv(): AppEnv {
  if (cachedEnv) {
    return cachedEnv;
  }

  cachedEnv = parseEnv(process.env);
  return cachedEnv;
}

export function resetEnvForTests(): void {
  cachedEnv = null;
}
