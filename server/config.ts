import { z } from "zod";

const decimalString = z
  .string()
  .regex(/^\d+(\.\d{1,2})?$/, "must be a non-negative amount with at most two decimals");

// Largest value rewards.amount (numeric(7, 2)) can hold
const MAX_REWARD_AMOUNT = 99999.99;

const booleanString = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  SESSION_SECRET: z.string().min(1, "SESSION_SECRET must be set"),
  PUBLIC_BASE_URL: z.string().url().default("http://localhost:5000"),
  SMTP_HOST: z.string().min(1).optional(),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_SECURE: booleanString,
  SMTP_USER: z.string().optional(),
  SMTP_PASSWORD: z.string().optional(),
  EMAIL_FROM: z.string().default("noreply@workreward.local"),
  REWARD_BASE_RATE: decimalString.refine((value) => Number(value) > 0, "must be greater than zero").default("500.00"),
  REWARD_CAP: decimalString
    .refine((value) => Number(value) > 0, "must be greater than zero")
    .refine((value) => Number(value) <= MAX_REWARD_AMOUNT, `must not exceed ${MAX_REWARD_AMOUNT}`)
    .default("10000.00"),
  EFFICIENCY_STABILIZING_COEFFICIENT: z.coerce.number().positive().default(0.8),
});

export interface SmtpConfig {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  password?: string;
}

export interface AppConfig {
  env: "development" | "production" | "test";
  port: number;
  sessionSecret: string;
  publicBaseUrl: string;
  email: {
    from: string;
    smtp?: SmtpConfig;
  };
  reward: {
    baseRate: string;
    cap: string;
  };
  efficiency: {
    stabilizingCoefficient: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`);
    throw new Error(`Invalid configuration:\n  ${issues.join("\n  ")}`);
  }

  const vars = parsed.data;
  return {
    env: vars.NODE_ENV,
    port: vars.PORT,
    sessionSecret: vars.SESSION_SECRET,
    publicBaseUrl: vars.PUBLIC_BASE_URL.replace(/\/+$/, ""),
    email: {
      from: vars.EMAIL_FROM,
      smtp: vars.SMTP_HOST
        ? {
            host: vars.SMTP_HOST,
            port: vars.SMTP_PORT,
            secure: vars.SMTP_SECURE,
            user: vars.SMTP_USER,
            password: vars.SMTP_PASSWORD,
          }
        : undefined,
    },
    reward: {
      baseRate: vars.REWARD_BASE_RATE,
      cap: vars.REWARD_CAP,
    },
    efficiency: {
      stabilizingCoefficient: vars.EFFICIENCY_STABILIZING_COEFFICIENT,
    },
  };
}
