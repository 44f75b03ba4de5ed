import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const address = z.string().regex(/^[A-Za-z0-9_.:-]{3,128}$/, "Invalid address.");

const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    API_PORT: z.coerce.number().default(4000),
    ADMIN_ADDRESS: address.default("protocol-admin"),
    TREASURY_ADDRESS: address.default("protocol-treasury"),
    INSURANCE_ADDRESS: address.optional(),
    PROTOCOL_FEE_BPS: z.coerce.number().int().min(0).max(10_000).default(50),
    TOKEN_LIVE_MODE: z
      .string()
      .optional()
      .transform((value) => value === "true"),
    TOKEN_SERVICE_URL: z.string().url().default("http://localhost:8700"),
    TOKEN_SERVICE_API_KEY: z.string().optional(),
    HTTP_LOG_FORMAT: z.string().default("dev"),
  })
  .transform((value) => ({
    ...value,
    INSURANCE_ADDRESS: value.INSURANCE_ADDRESS ?? value.TREASURY_ADDRESS,
  }));

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  throw new Error(`Invalid env configuration: ${parsed.error.message}`);
}

export const env = parsed.data;
export type Env = typeof env;
