/**
 * Application configuration
 *
 * Built once at startup from environment variables and passed to every
 * component that needs it. The returned object is frozen.
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

export const DEFAULT_TOKEN_PATH = "~/.garminconnect/tokens.json";
export const DEFAULT_PORT = 8080;

export type GarminDomain = "garmin.com" | "garmin.cn";

export interface AppConfig {
  readonly email: string;
  readonly password: string;
  readonly secretKey: string;
  readonly tokenPath: string;
  readonly domain: GarminDomain;
  readonly port: number;
  readonly host: string;
  readonly logLevel: LogLevel;
}

const required = (name: string) =>
  z.string({ required_error: `${name} is not set` }).min(1, `${name} is empty`);

const EnvSchema = z.object({
  EMAIL: required("EMAIL"),
  PASSWORD: required("PASSWORD"),
  SECRET_KEY: required("SECRET_KEY"),
  GARMINTOKENS: z.string().min(1).default(DEFAULT_TOKEN_PATH),
  GARMIN_DOMAIN: z.enum(["garmin.com", "garmin.cn"]).default("garmin.com"),
  PORT: z.coerce
    .number()
    .int("PORT must be an integer")
    .min(1, "PORT must be between 1 and 65535")
    .max(65535, "PORT must be between 1 and 65535")
    .default(DEFAULT_PORT),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

/**
 * Expand a leading "~" to the user's home directory.
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") {
    return home;
  }
  if (path.startsWith("~/")) {
    return join(home, path.slice(2));
  }
  return path;
}

/**
 * Load configuration from environment variables.
 *
 * @throws ConfigurationError listing every missing or invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const problems = result.error.issues.map((issue) =>
      issue.message.startsWith(String(issue.path[0]))
        ? issue.message
        : `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigurationError(problems);
  }

  const parsed = result.data;

  return Object.freeze({
    email: parsed.EMAIL,
    password: parsed.PASSWORD,
    secretKey: parsed.SECRET_KEY,
    tokenPath: expandHome(parsed.GARMINTOKENS),
    domain: parsed.GARMIN_DOMAIN,
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
  });
}
