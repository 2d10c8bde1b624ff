export interface EmmaConfig {
  accountId: string | number;
  publicKey: string;
  privateKey: string;
  apiURL?: string;
  timeoutMS?: number;
  debug?: boolean;
}

export const DEFAULT_API_URL = "https://api.e2ma.net";
export const DEFAULT_TIMEOUT_MS = 15_000;

export function validateConfig(config: EmmaConfig): void {
  if (config?.accountId === undefined || config.accountId === "") {
    throw new Error("accountId is required");
  }
  if (!config.publicKey) {
    throw new Error("publicKey is required");
  }
  if (!config.privateKey) {
    throw new Error("privateKey is required");
  }
  if (
    config.timeoutMS !== undefined &&
    (!Number.isInteger(config.timeoutMS) || config.timeoutMS <= 0)
  ) {
    throw new Error("timeoutMS must be a positive integer");
  }
}

/**
 * Reads credentials from `EMMA_ACCOUNT_ID`, `EMMA_PUBLIC_KEY` and
 * `EMMA_PRIVATE_KEY`, plus the optional `EMMA_API_URL`, `EMMA_TIMEOUT_MS`
 * and `EMMA_DEBUG`.
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env,
): EmmaConfig {
  const accountId = env.EMMA_ACCOUNT_ID;
  const publicKey = env.EMMA_PUBLIC_KEY;
  const privateKey = env.EMMA_PRIVATE_KEY;
  if (!accountId || !publicKey || !privateKey) {
    throw new Error("Missing required Emma credentials in environment variables");
  }

  const config: EmmaConfig = { accountId, publicKey, privateKey };
  if (env.EMMA_API_URL) {
    config.apiURL = env.EMMA_API_URL;
  }
  if (env.EMMA_TIMEOUT_MS) {
    const timeout = Number(env.EMMA_TIMEOUT_MS);
    if (!Number.isInteger(timeout) || timeout <= 0) {
      throw new Error("EMMA_TIMEOUT_MS must be a positive integer");
    }
    config.timeoutMS = timeout;
  }
  if (env.EMMA_DEBUG) {
    config.debug = ["1", "true", "yes"].includes(env.EMMA_DEBUG.toLowerCase());
  }
  return config;
}
