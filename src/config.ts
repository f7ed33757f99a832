import { z } from 'zod';

export const DEFAULT_PORT = 5001;
export const DEFAULT_SERVER_URL = `http://127.0.0.1:${DEFAULT_PORT}`;

const ServerConfigSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
});

export interface ServerConfig {
  host: string;
  port: number;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = ServerConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid server configuration: ${issues.join('; ')}`);
  }
  return { host: parsed.data.HOST, port: parsed.data.PORT };
}

const ServerUrlSchema = z.string().url();

/**
 * Base URL for the control CLI: explicit flag, then SIGNAL_SERVER_URL, then
 * the local default. Trailing slashes are dropped.
 */
export function resolveServerUrl(flag: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  const raw = flag ?? env.SIGNAL_SERVER_URL ?? DEFAULT_SERVER_URL;
  const parsed = ServerUrlSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid server URL: ${raw}`);
  }
  return parsed.data.replace(/\/+$/, '');
}
