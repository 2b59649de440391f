import { isIP } from 'node:net';
import { z } from 'zod';

/**
 * A nameserver address: an IP, optionally followed by a port
 * (IPv6 with a port uses the bracketed form `[::1]:53`).
 */
function isServerAddress(value: string): boolean {
  const bracketed = /^\[([^\]]+)\](?::(\d{1,5}))?$/.exec(value);
  if (bracketed) {
    return isIP(bracketed[1]) === 6 && isPort(bracketed[2]);
  }
  if (isIP(value) !== 0) {
    return true;
  }
  const hostPort = /^([^:]+):(\d{1,5})$/.exec(value);
  return hostPort !== null && isIP(hostPort[1]) === 4 && isPort(hostPort[2]);
}

function isPort(value: string | undefined): boolean {
  if (value === undefined) return true;
  const port = Number(value);
  return port > 0 && port <= 65535;
}

export const envSchema = z.object({
  SRV_DNS_SERVERS: z
    .string()
    .default('')
    .transform((value) =>
      value
        .split(',')
        .map((server) => server.trim())
        .filter((server) => server.length > 0)
    )
    .refine((servers) => servers.every(isServerAddress), {
      message: 'Must be a comma-separated list of IP addresses (optionally with :port)',
    }),
  SRV_QUERY_TIMEOUT: z.coerce.number().int().positive().default(3000),
  SRV_QUERY_TRIES: z.coerce.number().int().min(1).max(10).default(2),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
});

export type Config = z.infer<typeof envSchema>;

/**
 * Load and validate configuration from environment variables.
 * @throws ZodError when a variable is present but invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return envSchema.parse(env);
}
