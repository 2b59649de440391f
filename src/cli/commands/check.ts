/**
 * Check command - verify configuration.
 * Helps users diagnose environment issues before resolving.
 */
import { ZodError } from 'zod';
import { loadConfig } from '../../config/schema.js';

interface CheckResult {
  name: string;
  status: 'ok' | 'error';
  message: string;
}

/**
 * Format check result with status indicator.
 */
export function formatResult(result: CheckResult): string {
  const icons = { ok: '[OK]', error: '[FAIL]' };
  return `${icons[result.status]} ${result.name}: ${result.message}`;
}

/**
 * Check environment configuration.
 */
export function checkEnvironment(env: NodeJS.ProcessEnv = process.env): CheckResult[] {
  try {
    const config = loadConfig(env);
    return [
      {
        name: 'Nameservers',
        status: 'ok',
        message: config.SRV_DNS_SERVERS.length > 0 ? config.SRV_DNS_SERVERS.join(', ') : 'system default',
      },
      { name: 'Timeout', status: 'ok', message: `${config.SRV_QUERY_TIMEOUT}ms` },
      { name: 'Tries', status: 'ok', message: String(config.SRV_QUERY_TRIES) },
      { name: 'Log Level', status: 'ok', message: config.LOG_LEVEL },
    ];
  } catch (error) {
    if (!(error instanceof ZodError)) throw error;
    return error.issues.map((issue) => ({
      name: issue.path.join('.'),
      status: 'error',
      message: issue.message,
    }));
  }
}

/**
 * Run configuration checks.
 * @returns Process exit code
 */
export function runCheck(): number {
  console.log('Environment Configuration:');
  const results = checkEnvironment();
  for (const result of results) {
    console.log(`  ${formatResult(result)}`);
  }

  if (results.some((r) => r.status === 'error')) {
    console.log('\nConfiguration invalid.');
    return 1;
  }
  console.log('\nAll checks passed.');
  return 0;
}
