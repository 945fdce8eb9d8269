import { z } from 'zod';
import { ScanConfigError } from '../errors';

export const scanConfigSchema = z.object({
  // Max plausible claims for one billing entity in one month
  volumeCeiling: z.number().positive().default(1500),
  // Modified z-score (robust std-dev units) above the peer median
  revenueZThreshold: z.number().positive().default(3.0),
  // Month paid vs the entity's own monthly mean
  spikeMultiplier: z.number().positive().default(5.0),
  // Suspicious if more than this fraction of rows share one paid amount
  consistencyRatio: z.number().min(0).max(1).default(0.9),
  consistencyMinRows: z.number().int().min(1).default(30),
  // Entities below this summed paid amount are dropped before detection
  minViableTotal: z.number().min(0).default(10000),
  defaultThreshold: z.number().min(0).max(1).default(0.3),
});

export type ScanConfig = Readonly<z.infer<typeof scanConfigSchema>>;
export type ScanConfigOverrides = z.input<typeof scanConfigSchema>;

const ENV_KEYS: Record<keyof ScanConfigOverrides, string> = {
  volumeCeiling: 'SCAN_VOLUME_CEILING',
  revenueZThreshold: 'SCAN_REVENUE_Z_THRESHOLD',
  spikeMultiplier: 'SCAN_SPIKE_MULTIPLIER',
  consistencyRatio: 'SCAN_CONSISTENCY_RATIO',
  consistencyMinRows: 'SCAN_CONSISTENCY_MIN_ROWS',
  minViableTotal: 'SCAN_MIN_VIABLE_TOTAL',
  defaultThreshold: 'SCAN_THRESHOLD',
};

export function resolveScanConfig(overrides: ScanConfigOverrides = {}): ScanConfig {
  const parsed = scanConfigSchema.safeParse(overrides);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ScanConfigError(`Invalid scan configuration: ${issues.join('; ')}`, issues);
  }

  return Object.freeze(parsed.data);
}

/**
 * Builds a configuration from `SCAN_*` environment variables. Unset or blank
 * variables fall back to the defaults.
 */
export function scanConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ScanConfig {
  const overrides: Record<string, number> = {};

  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const raw = env[envName];
    if (raw === undefined || raw.trim() === '') continue;
    overrides[key] = Number(raw);
  }

  return resolveScanConfig(overrides);
}
