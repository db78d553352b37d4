import { DEFAULT_REGION, TopologyConfig } from '@linkstack/composer';
import { DEFAULT_OUT_DIR } from '@linkstack/synthesizer';
import fs from 'node:fs/promises';

export const CONFIG_FILE = 'linkstack.config.json';

export interface StackConfig {
  stackName: string;
  account?: string;
  region?: string;
  analytics?: boolean;
  codePath: string;
  throttling: {
    rateLimit: number;
    burstLimit: number;
  };
  outDir?: string;
}

export const DEFAULT_CONFIG: StackConfig = {
  stackName: 'QuickLinkStack',
  region: DEFAULT_REGION,
  analytics: true,
  codePath: '../target/quicklink-1.0.0-aws.jar',
  throttling: { rateLimit: 50, burstLimit: 100 },
  outDir: DEFAULT_OUT_DIR,
};

/** Flags that take precedence over the file */
export interface ConfigOverrides {
  account?: string;
  region?: string;
  analytics?: boolean;
  out?: string;
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

export function validateStackConfig(data: unknown): data is StackConfig {
  if (!data || typeof data !== 'object') return false;

  const config = data as Partial<StackConfig>;
  const throttling = config.throttling;

  return (
    typeof config.stackName === 'string' &&
    typeof config.codePath === 'string' &&
    isOptionalString(config.account) &&
    isOptionalString(config.region) &&
    isOptionalString(config.outDir) &&
    (config.analytics === undefined || typeof config.analytics === 'boolean') &&
    typeof throttling === 'object' &&
    throttling !== null &&
    typeof throttling.rateLimit === 'number' &&
    typeof throttling.burstLimit === 'number'
  );
}

export async function loadConfig(configPath: string): Promise<StackConfig> {
  const content = await fs.readFile(configPath, 'utf8');
  const data: unknown = JSON.parse(content);

  if (!validateStackConfig(data)) throw new Error(`Invalid configuration in ${configPath}`);
  return data;
}

export function toTopology(config: StackConfig, overrides: ConfigOverrides = {}): { topology: TopologyConfig; outDir: string } {
  // --no-analytics can only switch the queue off
  const analytics = overrides.analytics === false ? false : (config.analytics ?? true);

  return {
    topology: {
      stackName: config.stackName,
      environment: {
        account: overrides.account ?? config.account,
        region: overrides.region ?? config.region,
      },
      analytics,
      codePath: config.codePath,
      throttling: { ...config.throttling },
    },
    outDir: overrides.out ?? config.outDir ?? DEFAULT_OUT_DIR,
  };
}
