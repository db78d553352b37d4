import { Environment, ResolvedEnvironment } from '@linkstack/contracts';

export const DEFAULT_REGION = 'us-east-1';

export function resolveEnvironment(environment: Environment = {}): ResolvedEnvironment {
  return Object.freeze({
    account: environment.account || undefined,
    region: environment.region || DEFAULT_REGION,
  });
}
