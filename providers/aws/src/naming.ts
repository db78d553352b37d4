import { PropertyValue, ResolvedEnvironment, SynthesisContext } from '@linkstack/contracts';
import crypto from 'node:crypto';

export const UNKNOWN_ACCOUNT = 'unknown-account';

/** Explicit name when the property holds a literal, otherwise `<stackName>-<logicalId>` */
export function physicalName(value: PropertyValue | undefined, logicalId: string, context: SynthesisContext): string {
  if (typeof value === 'string' && value !== '') return value;
  return `${context.stackName}-${logicalId}`;
}

export function accountOf(environment: ResolvedEnvironment): string {
  return environment.account ?? UNKNOWN_ACCOUNT;
}

export function arn(service: string, environment: ResolvedEnvironment, resource: string): string {
  return `arn:aws:${service}:${environment.region}:${accountOf(environment)}:${resource}`;
}

/** Stable 10-character id standing in for a provider-generated one */
export function generatedId(stackName: string, logicalId: string): string {
  return crypto.createHash('sha256').update(`${stackName}/${logicalId}`).digest('hex').slice(0, 10);
}
