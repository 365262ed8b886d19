import * as cdk from 'aws-cdk-lib';
import * as logs from 'aws-cdk-lib/aws-logs';
import { z } from 'zod';
import type { Construct } from 'constructs';

/** Context key holding the deployment settings (cdk.json or `-c`). */
export const CONTEXT_KEY = 'movieCatalog';

/** API Gateway gives up on an integration after 29 seconds. */
export const MAX_INTEGRATION_TIMEOUT_SECONDS = 29;

const HostnameSchema = z
  .string()
  .trim()
  .toLowerCase()
  .regex(/^([a-z0-9]([a-z0-9-]*[a-z0-9])?\.)+[a-z0-9]([a-z0-9-]*[a-z0-9])?$/, 'Must be a fully qualified hostname');

export const isWithinZone = (hostname: string, zoneName: string): boolean =>
  hostname === zoneName || hostname.endsWith(`.${zoneName}`);

export const DomainConfigSchema = z
  .object({
    hostname: HostnameSchema,
    hostedZoneId: z.string().trim().min(1),
    hostedZoneName: HostnameSchema,
  })
  .refine((domain) => isWithinZone(domain.hostname, domain.hostedZoneName), {
    message: 'Hostname must be inside the hosted zone',
    path: ['hostname'],
  });

export const DeploymentConfigSchema = z.object({
  stage: z
    .string()
    .regex(/^[a-z][a-z0-9-]*$/, 'Stage must be lower-case letters, digits and dashes')
    .default('dev'),
  account: z
    .string()
    .regex(/^\d{12}$/, 'Account must be a 12-digit AWS account id')
    .optional(),
  region: z.string().min(1).default('us-east-1'),
  domain: DomainConfigSchema,
  accessLogRetention: z.nativeEnum(logs.RetentionDays).default(logs.RetentionDays.ONE_WEEK),
  computeTimeoutSeconds: z
    .number()
    .int()
    .min(1)
    .max(MAX_INTEGRATION_TIMEOUT_SECONDS - 1)
    .default(10),
  computeMemoryMb: z.number().int().min(128).max(10240).default(256),
  sentryDsn: z.string().url().optional(),
});

export type DomainConfig = z.infer<typeof DomainConfigSchema>;
export type DeploymentConfig = z.infer<typeof DeploymentConfigSchema>;
export type DeploymentConfigInput = z.input<typeof DeploymentConfigSchema>;

export function parseDeploymentConfig(raw: unknown): DeploymentConfig {
  const result = DeploymentConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ${CONTEXT_KEY} configuration: ${details}`);
  }
  return result.data;
}

export function loadDeploymentConfig(scope: Construct): DeploymentConfig {
  return parseDeploymentConfig(scope.node.tryGetContext(CONTEXT_KEY) ?? {});
}

export const isProductionStage = (stage: string): boolean => stage === 'prod';

export const removalPolicyFor = (stage: string): cdk.RemovalPolicy =>
  isProductionStage(stage) ? cdk.RemovalPolicy.RETAIN : cdk.RemovalPolicy.DESTROY;
