import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as logs from 'aws-cdk-lib/aws-logs';
import { Construct } from 'constructs';

/**
 * Everything a compute handler may touch. Anything outside this set is
 * denied by IAM.
 */
export type ComputeCapability =
  | { kind: 'table-read-write'; table: dynamodb.ITable }
  | { kind: 'log-sink'; logGroup: logs.ILogGroup }
  | { kind: 'trace-sink' };

export type ComputeCapabilityKind = ComputeCapability['kind'];

export const TABLE_READ_WRITE_ACTIONS = ['dynamodb:GetItem', 'dynamodb:PutItem', 'dynamodb:UpdateItem'];
export const LOG_SINK_ACTIONS = ['logs:CreateLogStream', 'logs:PutLogEvents'];
export const TRACE_SINK_ACTIONS = ['xray:PutTraceSegments', 'xray:PutTelemetryRecords'];

const REQUIRED_KINDS: readonly ComputeCapabilityKind[] = ['table-read-write', 'log-sink', 'trace-sink'];

/**
 * A handler gets one table, one log group and the trace sink, each exactly
 * once. Throws at synthesis otherwise.
 */
export function assertCapabilitySet(capabilities: readonly ComputeCapability[]): void {
  for (const kind of REQUIRED_KINDS) {
    const count = capabilities.filter((capability) => capability.kind === kind).length;
    if (count !== 1) {
      throw new Error(`Compute boundary requires exactly one '${kind}' capability, got ${count}`);
    }
  }
}

export function capabilityStatement(capability: ComputeCapability): iam.PolicyStatement {
  switch (capability.kind) {
    case 'table-read-write':
      // The table ARN only: no index or wildcard access.
      return new iam.PolicyStatement({
        sid: 'TableReadWrite',
        actions: TABLE_READ_WRITE_ACTIONS,
        resources: [capability.table.tableArn],
      });
    case 'log-sink':
      return new iam.PolicyStatement({
        sid: 'LogSink',
        actions: LOG_SINK_ACTIONS,
        resources: [capability.logGroup.logGroupArn],
      });
    case 'trace-sink':
      // X-Ray has no resource-level permissions.
      return new iam.PolicyStatement({
        sid: 'TraceSink',
        actions: TRACE_SINK_ACTIONS,
        resources: ['*'],
      });
  }
}

export interface ComputeSecurityBoundaryProps {
  capabilities: readonly ComputeCapability[];
}

/**
 * Execution role built from an explicit capability set. The role handed out
 * is sealed: later grants (including the ones Lambda adds for tracing) are
 * dropped, so the synthesized policy is exactly the declared set.
 */
export class ComputeSecurityBoundary extends Construct {
  public readonly role: iam.IRole;
  public readonly capabilities: readonly ComputeCapability[];

  constructor(scope: Construct, id: string, props: ComputeSecurityBoundaryProps) {
    super(scope, id);

    assertCapabilitySet(props.capabilities);
    this.capabilities = props.capabilities;

    const role = new iam.Role(this, 'Role', {
      assumedBy: new iam.ServicePrincipal('lambda.amazonaws.com'),
      description: 'Compute execution role limited to its declared capabilities',
      inlinePolicies: {
        ComputeCapabilities: new iam.PolicyDocument({
          statements: props.capabilities.map(capabilityStatement),
        }),
      },
    });

    this.role = role.withoutPolicyUpdates();
  }
}
