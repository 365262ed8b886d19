import * as cdk from 'aws-cdk-lib';
import * as apigw from 'aws-cdk-lib/aws-apigateway';
import * as logs from 'aws-cdk-lib/aws-logs';
import { Construct } from 'constructs';
import { ACCESS_LOG_FIELD_NAMES, type AccessLogFieldName } from '@movie-catalog/core';

/** `$context` variable behind each access log field. */
export const ACCESS_LOG_CONTEXT: Record<AccessLogFieldName, string> = {
  requestId: apigw.AccessLogField.contextRequestId(),
  sourceIp: apigw.AccessLogField.contextIdentitySourceIp(),
  requestTime: apigw.AccessLogField.contextRequestTime(),
  protocol: apigw.AccessLogField.contextProtocol(),
  httpMethod: apigw.AccessLogField.contextHttpMethod(),
  routeKey: apigw.AccessLogField.contextResourcePath(),
  status: apigw.AccessLogField.contextStatus(),
  responseLength: apigw.AccessLogField.contextResponseLength(),
  integrationError: apigw.AccessLogField.contextIntegrationErrorMessage(),
};

/** One JSON object per request, keys in ACCESS_LOG_FIELD_NAMES order. */
export function accessLogFormat(): apigw.AccessLogFormat {
  const fields: Record<string, string> = {};
  for (const name of ACCESS_LOG_FIELD_NAMES) {
    fields[name] = ACCESS_LOG_CONTEXT[name];
  }
  return apigw.AccessLogFormat.custom(JSON.stringify(fields));
}

export interface ApiAccessLoggingProps {
  retention: logs.RetentionDays;
  removalPolicy: cdk.RemovalPolicy;
}

/**
 * Durable sink for the stage's access log. Must be created before the stage
 * that writes to it.
 */
export class ApiAccessLogging extends Construct {
  public readonly logGroup: logs.LogGroup;
  public readonly destination: apigw.IAccessLogDestination;
  public readonly format: apigw.AccessLogFormat;

  constructor(scope: Construct, id: string, props: ApiAccessLoggingProps) {
    super(scope, id);

    this.logGroup = new logs.LogGroup(this, 'LogGroup', {
      retention: props.retention,
      removalPolicy: props.removalPolicy,
    });

    this.destination = new apigw.LogGroupLogDestination(this.logGroup);
    this.format = accessLogFormat();
  }
}
