import * as cdk from 'aws-cdk-lib';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as nodejs from 'aws-cdk-lib/aws-lambda-nodejs';
import * as apigateway from 'aws-cdk-lib/aws-apigateway';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as logs from 'aws-cdk-lib/aws-logs';
import { Construct } from 'constructs';
import { MAX_INTEGRATION_TIMEOUT_SECONDS } from '../config';
import { ComputeSecurityBoundary } from './compute-security-boundary';
import type { DomainRoutes } from './routes/types';

export interface ApiDomainRoutesProps {
  api: apigateway.RestApi;
  table: dynamodb.ITable;
  commonEnv: Record<string, string>;
  domain: DomainRoutes;
  timeoutSeconds: number;
  memorySize: number;
  removalPolicy: cdk.RemovalPolicy;
}

/** Time the handler keeps back to answer after its storage deadline. */
export const RESPONSE_RESERVE_MS = 500;

/**
 * Creates one Lambda function per route of a domain and binds it under the
 * domain's base path. Each function runs inside its own security boundary.
 */
export class ApiDomainRoutes extends Construct {
  public readonly functions: nodejs.NodejsFunction[] = [];

  constructor(scope: Construct, id: string, props: ApiDomainRoutesProps) {
    super(scope, id);

    const { api, table, commonEnv, domain, timeoutSeconds } = props;

    let domainResource: apigateway.IResource = api.root;
    for (const pathSegment of domain.basePath.split('/').filter((s) => s)) {
      domainResource = domainResource.getResource(pathSegment) ?? domainResource.addResource(pathSegment);
    }

    for (const route of domain.routes) {
      // Method is part of the id so two methods on one path get distinct log groups.
      const functionId = [route.method.toLowerCase(), domain.basePath, route.path, 'handler']
        .filter((s) => s)
        .join('-')
        .replace(/\//g, '-');

      const logGroup = new logs.LogGroup(this, `${functionId}-logs`, {
        retention: logs.RetentionDays.ONE_MONTH,
        removalPolicy: props.removalPolicy,
      });

      const boundary = new ComputeSecurityBoundary(this, `${functionId}-boundary`, {
        capabilities: [
          { kind: 'table-read-write', table },
          { kind: 'log-sink', logGroup },
          { kind: 'trace-sink' },
        ],
      });

      const lambdaFunction = new nodejs.NodejsFunction(this, functionId, {
        runtime: lambda.Runtime.NODEJS_20_X,
        entry: route.entry,
        handler: 'handler',
        timeout: cdk.Duration.seconds(timeoutSeconds),
        memorySize: props.memorySize,
        role: boundary.role,
        tracing: lambda.Tracing.ACTIVE,
        environment: {
          ...commonEnv,
          COMMAND_TIMEOUT_MS: String(timeoutSeconds * 1000 - RESPONSE_RESERVE_MS),
        },
        logGroup,
        bundling: {
          externalModules: ['@aws-sdk/*', '@smithy/*', '@aws-crypto/*'],
          minify: true,
          sourceMap: false,
          target: 'es2022',
          format: nodejs.OutputFormat.CJS,
          mainFields: ['module', 'main'],
        },
      });
      this.functions.push(lambdaFunction);

      let resourcePath: apigateway.IResource = domainResource;
      for (const segment of route.path.split('/').filter((s) => s)) {
        resourcePath = resourcePath.getResource(segment) ?? resourcePath.addResource(segment);
      }

      const integration = new apigateway.LambdaIntegration(lambdaFunction, {
        timeout: cdk.Duration.seconds(Math.min(timeoutSeconds + 1, MAX_INTEGRATION_TIMEOUT_SECONDS)),
      });

      resourcePath.addMethod(route.method, integration, {
        authorizationType: apigateway.AuthorizationType.NONE,
      });
    }
  }
}
