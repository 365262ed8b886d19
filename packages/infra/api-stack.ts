import * as cdk from 'aws-cdk-lib';
import * as apigw from 'aws-cdk-lib/aws-apigateway';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import { Construct } from 'constructs';
import { ApiAccessLogging } from './api/api-access-logging';
import { ApiCustomDomain } from './api/api-custom-domain';
import { ApiDomainRoutes } from './api/api-domain-routes';
import { apiDomains, collectRouteKeys } from './api/routes';
import { removalPolicyFor, type DeploymentConfig } from './config';

export interface ApiStackProps extends cdk.StackProps {
  stage: string;
  moviesTable: dynamodb.ITable;
  config: DeploymentConfig;
}

/** `message` is a JSON value: a quoted literal or a self-quoting `$context` variable. */
const errorTemplate = (message: string): Record<string, string> => ({
  'application/json': `{"message":${message},"requestId":"$context.requestId"}`,
});

const literal = (text: string): string => JSON.stringify(text);

// API Gateway renders this already quoted and escaped.
const GATEWAY_ERROR_MESSAGE = '$context.error.messageString';

export class ApiStack extends cdk.Stack {
  public readonly api: apigw.RestApi;
  public readonly accessLogging: ApiAccessLogging;
  public readonly customDomain: ApiCustomDomain;
  public readonly routeKeys: string[];

  constructor(scope: Construct, id: string, props: ApiStackProps) {
    super(scope, id, props);

    const { stage, moviesTable, config } = props;
    const removalPolicy = removalPolicyFor(stage);

    // 1) Access log sink, ahead of the stage that writes to it
    this.accessLogging = new ApiAccessLogging(this, 'AccessLogging', {
      retention: config.accessLogRetention,
      removalPolicy,
    });

    // 2) REST API, reachable only through the custom domain
    this.api = new apigw.RestApi(this, 'MovieCatalogApi', {
      restApiName: `Movie Catalog API (${stage})`,
      description: 'Movie catalog write API',
      endpointConfiguration: { types: [apigw.EndpointType.REGIONAL] },
      disableExecuteApiEndpoint: true,
      cloudWatchRole: true,
      cloudWatchRoleRemovalPolicy: removalPolicy,
      deployOptions: {
        stageName: stage,
        metricsEnabled: true,
        tracingEnabled: true,
        loggingLevel: apigw.MethodLoggingLevel.ERROR,
        dataTraceEnabled: false,
        accessLogDestination: this.accessLogging.destination,
        accessLogFormat: this.accessLogging.format,
      },
    });
    this.api.deploymentStage.node.addDependency(this.accessLogging);

    // 3) Gateway responses. REST APIs answer an unknown method or path with
    //    MISSING_AUTHENTICATION_TOKEN (403) before any integration runs.
    this.api.addGatewayResponse('RouteNotFound', {
      type: apigw.ResponseType.MISSING_AUTHENTICATION_TOKEN,
      statusCode: '404',
      templates: errorTemplate(literal('Route not found')),
    });
    this.api.addGatewayResponse('IntegrationFailure', {
      type: apigw.ResponseType.INTEGRATION_FAILURE,
      statusCode: '502',
      templates: errorTemplate(literal('Integration failure')),
    });
    this.api.addGatewayResponse('IntegrationTimeout', {
      type: apigw.ResponseType.INTEGRATION_TIMEOUT,
      statusCode: '504',
      templates: errorTemplate(literal('Integration timed out')),
    });
    this.api.addGatewayResponse('Default4XX', {
      type: apigw.ResponseType.DEFAULT_4XX,
      templates: errorTemplate(GATEWAY_ERROR_MESSAGE),
    });
    this.api.addGatewayResponse('Default5XX', {
      type: apigw.ResponseType.DEFAULT_5XX,
      templates: errorTemplate(GATEWAY_ERROR_MESSAGE),
    });

    // 4) Common env that every handler gets
    const commonEnv: Record<string, string> = {
      STAGE: stage,
      NODE_ENV: 'production',
      REGION: this.region,
      MOVIES_TABLE_NAME: moviesTable.tableName,
      SENTRY_ENVIRONMENT: stage,
      ...(config.sentryDsn ? { SENTRY_DSN: config.sentryDsn } : {}),
    };

    // 5) Routes; a duplicate method+path fails synthesis
    const domains = apiDomains();
    this.routeKeys = collectRouteKeys(domains);
    for (const domain of domains) {
      new ApiDomainRoutes(this, `${domain.basePath}Routes`, {
        api: this.api,
        table: moviesTable,
        commonEnv,
        domain,
        timeoutSeconds: config.computeTimeoutSeconds,
        memorySize: config.computeMemoryMb,
        removalPolicy,
      });
    }

    // 6) TLS hostname
    this.customDomain = new ApiCustomDomain(this, 'CustomDomain', {
      api: this.api,
      hostname: config.domain.hostname,
      hostedZoneId: config.domain.hostedZoneId,
      hostedZoneName: config.domain.hostedZoneName,
    });

    // Outputs
    new cdk.CfnOutput(this, 'ApiUrl', {
      value: this.customDomain.url,
      description: 'Custom domain URL of the movie catalog API',
    });

    new cdk.CfnOutput(this, 'ApiAliasTarget', {
      value: this.customDomain.domainName.domainNameAliasDomainName,
      description: 'Regional endpoint the custom domain aliases to',
    });

    new cdk.CfnOutput(this, 'AccessLogGroupName', {
      value: this.accessLogging.logGroup.logGroupName,
      description: 'CloudWatch log group receiving API access logs',
    });
  }
}
