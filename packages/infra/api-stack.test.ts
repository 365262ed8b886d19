import * as cdk from 'aws-cdk-lib';
import { Match, Template } from 'aws-cdk-lib/assertions';
import { ACCESS_LOG_FIELD_NAMES } from '@movie-catalog/core';
import { ApiStack } from './api-stack';
import { parseDeploymentConfig, type DeploymentConfigInput } from './config';
import { DatabaseStack } from './database-stack';

const domain = {
  hostname: 'movies.example.com',
  hostedZoneId: 'Z0123456789EXAMPLE',
  hostedZoneName: 'example.com',
};

const synth = (overrides: Partial<DeploymentConfigInput> = {}) => {
  // Skip asset bundling; the template is what is under test.
  const app = new cdk.App({ context: { 'aws:cdk:bundling-stacks': [] } });
  const config = parseDeploymentConfig({ stage: 'test', domain, ...overrides });
  const db = new DatabaseStack(app, 'Database', { stage: config.stage });
  const stack = new ApiStack(app, 'Api', { stage: config.stage, moviesTable: db.moviesTable, config });
  return { stack, template: Template.fromStack(stack) };
};

describe('ApiStack', () => {
  const { stack, template } = synth();

  describe('routing', () => {
    it('binds exactly POST /movies', () => {
      expect(stack.routeKeys).toEqual(['POST /movies']);
      template.resourceCountIs('AWS::ApiGateway::Method', 1);
      template.resourceCountIs('AWS::ApiGateway::Resource', 1);
      template.hasResourceProperties('AWS::ApiGateway::Resource', { PathPart: 'movies' });
      template.hasResourceProperties('AWS::ApiGateway::Method', {
        HttpMethod: 'POST',
        AuthorizationType: 'NONE',
        Integration: Match.objectLike({ Type: 'AWS_PROXY', TimeoutInMillis: 11000 }),
      });
    });

    it('answers unmatched routes with 404 before any integration', () => {
      template.hasResourceProperties('AWS::ApiGateway::GatewayResponse', {
        ResponseType: 'MISSING_AUTHENTICATION_TOKEN',
        StatusCode: '404',
        ResponseTemplates: {
          'application/json': '{"message":"Route not found","requestId":"$context.requestId"}',
        },
      });
    });

    it('lets API Gateway quote its own error message in default responses', () => {
      for (const responseType of ['DEFAULT_4XX', 'DEFAULT_5XX']) {
        template.hasResourceProperties('AWS::ApiGateway::GatewayResponse', {
          ResponseType: responseType,
          ResponseTemplates: {
            'application/json': '{"message":$context.error.messageString,"requestId":"$context.requestId"}',
          },
        });
      }
    });

    it('maps integration failures to 502 and 504', () => {
      template.hasResourceProperties('AWS::ApiGateway::GatewayResponse', {
        ResponseType: 'INTEGRATION_FAILURE',
        StatusCode: '502',
      });
      template.hasResourceProperties('AWS::ApiGateway::GatewayResponse', {
        ResponseType: 'INTEGRATION_TIMEOUT',
        StatusCode: '504',
      });
    });

    it('disables the default execute-api endpoint', () => {
      template.hasResourceProperties('AWS::ApiGateway::RestApi', {
        DisableExecuteApiEndpoint: true,
        EndpointConfiguration: { Types: ['REGIONAL'] },
      });
    });
  });

  describe('access logging', () => {
    const accessLogGroupId = () => {
      const groups = template.findResources('AWS::Logs::LogGroup', { Properties: { RetentionInDays: 7 } });
      expect(Object.keys(groups)).toHaveLength(1);
      return Object.keys(groups)[0];
    };

    const stageResource = () => {
      const stages = template.findResources('AWS::ApiGateway::Stage');
      expect(Object.keys(stages)).toHaveLength(1);
      return Object.values(stages)[0];
    };

    it('writes one JSON record per request to the log group', () => {
      const { Properties } = stageResource();

      expect(Properties.AccessLogSetting.DestinationArn).toEqual({
        'Fn::GetAtt': [accessLogGroupId(), 'Arn'],
      });
      expect(Object.keys(JSON.parse(Properties.AccessLogSetting.Format))).toEqual([...ACCESS_LOG_FIELD_NAMES]);
    });

    it('creates the log group before the stage', () => {
      expect(stageResource().DependsOn).toEqual(expect.arrayContaining([accessLogGroupId()]));
    });

    it('enables tracing and error-level execution logs on the stage', () => {
      template.hasResourceProperties('AWS::ApiGateway::Stage', {
        StageName: 'test',
        TracingEnabled: true,
        MethodSettings: [
          Match.objectLike({ LoggingLevel: 'ERROR', DataTraceEnabled: false, MetricsEnabled: true }),
        ],
      });
    });

    it('uses the configured retention', () => {
      const custom = synth({ accessLogRetention: 30 }).template;

      custom.hasResourceProperties('AWS::Logs::LogGroup', { RetentionInDays: 30 });
      expect(Object.keys(custom.findResources('AWS::Logs::LogGroup', { Properties: { RetentionInDays: 7 } }))).toHaveLength(0);
    });
  });

  describe('compute', () => {
    it('runs the handler with tracing and a bounded command timeout', () => {
      template.hasResourceProperties('AWS::Lambda::Function', {
        Runtime: 'nodejs20.x',
        Handler: 'index.handler',
        Timeout: 10,
        MemorySize: 256,
        TracingConfig: { Mode: 'Active' },
        Environment: {
          Variables: Match.objectLike({
            MOVIES_TABLE_NAME: Match.anyValue(),
            COMMAND_TIMEOUT_MS: '9500',
            SENTRY_ENVIRONMENT: 'test',
            SENTRY_DSN: Match.absent(),
          }),
        },
      });
    });

    it('passes the Sentry DSN when configured', () => {
      synth({ sentryDsn: 'https://public@sentry.example.com/1' }).template.hasResourceProperties(
        'AWS::Lambda::Function',
        {
          Environment: {
            Variables: Match.objectLike({ SENTRY_DSN: 'https://public@sentry.example.com/1' }),
          },
        },
      );
    });

    it('follows the configured compute timeout', () => {
      const custom = synth({ computeTimeoutSeconds: 28 }).template;

      custom.hasResourceProperties('AWS::Lambda::Function', {
        Timeout: 28,
        Environment: { Variables: Match.objectLike({ COMMAND_TIMEOUT_MS: '27500' }) },
      });
      custom.hasResourceProperties('AWS::ApiGateway::Method', {
        Integration: Match.objectLike({ TimeoutInMillis: 29000 }),
      });
    });

    it('gives the handler no permission beyond its boundary', () => {
      template.resourceCountIs('AWS::IAM::Policy', 0);
      template.hasResourceProperties('AWS::IAM::Role', {
        ManagedPolicyArns: Match.absent(),
        Policies: [
          Match.objectLike({
            PolicyName: 'ComputeCapabilities',
            PolicyDocument: Match.objectLike({
              Statement: [
                Match.objectLike({ Sid: 'TableReadWrite' }),
                Match.objectLike({ Sid: 'LogSink' }),
                Match.objectLike({ Sid: 'TraceSink' }),
              ],
            }),
          }),
        ],
      });
    });
  });

  describe('custom domain', () => {
    it('outputs the domain url', () => {
      template.hasOutput('ApiUrl', { Value: 'https://movies.example.com' });
    });

    it('fronts the API with the TLS hostname', () => {
      template.hasResourceProperties('AWS::ApiGateway::DomainName', {
        DomainName: 'movies.example.com',
        SecurityPolicy: 'TLS_1_2',
      });
      template.resourceCountIs('AWS::ApiGateway::BasePathMapping', 1);
      template.resourceCountIs('AWS::Route53::RecordSet', 1);
    });
  });
});
