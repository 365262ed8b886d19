import * as cdk from 'aws-cdk-lib';
import { Template } from 'aws-cdk-lib/assertions';
import * as logs from 'aws-cdk-lib/aws-logs';
import { ACCESS_LOG_FIELD_NAMES } from '@movie-catalog/core';
import { accessLogFormat, ApiAccessLogging } from './api-access-logging';

describe('accessLogFormat', () => {
  it('renders one JSON object of context variables', () => {
    expect(JSON.parse(accessLogFormat().toString())).toEqual({
      requestId: '$context.requestId',
      sourceIp: '$context.identity.sourceIp',
      requestTime: '$context.requestTime',
      protocol: '$context.protocol',
      httpMethod: '$context.httpMethod',
      routeKey: '$context.resourcePath',
      status: '$context.status',
      responseLength: '$context.responseLength',
      integrationError: '$context.integrationErrorMessage',
    });
  });

  it('keeps the record field order', () => {
    expect(Object.keys(JSON.parse(accessLogFormat().toString()))).toEqual([...ACCESS_LOG_FIELD_NAMES]);
  });
});

describe('ApiAccessLogging', () => {
  it('creates a log group with the configured retention', () => {
    const stack = new cdk.Stack(new cdk.App(), 'LoggingStack');
    new ApiAccessLogging(stack, 'AccessLogging', {
      retention: logs.RetentionDays.ONE_WEEK,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
    });

    const template = Template.fromStack(stack);
    template.hasResourceProperties('AWS::Logs::LogGroup', { RetentionInDays: 7 });
    template.hasResource('AWS::Logs::LogGroup', { DeletionPolicy: 'Delete' });
  });
});
