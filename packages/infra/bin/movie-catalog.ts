#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { Aspects } from 'aws-cdk-lib';
import { AwsSolutionsChecks } from 'cdk-nag';
import { ApiStack } from '../api-stack';
import { addApiGatewaySuppressions, addLambdaSuppressions } from '../cdk-nag-suppressions';
import { loadDeploymentConfig } from '../config';
import { DatabaseStack } from '../database-stack';

const app = new cdk.App();
const config = loadDeploymentConfig(app);
const { stage } = config;

const env = {
  account: config.account ?? process.env.CDK_DEFAULT_ACCOUNT,
  region: config.region,
};

const db = new DatabaseStack(app, `MovieCatalog-Database-${stage}`, {
  env,
  stage,
});

const api = new ApiStack(app, `MovieCatalog-Api-${stage}`, {
  env,
  stage,
  moviesTable: db.moviesTable,
  config,
});

addLambdaSuppressions(api);
addApiGatewaySuppressions(api);

Aspects.of(app).add(new AwsSolutionsChecks({ verbose: true }));
