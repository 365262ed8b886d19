import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import { MOVIE_PARTITION_KEY, MOVIE_SORT_KEY } from '@movie-catalog/core';
import { removalPolicyFor } from './config';

export interface DatabaseStackProps extends cdk.StackProps {
  /**
   * Stage name: e.g. "dev", "test", "prod"
   */
  stage: string;
}

export class DatabaseStack extends cdk.Stack {
  public readonly moviesTable: dynamodb.Table;

  constructor(scope: Construct, id: string, props: DatabaseStackProps) {
    super(scope, id, props);

    const { stage } = props;

    // Catalog entries keyed by (year, title). No secondary indexes: the only
    // access pattern is an unconditional put by full key.
    this.moviesTable = new dynamodb.Table(this, 'MoviesTable', {
      tableName: `movies-${stage}`,
      partitionKey: {
        name: MOVIE_PARTITION_KEY,
        type: dynamodb.AttributeType.NUMBER,
      },
      sortKey: { name: MOVIE_SORT_KEY, type: dynamodb.AttributeType.STRING },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      removalPolicy: removalPolicyFor(stage),
      pointInTimeRecoverySpecification: {
        pointInTimeRecoveryEnabled: true,
      },
      encryption: dynamodb.TableEncryption.AWS_MANAGED,
    });

    // Outputs
    new cdk.CfnOutput(this, 'TableName', {
      value: this.moviesTable.tableName,
      description: 'DynamoDB table name',
    });

    new cdk.CfnOutput(this, 'TableArn', {
      value: this.moviesTable.tableArn,
      description: 'DynamoDB table ARN for movies',
    });
  }
}
