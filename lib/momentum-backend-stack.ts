import * as cdk from 'aws-cdk-lib';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as rds from 'aws-cdk-lib/aws-rds';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as apigateway from 'aws-cdk-lib/aws-apigateway';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as events from 'aws-cdk-lib/aws-events';
import * as targets from 'aws-cdk-lib/aws-events-targets';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { Construct } from 'constructs';

/**
 * Momentum Backend Stack
 * 
 * - VPC with 2 AZs and NAT gateway (the poller reaches the football feed)
 * - RDS PostgreSQL (encrypted, credentials in Secrets Manager)
 * - API Lambda behind an API Gateway proxy
 * - Poller Lambda on a one-minute EventBridge schedule, reserved concurrency 1
 * - Migration Lambda
 * - CloudWatch alarms for monitoring
 */
export class MomentumBackendStack extends cdk.Stack {
  constructor(scope: Construct, id: string, props?: cdk.StackProps) {
    super(scope, id, props);

    // Empty key runs the poller in demo mode
    const apiKeyContext: unknown = this.node.tryGetContext('footballDataApiKey');
    const footballDataApiKey = typeof apiKeyContext === 'string' ? apiKeyContext : '';

    // ========================================
    // VPC with 2 AZs and 1 NAT Gateway
    // ========================================
    const vpc = new ec2.Vpc(this, 'MomentumVPC', {
      maxAzs: 2,
      natGateways: 1,
      subnetConfiguration: [
        {
          name: 'Public',
          subnetType: ec2.SubnetType.PUBLIC,
          cidrMask: 24,
        },
        {
          name: 'Private',
          subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
          cidrMask: 24,
        },
        {
          name: 'Isolated',
          subnetType: ec2.SubnetType.PRIVATE_ISOLATED,
          cidrMask: 24,
        },
      ],
    });

    // ========================================
    // RDS PostgreSQL Instance
    // ========================================
    const dbSecurityGroup = new ec2.SecurityGroup(this, 'DatabaseSecurityGroup', {
      vpc,
      description: 'Security group for RDS PostgreSQL instance',
      allowAllOutbound: false,
    });

    const dbCredentials = new secretsmanager.Secret(this, 'DBCredentials', {
      secretName: 'momentum/db/credentials',
      description: 'RDS PostgreSQL credentials for Momentum FC',
      generateSecretString: {
        secretStringTemplate: JSON.stringify({ username: 'momentum_admin' }),
        generateStringKey: 'password',
        excludePunctuation: true,
        includeSpace: false,
        passwordLength: 32,
      },
    });

    const sessionSecret = new secretsmanager.Secret(this, 'SessionSecret', {
      secretName: 'momentum/session/secret',
      description: 'HMAC key for prediction game session tokens',
      generateSecretString: {
        excludePunctuation: true,
        passwordLength: 64,
      },
    });

    const database = new rds.DatabaseInstance(this, 'MomentumDatabase', {
      engine: rds.DatabaseInstanceEngine.postgres({
        version: rds.PostgresEngineVersion.VER_15,
      }),
      instanceType: ec2.InstanceType.of(ec2.InstanceClass.T3, ec2.InstanceSize.MICRO),
      vpc,
      vpcSubnets: {
        subnetType: ec2.SubnetType.PRIVATE_ISOLATED,
      },
      securityGroups: [dbSecurityGroup],
      allocatedStorage: 20,
      maxAllocatedStorage: 100,
      storageEncrypted: true,
      credentials: rds.Credentials.fromSecret(dbCredentials),
      databaseName: 'momentum',
      backupRetention: cdk.Duration.days(7),
      removalPolicy: cdk.RemovalPolicy.SNAPSHOT,
      deletionProtection: true,
    });

    // ========================================
    // Lambda Functions
    // ========================================
    const lambdaSecurityGroup = new ec2.SecurityGroup(this, 'LambdaSecurityGroup', {
      vpc,
      description: 'Security group for Lambda functions',
      allowAllOutbound: true,
    });

    dbSecurityGroup.addIngressRule(
      lambdaSecurityGroup,
      ec2.Port.tcp(5432),
      'Allow Lambda to connect to RDS'
    );

    const sharedEnvironment: Record<string, string> = {
      NODE_ENV: 'production',
      DB_HOST: database.dbInstanceEndpointAddress,
      DB_PORT: database.dbInstanceEndpointPort,
      DB_NAME: 'momentum',
      DB_SECRET_ARN: dbCredentials.secretArn,
      DB_SSL: 'true',
      SESSION_SECRET: sessionSecret.secretValue.unsafeUnwrap(),
      FOOTBALL_DATA_API_KEY: footballDataApiKey,
      FOOTBALL_DATA_COMPETITIONS: '2021,2014,2001,2002,2019,2015',
      SNAPSHOT_RETENTION: '2000',
      LOG_LEVEL: 'info',
      AWS_NODEJS_CONNECTION_REUSE_ENABLED: '1',
    };

    const functionDefaults = {
      runtime: lambda.Runtime.NODEJS_20_X,
      code: lambda.Code.fromAsset('dist'),
      vpc,
      vpcSubnets: {
        subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
      },
      securityGroups: [lambdaSecurityGroup],
      environment: sharedEnvironment,
    };

    const apiFunction = new lambda.Function(this, 'MomentumAPIFunction', {
      ...functionDefaults,
      functionName: 'momentum-api',
      handler: 'src/index.handler',
      timeout: cdk.Duration.seconds(30),
      memorySize: 512,
    });

    // One cycle at a time: EventBridge ticks never run concurrently
    const pollerFunction = new lambda.Function(this, 'MomentumPollerFunction', {
      ...functionDefaults,
      functionName: 'momentum-poller',
      handler: 'src/index.pollHandler',
      timeout: cdk.Duration.seconds(50),
      memorySize: 512,
      reservedConcurrentExecutions: 1,
    });

    const migrationFunction = new lambda.Function(this, 'MomentumMigrationFunction', {
      ...functionDefaults,
      functionName: 'momentum-migrations',
      handler: 'src/index.migrationHandler',
      timeout: cdk.Duration.minutes(2),
      memorySize: 256,
    });

    for (const fn of [apiFunction, pollerFunction, migrationFunction]) {
      dbCredentials.grantRead(fn);
    }

    pollerFunction.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ['cloudwatch:PutMetricData'],
        resources: ['*'],
        conditions: {
          StringEquals: { 'cloudwatch:namespace': 'MomentumFC/Backend' },
        },
      })
    );

    // VPC Endpoint for Secrets Manager
    vpc.addInterfaceEndpoint('SecretsManagerEndpoint', {
      service: ec2.InterfaceVpcEndpointAwsService.SECRETS_MANAGER,
      subnets: {
        subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
      },
      privateDnsEnabled: true,
    });

    // ========================================
    // Poll Schedule
    // ========================================
    new events.Rule(this, 'PollScheduleRule', {
      ruleName: 'momentum-poll-schedule',
      description: 'Poll the live football feed every minute',
      schedule: events.Schedule.rate(cdk.Duration.minutes(1)),
      targets: [new targets.LambdaFunction(pollerFunction, { retryAttempts: 0 })],
    });

    // ========================================
    // API Gateway
    // ========================================
    const api = new apigateway.RestApi(this, 'MomentumAPI', {
      restApiName: 'Momentum FC API',
      description: 'Live match momentum, dashboards and prediction game',
      deployOptions: {
        stageName: 'v1',
        throttlingRateLimit: 100,
        throttlingBurstLimit: 200,
        loggingLevel: apigateway.MethodLoggingLevel.INFO,
        metricsEnabled: true,
      },
      defaultCorsPreflightOptions: {
        allowOrigins: apigateway.Cors.ALL_ORIGINS,
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Content-Type', 'Cookie'],
        allowCredentials: true,
      },
    });

    const lambdaIntegration = new apigateway.LambdaIntegration(apiFunction, {
      proxy: true,
      allowTestInvoke: true,
    });

    api.root.addMethod('ANY', lambdaIntegration);
    api.root.addProxy({
      defaultIntegration: lambdaIntegration,
      anyMethod: true,
    });

    // ========================================
    // CloudWatch Alarms
    // ========================================
    new cloudwatch.Alarm(this, 'LambdaErrorAlarm', {
      alarmName: 'momentum-api-errors',
      alarmDescription: 'Alert when API Lambda error rate exceeds threshold',
      metric: apiFunction.metricErrors({
        statistic: 'Sum',
        period: cdk.Duration.minutes(5),
      }),
      threshold: 10,
      evaluationPeriods: 2,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });

    new cloudwatch.Alarm(this, 'PollerErrorAlarm', {
      alarmName: 'momentum-poller-errors',
      alarmDescription: 'Alert when poll cycles fail',
      metric: pollerFunction.metricErrors({
        statistic: 'Sum',
        period: cdk.Duration.minutes(5),
      }),
      threshold: 3,
      evaluationPeriods: 1,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });

    new cloudwatch.Alarm(this, 'FeedUnavailableAlarm', {
      alarmName: 'momentum-feed-unavailable',
      alarmDescription: 'Alert when the football feed is unavailable for several cycles',
      metric: new cloudwatch.Metric({
        namespace: 'MomentumFC/Backend',
        metricName: 'FeedUnavailable',
        statistic: 'Sum',
        period: cdk.Duration.minutes(5),
      }),
      threshold: 4,
      evaluationPeriods: 1,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });

    new cloudwatch.Alarm(this, 'API5xxErrorAlarm', {
      alarmName: 'momentum-api-5xx-errors',
      alarmDescription: 'Alert when API Gateway 5xx error rate is high',
      metric: api.metricServerError({
        statistic: 'Sum',
        period: cdk.Duration.minutes(5),
      }),
      threshold: 10,
      evaluationPeriods: 2,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });

    // ========================================
    // Stack Outputs
    // ========================================
    new cdk.CfnOutput(this, 'APIEndpoint', {
      value: api.url,
      description: 'API Gateway endpoint URL',
      exportName: 'MomentumAPIEndpoint',
    });

    new cdk.CfnOutput(this, 'DatabaseEndpoint', {
      value: database.dbInstanceEndpointAddress,
      description: 'RDS PostgreSQL endpoint',
      exportName: 'MomentumDatabaseEndpoint',
    });

    new cdk.CfnOutput(this, 'MigrationFunctionName', {
      value: migrationFunction.functionName,
      description: 'Invoke once after deploy to create the schema',
      exportName: 'MomentumMigrationFunctionName',
    });
  }
}
