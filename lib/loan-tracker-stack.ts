import * as cdk from 'aws-cdk-lib';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as apigateway from 'aws-cdk-lib/aws-apigateway';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { Construct } from 'constructs';

export interface LoanTrackerStackProps extends cdk.StackProps {
  spreadsheetName: string;
  weekConvention?: 'monday' | 'sunday';
  cacheTtlSeconds?: number;
  code?: lambda.Code;          // defaults to the compiled dist/ folder
}

/**
 * Loan Tracker Stack
 *
 * - Secrets Manager secret holding the Google service account JSON
 * - Lambda function for API logic
 * - API Gateway proxying every route to the function
 * - CloudWatch alarms for errors, duration and slow spreadsheet writes
 */
export class LoanTrackerStack extends cdk.Stack {
  constructor(scope: Construct, id: string, props: LoanTrackerStackProps) {
    super(scope, id, props);

    // ========================================
    // Service account credential
    // ========================================
    // The JSON key is pasted into the secret after the first deploy
    const serviceAccountSecret = new secretsmanager.Secret(this, 'GoogleServiceAccount', {
      secretName: 'loan-tracker/google-service-account',
      description: 'Google service account JSON with access to the loans spreadsheet',
    });

    // ========================================
    // Lambda Function
    // ========================================
    const apiFunction = new lambda.Function(this, 'LoanTrackerAPIFunction', {
      functionName: 'loan-tracker-api',
      runtime: lambda.Runtime.NODEJS_20_X,
      handler: 'src/index.handler',
      code: props.code ?? lambda.Code.fromAsset('dist'),
      timeout: cdk.Duration.seconds(30),
      memorySize: 512,
      environment: {
        NODE_ENV: 'production',
        SPREADSHEET_NAME: props.spreadsheetName,
        GOOGLE_SERVICE_ACCOUNT_SECRET_ARN: serviceAccountSecret.secretArn,
        WEEK_CONVENTION: props.weekConvention ?? 'monday',
        CACHE_TTL_SECONDS: String(props.cacheTtlSeconds ?? 30),
        METRICS_ENABLED: 'true',
        LOG_LEVEL: 'info',
        AWS_NODEJS_CONNECTION_REUSE_ENABLED: '1',
      },
    });

    serviceAccountSecret.grantRead(apiFunction);
    apiFunction.addToRolePolicy(new iam.PolicyStatement({
      actions: ['cloudwatch:PutMetricData'],
      resources: ['*'],
      conditions: { StringEquals: { 'cloudwatch:namespace': 'LoanTracker/Backend' } },
    }));

    // ========================================
    // API Gateway
    // ========================================
    const api = new apigateway.RestApi(this, 'LoanTrackerAPI', {
      restApiName: 'Loan Tracker API',
      description: 'Roster, weekly log, reports and exports for players on loan',
      binaryMediaTypes: ['application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'],
      deployOptions: {
        stageName: 'v1',
        throttlingRateLimit: 50,
        throttlingBurstLimit: 100,
        loggingLevel: apigateway.MethodLoggingLevel.INFO,
        metricsEnabled: true,
      },
      defaultCorsPreflightOptions: {
        allowOrigins: apigateway.Cors.ALL_ORIGINS,
        allowMethods: apigateway.Cors.ALL_METHODS,
        allowHeaders: ['Content-Type', 'X-Amz-Date', 'X-Api-Key', 'X-Amz-Security-Token'],
      },
    });

    api.root.addProxy({
      defaultIntegration: new apigateway.LambdaIntegration(apiFunction, { proxy: true }),
      anyMethod: true,
    });

    // ========================================
    // CloudWatch Alarms
    // ========================================
    new cloudwatch.Alarm(this, 'LambdaErrorAlarm', {
      alarmName: 'loan-tracker-lambda-errors',
      alarmDescription: 'Alert when Lambda error rate exceeds threshold',
      metric: apiFunction.metricErrors({
        statistic: 'Sum',
        period: cdk.Duration.minutes(5),
      }),
      threshold: 5,
      evaluationPeriods: 2,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });

    new cloudwatch.Alarm(this, 'LambdaDurationAlarm', {
      alarmName: 'loan-tracker-lambda-duration',
      alarmDescription: 'Alert when Lambda duration exceeds threshold',
      metric: apiFunction.metricDuration({
        statistic: 'Average',
        period: cdk.Duration.minutes(5),
      }),
      threshold: 10000,
      evaluationPeriods: 3,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });

    // Sheets API slowness shows up here before it shows up as timeouts
    new cloudwatch.Alarm(this, 'SheetWriteLatencyAlarm', {
      alarmName: 'loan-tracker-sheet-write-latency',
      alarmDescription: 'Alert when spreadsheet writes are slow',
      metric: new cloudwatch.Metric({
        namespace: 'LoanTracker/Backend',
        metricName: 'SheetWriteLatency',
        statistic: 'p90',
        period: cdk.Duration.minutes(5),
      }),
      threshold: 5000,
      evaluationPeriods: 3,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });

    new cloudwatch.Alarm(this, 'API5xxErrorAlarm', {
      alarmName: 'loan-tracker-api-5xx-errors',
      alarmDescription: 'Alert when API Gateway 5xx error rate is high',
      metric: api.metricServerError({
        statistic: 'Sum',
        period: cdk.Duration.minutes(5),
      }),
      threshold: 5,
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
    });

    new cdk.CfnOutput(this, 'ServiceAccountSecretArn', {
      value: serviceAccountSecret.secretArn,
      description: 'Secret to fill with the Google service account JSON',
    });
  }
}
