import { Stack, StackProps, RemovalPolicy, Duration, CfnOutput } from 'aws-cdk-lib';
import { Construct } from 'constructs';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as sns from 'aws-cdk-lib/aws-sns';
import * as actions from 'aws-cdk-lib/aws-cloudwatch-actions';
import { PaymentStatusLogConfig } from './config';

export interface PaymentStatusLogStackProps extends StackProps {
  config: PaymentStatusLogConfig;
}

/**
 * CDK Stack for the Payment Status Log DynamoDB Table
 *
 * Creates:
 * - DynamoDB table keyed by orderId + entryId with TTL enabled
 * - CloudWatch alarms for monitoring
 * - SNS topic for alarm notifications
 */
export class PaymentStatusLogStack extends Stack {
  public readonly table: dynamodb.Table;
  public readonly alarmTopic: sns.Topic;

  constructor(scope: Construct, id: string, props: PaymentStatusLogStackProps) {
    super(scope, id, props);

    const { config } = props;

    // DynamoDB table name: {environment}-smartpay-payment-status-log
    const tableName = config.tableNamePrefix
      ? `${config.tableNamePrefix}-${config.environment}-smartpay-payment-status-log`
      : `${config.environment}-smartpay-payment-status-log`;

    this.table = new dynamodb.Table(this, 'PaymentStatusLogTable', {
      tableName,
      partitionKey: {
        name: 'orderId',
        type: dynamodb.AttributeType.STRING
      },
      sortKey: {
        name: 'entryId',
        type: dynamodb.AttributeType.STRING
      },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      encryption: dynamodb.TableEncryption.AWS_MANAGED,
      timeToLiveAttribute: 'ttl',
      removalPolicy: config.removalPolicy === 'RETAIN'
        ? RemovalPolicy.RETAIN
        : RemovalPolicy.DESTROY,
      pointInTimeRecoverySpecification: {
        pointInTimeRecoveryEnabled: config.pointInTimeRecovery ?? false
      }
    });

    this.alarmTopic = new sns.Topic(this, 'PaymentStatusLogAlarmTopic', {
      displayName: `SmartPay Payment Status Log Alarms (${config.environment})`,
      topicName: `${config.environment}-smartpay-payment-status-log-alarms`
    });

    this.createAlarms(config.environment);

    new CfnOutput(this, 'TableName', {
      value: this.table.tableName,
      description: 'Payment status log table name',
      exportName: `${config.environment}-payment-status-log-table-name`
    });

    new CfnOutput(this, 'TableArn', {
      value: this.table.tableArn,
      description: 'Payment status log table ARN',
      exportName: `${config.environment}-payment-status-log-table-arn`
    });

    new CfnOutput(this, 'AlarmTopicArn', {
      value: this.alarmTopic.topicArn,
      description: 'SNS topic ARN for payment status log alarms',
      exportName: `${config.environment}-payment-status-log-alarm-topic-arn`
    });
  }

  /**
   * Create CloudWatch alarms for monitoring DynamoDB table health
   */
  private createAlarms(environment: string): void {
    // Status writes are best-effort; sustained system errors mean entries are being dropped
    const systemErrorAlarm = new cloudwatch.Alarm(this, 'SystemErrorAlarm', {
      alarmName: `${environment}-payment-status-log-system-errors`,
      alarmDescription: 'Payment status log table returning system errors; status entries may be lost',
      metric: this.table.metricSystemErrorsForOperations({
        operations: [
          dynamodb.Operation.PUT_ITEM,
          dynamodb.Operation.QUERY
        ],
        period: Duration.minutes(5)
      }),
      threshold: 10,
      evaluationPeriods: 2,
      datapointsToAlarm: 2,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_OR_EQUAL_TO_THRESHOLD
    });
    systemErrorAlarm.addAlarmAction(new actions.SnsAction(this.alarmTopic));

    const userErrorAlarm = new cloudwatch.Alarm(this, 'UserErrorAlarm', {
      alarmName: `${environment}-payment-status-log-user-errors`,
      alarmDescription: 'High rate of user errors on payment status log table',
      metric: this.table.metricUserErrors({
        period: Duration.minutes(5)
      }),
      threshold: 50,
      evaluationPeriods: 2,
      datapointsToAlarm: 2,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_OR_EQUAL_TO_THRESHOLD
    });
    userErrorAlarm.addAlarmAction(new actions.SnsAction(this.alarmTopic));

    // Notification bursts write one entry per status; alert before on-demand costs run away
    const writeCapacityAlarm = new cloudwatch.Alarm(this, 'WriteCapacityAlarm', {
      alarmName: `${environment}-payment-status-log-write-capacity`,
      alarmDescription: 'High write capacity consumption on payment status log table',
      metric: this.table.metricConsumedWriteCapacityUnits({
        period: Duration.minutes(5)
      }),
      threshold: 1000,
      evaluationPeriods: 2,
      datapointsToAlarm: 2,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_OR_EQUAL_TO_THRESHOLD
    });
    writeCapacityAlarm.addAlarmAction(new actions.SnsAction(this.alarmTopic));
  }
}
