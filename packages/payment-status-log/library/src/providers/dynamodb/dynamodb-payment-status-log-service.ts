import { ConditionalCheckFailedException, DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand
} from '@aws-sdk/lib-dynamodb';
import {
  AppendStatusRequest,
  IPaymentStatusLogService,
  PaymentStatusEntry,
  StorageServiceError,
  assertValidAppendRequest,
  generateEntryId
} from '../../core/index.js';

const DEFAULT_RETENTION_DAYS = 365;

export interface DynamoDBPaymentStatusLogServiceConfig {
  /** DynamoDB table name */
  tableName: string;

  /** AWS region */
  region: string;

  /** Optional DynamoDB endpoint (for testing with DynamoDB Local) */
  endpoint?: string;

  /** Optional custom DynamoDB client */
  dynamoDBClient?: DynamoDBClient;

  /** Days before an entry is removed by TTL (default: 365) */
  retentionDays?: number;
}

/**
 * DynamoDB-backed payment status log for production use
 *
 * Table layout: partition key `orderId`, sort key `entryId`. Writes are
 * conditional on the entry not existing, so an entry is never overwritten.
 */
export class DynamoDBPaymentStatusLogService implements IPaymentStatusLogService {
  private readonly docClient: DynamoDBDocumentClient;
  private readonly tableName: string;
  private readonly retentionDays: number;

  constructor(config: DynamoDBPaymentStatusLogServiceConfig) {
    this.tableName = config.tableName;
    this.retentionDays = config.retentionDays ?? DEFAULT_RETENTION_DAYS;

    const client = config.dynamoDBClient || new DynamoDBClient({
      region: config.region,
      ...(config.endpoint && { endpoint: config.endpoint })
    });

    this.docClient = DynamoDBDocumentClient.from(client, {
      marshallOptions: {
        removeUndefinedValues: true
      }
    });
  }

  async appendStatus(request: AppendStatusRequest): Promise<PaymentStatusEntry> {
    assertValidAppendRequest(request);

    const loggedAtDate = new Date();
    const loggedAt = loggedAtDate.toISOString();
    const expiresAt = loggedAtDate.getTime() + this.retentionDays * 24 * 60 * 60 * 1000;

    const entry: PaymentStatusEntry = {
      id: generateEntryId(loggedAt),
      provider: request.provider,
      orderId: request.orderId,
      status: request.status,
      statusCode: request.statusCode,
      loggedAt
    };

    try {
      await this.docClient.send(new PutCommand({
        TableName: this.tableName,
        Item: {
          orderId: entry.orderId,
          entryId: entry.id,
          provider: entry.provider,
          status: entry.status,
          statusCode: entry.statusCode,
          loggedAt: entry.loggedAt,
          ttl: Math.floor(expiresAt / 1000) // TTL in seconds
        },
        ConditionExpression: 'attribute_not_exists(entryId)'
      }));

      return entry;
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        throw new StorageServiceError(`Entry already exists: ${entry.id}`, error);
      }
      throw new StorageServiceError('Failed to append status entry', toError(error));
    }
  }

  async getStatusHistory(orderId: string): Promise<PaymentStatusEntry[]> {
    const entries: PaymentStatusEntry[] = [];
    let exclusiveStartKey: Record<string, unknown> | undefined;

    try {
      do {
        const result = await this.docClient.send(new QueryCommand({
          TableName: this.tableName,
          KeyConditionExpression: 'orderId = :orderId',
          ExpressionAttributeValues: {
            ':orderId': orderId
          },
          ScanIndexForward: true,
          ExclusiveStartKey: exclusiveStartKey
        }));

        for (const item of result.Items ?? []) {
          entries.push(this.mapItemToEntry(item));
        }

        exclusiveStartKey = result.LastEvaluatedKey;
      } while (exclusiveStartKey);

      return entries;
    } catch (error) {
      throw new StorageServiceError('Failed to retrieve status history', toError(error));
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      // Try to read from the table (using a non-existent key)
      await this.docClient.send(new GetCommand({
        TableName: this.tableName,
        Key: { orderId: 'health-check', entryId: 'health-check' }
      }));
      return true;
    } catch (error) {
      console.warn('⚠️  Payment status log health check failed:', toError(error).message);
      return false;
    }
  }

  private mapItemToEntry(item: Record<string, unknown>): PaymentStatusEntry {
    return {
      id: String(item.entryId),
      provider: String(item.provider),
      orderId: String(item.orderId),
      status: String(item.status),
      statusCode: Number(item.statusCode),
      loggedAt: String(item.loggedAt)
    };
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
