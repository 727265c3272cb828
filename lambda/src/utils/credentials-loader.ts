/**
 * Credentials Loader - AWS Secrets Manager integration
 *
 * Loads SmartPay credentials from AWS Secrets Manager or environment variables.
 * Credentials are read on every request and handed to the caller; they are
 * never cached in module state.
 *
 * Secret Structure in AWS Secrets Manager (keyed by PSP settings ID):
 * {
 *   "smartpay-main": {
 *     "refreshTokenLive": "...",
 *     "refreshTokenTest": "...",
 *     "signingKeyLive": "...",
 *     "signingKeyTest": "..."
 *   }
 * }
 *
 * Environment Variables:
 *   PAYMENT_CREDENTIALS_SECRET - AWS Secrets Manager secret name
 *   SMARTPAY_REFRESH_TOKEN     - Fallback: Direct refresh token
 *   SMARTPAY_SIGNING_KEY       - Fallback: Direct base64 signing key
 *
 * Usage:
 *   const credentials = await loadSmartPayCredentials('smartpay-main', 'live');
 *   if (!credentials) { ... }
 */

import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { z } from 'zod';
import type { DeploymentEnvironment } from '../config';
import type { SmartPayCredentials, SmartPayEnvironment } from '../providers/types';

/**
 * Reads the string value of a secret
 */
export interface SecretReader {
  getSecretString(secretId: string): Promise<string | undefined>;
}

const storedCredentialsSchema = z.object({
  refreshTokenLive: z.string().optional(),
  refreshTokenTest: z.string().optional(),
  signingKeyLive: z.string().optional(),
  signingKeyTest: z.string().optional()
});

const credentialsSecretSchema = z.record(z.string(), storedCredentialsSchema);

/**
 * Secrets Manager backed reader
 */
export class SecretsManagerSecretReader implements SecretReader {
  private readonly client: SecretsManagerClient;

  constructor(client?: SecretsManagerClient) {
    // AWS_REGION is automatically set by Lambda runtime
    this.client = client || new SecretsManagerClient({
      region: process.env.AWS_REGION || process.env.AWS_DEFAULT_REGION || 'eu-west-1'
    });
  }

  async getSecretString(secretId: string): Promise<string | undefined> {
    const response = await this.client.send(new GetSecretValueCommand({ SecretId: secretId }));
    return response.SecretString;
  }
}

/**
 * Test credentials are used for development and test deployments, live credentials otherwise
 */
export function usesTestCredentials(environment: DeploymentEnvironment): boolean {
  return environment === 'development' || environment === 'test';
}

/**
 * The SmartPay production endpoint serves acceptance and live deployments
 */
export function resolveGatewayEnvironment(environment: DeploymentEnvironment): SmartPayEnvironment {
  return environment === 'acceptance' || environment === 'live' ? 'production' : 'sandbox';
}

/**
 * Load SmartPay credentials for a PSP settings entry
 *
 * @param settingsId PSP settings identifier (key in the credentials secret)
 * @param environment Current deployment environment; selects test or live fields
 * @returns Credentials, or null when the secret has no entry for the settings ID
 * @throws Error if the secret cannot be read or parsed
 */
export async function loadSmartPayCredentials(
  settingsId: string,
  environment: DeploymentEnvironment,
  reader: SecretReader = new SecretsManagerSecretReader()
): Promise<SmartPayCredentials | null> {
  const secretName = process.env.PAYMENT_CREDENTIALS_SECRET;

  if (secretName) {
    console.log(`🔐 Loading SmartPay credentials from AWS Secrets Manager: ${secretName}`);
    return await loadFromSecretsManager(settingsId, environment, secretName, reader);
  } else {
    console.warn('⚠️  WARNING: PAYMENT_CREDENTIALS_SECRET not set. Falling back to environment variables (SMARTPAY_REFRESH_TOKEN, SMARTPAY_SIGNING_KEY).');
    return loadFromEnvironmentVariables();
  }
}

async function loadFromSecretsManager(
  settingsId: string,
  environment: DeploymentEnvironment,
  secretName: string,
  reader: SecretReader
): Promise<SmartPayCredentials | null> {
  let secretString: string | undefined;

  try {
    secretString = await reader.getSecretString(secretName);
  } catch (error) {
    throw describeSecretsManagerError(error, secretName);
  }

  if (!secretString) {
    throw new Error(`Secret ${secretName} exists but has no SecretString value`);
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(secretString);
  } catch (parseError) {
    console.error('❌ Failed to parse secret JSON:', parseError);
    throw new Error(`Secret ${secretName} contains invalid JSON: ${parseError instanceof Error ? parseError.message : 'Unknown parse error'}`);
  }

  const parsed = credentialsSecretSchema.safeParse(parsedJson);
  if (!parsed.success) {
    throw new Error(`Secret ${secretName} does not match the expected credentials structure: ${parsed.error.message}`);
  }

  const stored = parsed.data[settingsId];
  if (!stored) {
    console.warn(`⚠️  No SmartPay credentials stored for settings '${settingsId}'. Available settings: ${Object.keys(parsed.data).join(', ')}`);
    return null;
  }

  const useTest = usesTestCredentials(environment);
  const credentials: SmartPayCredentials = {
    refreshToken: (useTest ? stored.refreshTokenTest : stored.refreshTokenLive) ?? '',
    signingKey: (useTest ? stored.signingKeyTest : stored.signingKeyLive) ?? ''
  };

  // Signatures are never computed with an empty key
  if (!credentials.refreshToken || !credentials.signingKey) {
    console.warn(`⚠️  Incomplete ${useTest ? 'test' : 'live'} SmartPay credentials for settings '${settingsId}'`);
    return null;
  }

  console.log(`✅ Loaded ${useTest ? 'test' : 'live'} SmartPay credentials for settings '${settingsId}' (refreshToken: ${maskSecret(credentials.refreshToken)})`);
  return credentials;
}

/**
 * Map AWS SDK errors to actionable messages
 */
function describeSecretsManagerError(error: unknown, secretName: string): Error {
  const name = error instanceof Error ? error.name : 'UnknownError';
  const message = error instanceof Error ? error.message : String(error);

  switch (name) {
    case 'ResourceNotFoundException':
      console.error(`❌ Secret not found: ${secretName}`);
      return new Error(`Secret '${secretName}' does not exist in AWS Secrets Manager. Please create the secret or check PAYMENT_CREDENTIALS_SECRET environment variable.`);
    case 'AccessDeniedException':
      console.error(`❌ Access denied to secret: ${secretName}`);
      return new Error(`Lambda execution role lacks permission to access secret '${secretName}'. Add secretsmanager:GetSecretValue permission for ARN: arn:aws:secretsmanager:${process.env.AWS_REGION}:*:secret:${secretName}*`);
    case 'DecryptionFailure':
      console.error(`❌ Failed to decrypt secret:`, error);
      return new Error(`Unable to decrypt secret '${secretName}'. Check KMS key permissions and key status. (${message})`);
    case 'ThrottlingException':
      console.error(`❌ Secrets Manager rate limit exceeded:`, error);
      return new Error(`Too many requests to Secrets Manager. (${message})`);
    case 'InternalServiceError':
      console.error(`❌ AWS Secrets Manager service error:`, error);
      return new Error(`AWS Secrets Manager is experiencing issues. Please retry later. (${message})`);
    default:
      console.error('❌ Unexpected error loading credentials from Secrets Manager:', {
        errorName: name,
        errorMessage: message,
        secretName
      });
      return new Error(`Failed to load SmartPay credentials: ${message}`);
  }
}

/**
 * Load credentials from environment variables (local development)
 */
function loadFromEnvironmentVariables(): SmartPayCredentials | null {
  const refreshToken = process.env.SMARTPAY_REFRESH_TOKEN;
  const signingKey = process.env.SMARTPAY_SIGNING_KEY;

  if (!refreshToken || !signingKey) {
    console.warn('⚠️  SmartPay credentials not configured. Required environment variables: SMARTPAY_REFRESH_TOKEN, SMARTPAY_SIGNING_KEY');
    return null;
  }

  console.log(`✅ Loaded credentials from environment variables (refreshToken: ${maskSecret(refreshToken)})`);
  return { refreshToken, signingKey };
}

/**
 * Mask a secret for logging
 */
export function maskSecret(value: string): string {
  return value.length > 8
    ? `${value.substring(0, 4)}...${value.substring(value.length - 4)}`
    : '****';
}
