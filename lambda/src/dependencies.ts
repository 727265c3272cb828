/**
 * Collaborators shared by the SmartPay handlers
 *
 * The Lambda entry point builds the defaults once per container; tests pass
 * their own mocks to the handlers directly.
 */

import { getPaymentStatusLogService, IPaymentStatusLogService } from '@psp-adapter/payment-status-log';
import type { DeploymentEnvironment, RelaySettings } from './config';
import { StatusRelay } from './notifications/status-relay';
import type { StatusRelayer } from './notifications/notification-poller';
import { getSmartPayGateway } from './providers/provider-factory';
import type { SmartPayCredentials, SmartPayGateway } from './providers/types';
import { loadSmartPayCredentials } from './utils/credentials-loader';

export type CredentialsLoader = (
  settingsId: string,
  environment: DeploymentEnvironment
) => Promise<SmartPayCredentials | null>;

export interface HandlerDependencies {
  gateway: SmartPayGateway;
  statusLog: IPaymentStatusLogService;
  loadCredentials: CredentialsLoader;
  createRelay: (settings: RelaySettings) => StatusRelayer;
}

export function getDefaultDependencies(): HandlerDependencies {
  return {
    gateway: getSmartPayGateway(),
    statusLog: getPaymentStatusLogService(),
    loadCredentials: (settingsId, environment) => loadSmartPayCredentials(settingsId, environment),
    createRelay: settings => new StatusRelay(settings)
  };
}

/**
 * Load credentials, treating a failed load like absent credentials
 */
export async function loadCredentialsOrNull(
  dependencies: Pick<HandlerDependencies, 'loadCredentials'>,
  settingsId: string,
  environment: DeploymentEnvironment
): Promise<SmartPayCredentials | null> {
  try {
    return await dependencies.loadCredentials(settingsId, environment);
  } catch (error) {
    console.error(`❌ Failed to load SmartPay credentials for settings '${settingsId}':`, error instanceof Error ? error.message : error);
    return null;
  }
}
