import type { DeploymentConfig } from '../types/index.js';
import { AccountManager } from './account-manager.js';
import { BudgetManager } from './budget-manager.js';
import { ComputeManager } from './compute-manager.js';
import { IAMManager } from './iam-manager.js';
import { InventoryManager } from './inventory-manager.js';
import { MonitoringManager } from './monitoring-manager.js';
import { NetworkManager } from './network-manager.js';
import { NotificationManager } from './notification-manager.js';
import { RemoteCommandRunner } from './remote-command.js';
import { SecretStore } from './secret-store.js';
import type { ClientSettings } from './sdk-helpers.js';
import type { CloudGateway } from './types.js';
import { UptimeCheckManager } from './uptime-check-manager.js';

/**
 * Build the AWS-backed gateway for one run; every client shares region and profile.
 */
export function createAwsGateway(config: Readonly<DeploymentConfig>): CloudGateway {
  const settings: ClientSettings = { region: config.aws.region, profile: config.aws.profile };
  const account = new AccountManager(settings);

  return {
    account,
    network: new NetworkManager(settings),
    identity: new IAMManager(settings),
    compute: new ComputeManager(settings),
    inventory: new InventoryManager(settings),
    secrets: new SecretStore(settings),
    monitoring: new MonitoringManager(settings),
    notifications: new NotificationManager(settings),
    uptime: new UptimeCheckManager(settings),
    budgets: new BudgetManager(settings, account),
    remote: new RemoteCommandRunner(settings)
  };
}
