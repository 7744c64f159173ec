import type { DeploymentPhase } from '../types.js';
import { applicationPhase } from './application.js';
import { healthcheckPhase } from './healthcheck.js';
import { infrastructurePhase } from './infrastructure.js';
import { monitoringPhase } from './monitoring.js';
import { predeployPhase } from './predeploy.js';
import { securityPhase } from './security.js';

export { applicationPhase, healthcheckPhase, infrastructurePhase, monitoringPhase, predeployPhase, securityPhase };
export { waitForReadiness } from './infrastructure.js';
export { formatHealthReport, HEALTH_CHECKS, type HealthCheckResult } from './healthcheck.js';

/** All phases by ascending ordinal */
export const DEFAULT_PHASES: readonly DeploymentPhase[] = [
  predeployPhase,
  infrastructurePhase,
  securityPhase,
  applicationPhase,
  monitoringPhase,
  healthcheckPhase
];
