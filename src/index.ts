// Library entry point for the deployment pipeline
export * from './types/index.js';
export * from './errors.js';
export { Logger, formatTimestamp, logFilePath, type LogLevel, type LogSink, type LoggerOptions } from './logging/logger.js';
export { DeploymentConfigLoader, createConfigLoader, toDeploymentConfig, defaultStartCommand } from './config/loader.js';
export { validateConfig, validateAndNormalizeConfig, getConfigSchema, type ConfigFile } from './config/validator.js';
export * from './config/naming.js';
export * from './provisioning/index.js';
export * from './compliance/index.js';
export * from './reconciler/reconciler.js';
export * from './reconciler/catalog.js';
export * from './state/state-store.js';
export { TemplateEngine, FileTemplateSource, DEFAULT_TEMPLATE_DIR } from './templates/template-engine.js';
export type { TemplateName, TemplateSource, TemplateVariables } from './templates/types.js';
export * from './orchestration/types.js';
export { DeploymentOrchestrator, type OrchestratorDependencies } from './orchestration/deployment-orchestrator.js';
export { DEFAULT_PHASES, formatHealthReport, HEALTH_CHECKS, type HealthCheckResult } from './orchestration/phases/index.js';
export { HOST_LAYOUT, STEP_SHELL_OPTIONS, runRemoteStep, writeFileCommand } from './orchestration/remote-steps.js';
export { NodeHttpProbe, type HttpProbe, type ProbeOptions, type ProbeResponse, type ServedCertificate } from './orchestration/http-probe.js';
export { CleanupEngine, type CleanupReport, type ResourceRef } from './cleanup/cleanup-engine.js';
