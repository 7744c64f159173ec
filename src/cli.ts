#!/usr/bin/env node

import { existsSync, readFileSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createInterface } from 'node:readline/promises';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { parsePhaseList, printRunSummary, starterConfig } from './cli-support.js';
import { createConfigLoader } from './config/loader.js';
import { DeploymentError, describeError } from './errors.js';
import { Logger, logFilePath } from './logging/logger.js';
import { DeploymentOrchestrator } from './orchestration/deployment-orchestrator.js';
import type { RunOptions } from './orchestration/types.js';
import { createAwsGateway } from './provisioning/aws-gateway.js';
import { ResourceCatalog } from './reconciler/catalog.js';
import { DeploymentStateStore, STATE_KEYS } from './state/state-store.js';

interface CommonOptions {
  environment: string;
  configDir: string;
  verbose?: boolean;
}

function packageVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (manifest && typeof manifest === 'object' && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

function fail(error: unknown, logFile?: string): never {
  console.error(chalk.red(`Error: ${describeError(error)}`));
  if (error instanceof DeploymentError && error.remediation) {
    console.error(chalk.yellow(`Remediation: ${error.remediation}`));
  }
  if (logFile) {
    console.error(chalk.gray(`Log file: ${logFile}`));
  }
  process.exit(1);
}

async function execute(options: CommonOptions & { force?: boolean }, run: RunOptions): Promise<void> {
  let logFile: string | undefined;
  try {
    const config = await createConfigLoader().loadEnvironment(options.configDir, options.environment, {
      force: run.mode === 'cleanup' ? undefined : options.force
    });
    logFile = logFilePath(config.logging.directory);
    const logger = new Logger({ filePath: logFile, verbose: options.verbose });
    const orchestrator = new DeploymentOrchestrator({ config, cloud: createAwsGateway(config), logger });

    const report = await orchestrator.run(run);
    printRunSummary(report, logFile, {
      out: line => console.log(chalk.green(line)),
      err: line => console.error(chalk.red(line))
    });
    if (report.finalState.status !== 'completed') {
      process.exit(1);
    }
  } catch (error) {
    fail(error, logFile);
  }
}

async function confirm(question: string): Promise<boolean> {
  const prompt = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await prompt.question(question)).trim() === 'yes';
  } finally {
    prompt.close();
  }
}

const program = new Command();

program
  .name('free-tier-deploy')
  .description('Resumable, phase-based deployment of a single-instance proxy service')
  .version(packageVersion());

program
  .command('deploy')
  .description('Run deployment phases (all six by default)')
  .option('-e, --environment <env>', 'Deployment environment', 'production')
  .option('-c, --config-dir <path>', 'Directory holding <environment>.yml', 'config')
  .option('-p, --phase <list>', 'Comma-separated phase numbers, e.g. 1,2,3', parsePhaseList)
  .option('-v, --verbose', 'Enable debug logging')
  .option('--force', 'Downgrade overridable compliance rules to warnings')
  .action(async (options: CommonOptions & { phase?: number[]; force?: boolean }) => {
    await execute(options, { mode: 'deploy', phases: options.phase });
  });

program
  .command('validate')
  .description('Check prerequisites and compliance without changing anything')
  .option('-e, --environment <env>', 'Deployment environment', 'production')
  .option('-c, --config-dir <path>', 'Directory holding <environment>.yml', 'config')
  .option('-v, --verbose', 'Enable debug logging')
  .option('--force', 'Downgrade overridable compliance rules to warnings')
  .action(async (options: CommonOptions & { force?: boolean }) => {
    await execute(options, { mode: 'validate-only' });
  });

program
  .command('cleanup')
  .description('Delete every resource of the environment in reverse order')
  .option('-e, --environment <env>', 'Deployment environment', 'production')
  .option('-c, --config-dir <path>', 'Directory holding <environment>.yml', 'config')
  .option('-v, --verbose', 'Enable debug logging')
  .option('--dry-run', 'List what would be deleted')
  .option('-f, --force', 'Skip the confirmation prompt')
  .action(async (options: CommonOptions & { dryRun?: boolean; force?: boolean }) => {
    if (!options.dryRun && !options.force) {
      console.log(chalk.yellow(`This permanently deletes every resource of "${options.environment}" and its local state.`));
      if (!(await confirm('Type "yes" to continue: '))) {
        console.log('Cleanup cancelled');
        return;
      }
    }
    await execute(options, { mode: 'cleanup', dryRun: options.dryRun });
  });

program
  .command('status')
  .description('Show recorded deployment state and the current address')
  .option('-e, --environment <env>', 'Deployment environment', 'production')
  .option('-c, --config-dir <path>', 'Directory holding <environment>.yml', 'config')
  .action(async (options: CommonOptions) => {
    const spinner = ora('Reading deployment state...').start();
    try {
      const config = await createConfigLoader().loadEnvironment(options.configDir, options.environment);
      const store = new DeploymentStateStore(config.state.directory, config.environment);
      const present = store.present();
      spinner.succeed(`${present.length} of ${STATE_KEYS.length} state records present in ${store.directory}`);

      for (const key of STATE_KEYS) {
        const record = await store.tryRead(key);
        if (!record) {
          console.log(chalk.gray(`${key}: not recorded`));
          continue;
        }
        console.log(chalk.bold(key));
        for (const [field, value] of Object.entries(record)) {
          console.log(`  ${field}: ${value}`);
        }
      }

      const lookup = ora('Looking up the instance...').start();
      const instance = await new ResourceCatalog(config, createAwsGateway(config)).instance().lookup();
      if (!instance) {
        lookup.info('No instance is running for this environment');
      } else if (instance.externalAddress) {
        lookup.succeed(`Instance ${instance.instanceId} is ${instance.state} at https://${instance.externalAddress}`);
      } else {
        lookup.warn(`Instance ${instance.instanceId} is ${instance.state} without an external address`);
      }
    } catch (error) {
      spinner.stop();
      fail(error);
    }
  });

program
  .command('init')
  .description('Write a starter environment configuration')
  .option('-e, --environment <env>', 'Deployment environment', 'production')
  .option('-c, --config-dir <path>', 'Directory to write <environment>.yml into', 'config')
  .option('-n, --project <name>', 'Project name', 'my-proxy')
  .action(async (options: { environment: string; configDir: string; project: string }) => {
    const spinner = ora('Writing configuration...').start();
    try {
      const path = join(options.configDir, `${options.environment}.yml`);
      if (existsSync(path)) {
        spinner.fail(`${path} already exists`);
        process.exit(1);
      }
      await mkdir(options.configDir, { recursive: true });
      await writeFile(path, starterConfig(options.project, options.environment));
      spinner.succeed(`Configuration file created: ${path}`);
      console.log(chalk.green('\nNext steps:'));
      console.log('1. Set application.package to the npm package to run');
      console.log('2. Configure cloud credentials for the chosen profile');
      console.log(`3. Run: ${chalk.cyan(`free-tier-deploy validate -e ${options.environment}`)}`);
    } catch (error) {
      spinner.stop();
      fail(error);
    }
  });

await program.parseAsync();
