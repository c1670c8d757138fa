#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { Ora } from 'ora';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import { stringify as stringifyYaml } from 'yaml';
import { ProvisionerConfig } from './types/index.js';
import { describeError } from './errors.js';
import { ProvisioningLogger } from './logger.js';
import { loadConfig } from './config/loader.js';
import { FixedNamingStrategy, RandomNamingStrategy } from './config/naming.js';
import { ResourcePlanner } from './orchestration/planner.js';
import { ProvisioningOrchestrator } from './orchestration/provisioning-orchestrator.js';
import { RunResult } from './orchestration/types.js';
import { createAzureProvider } from './provisioning/azure-provider.js';
import { SimulatedResourceProvider, simulatedEnvironment } from './provisioning/simulated-provider.js';

interface RunCommandOptions {
  config?: string;
  simulate?: boolean;
  failOn?: string[];
  verbose?: boolean;
}

interface PlanCommandOptions {
  config?: string;
}

interface InitCommandOptions {
  output: string;
}

const DEFAULT_CONFIG_FILE = 'ehub.yml';

const packageJson: { version: string } = JSON.parse(
  readFileSync(new URL('../package.json', import.meta.url), 'utf8')
);

/**
 * Routes library logging through the spinner so the two don't garble each other.
 */
function spinnerLogger(spinner: Ora, verbose: boolean): ProvisioningLogger {
  const print = (write: () => void) => {
    spinner.clear();
    write();
    spinner.render();
  };

  return {
    info: message => {
      spinner.text = message;
      if (verbose) print(() => console.log(chalk.gray(message)));
    },
    warn: message => print(() => console.warn(chalk.yellow(`⚠️  ${message}`))),
    error: message => print(() => console.error(chalk.red(message))),
    debug: message => {
      if (verbose) print(() => console.log(chalk.dim(message)));
    }
  };
}

function configPath(option?: string): string | undefined {
  if (option) {
    return resolve(process.cwd(), option);
  }
  const fallback = resolve(process.cwd(), DEFAULT_CONFIG_FILE);
  return existsSync(fallback) ? fallback : undefined;
}

function printResult(result: RunResult): void {
  if (result.resources.length > 0) {
    console.log(chalk.blue('\n📦 Provisioned resources:'));
    result.resources.forEach(resource => {
      const state = resource.verifiedState ? chalk.gray(` [${resource.verifiedState}]`) : '';
      const ambiguous = resource.ambiguous ? chalk.yellow(' (outcome unknown)') : '';
      console.log(`  ${resource.kind} ${chalk.bold(resource.name)}${state}${ambiguous}`);
      console.log(chalk.gray(`    ${resource.identifier}`));
    });
  }

  const { cleanup } = result;
  console.log(chalk.blue('\n🧹 Cleanup:'));
  console.log(`  Deleted ${cleanup.deleted.length} of ${cleanup.attempted} resource(s)`);

  if (result.errors.length > 0) {
    console.log(chalk.red('\n❌ Errors:'));
    result.errors.forEach(error => {
      console.log(`  ${error.code}: ${error.message}`);
      if (error.remediation) {
        console.log(chalk.yellow(`  💡 ${error.remediation}`));
      }
    });
  }

  console.log(chalk.gray(`\n⏱️  Run took ${result.metadata.duration ?? 0}ms`));
  console.log(chalk.gray(`🆔 Run ID: ${result.metadata.runId}`));
}

const program = new Command();

program
  .name('ehub-provision')
  .description('Provision a Cosmos DB account streaming diagnostics to an Event Hub, then clean it all up')
  .version(packageJson.version);

program
  .command('run')
  .description('Provision every resource, verify it, then delete everything that was created')
  .option('-c, --config <path>', `Path to configuration file (default: ./${DEFAULT_CONFIG_FILE} if present)`)
  .option('--simulate', 'Use an in-memory provider instead of Azure')
  .option('--fail-on <names...>', 'With --simulate, make the create of these resources fail')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (options: RunCommandOptions) => {
    const spinner = ora('Loading configuration...').start();
    const logger = spinnerLogger(spinner, options.verbose === true);

    try {
      if (options.failOn && !options.simulate) {
        throw new Error('--fail-on only works together with --simulate');
      }

      const env = options.simulate ? simulatedEnvironment(process.env) : process.env;
      const config = await loadConfig(configPath(options.config), env);

      const orchestrator = options.simulate
        ? new ProvisioningOrchestrator({
            provider: new SimulatedResourceProvider({
              subscriptionId: config.azure.subscription_id,
              simulateDelay: 250,
              failCreate: options.failOn
            }),
            naming: new FixedNamingStrategy(),
            logger
          })
        : new ProvisioningOrchestrator({ provider: createAzureProvider({ config, logger }), logger });

      const controller = new AbortController();
      const onSignal = (signal: NodeJS.Signals) => {
        if (controller.signal.aborted) {
          logger.warn('Cleanup is in progress; waiting for it to finish');
          return;
        }
        logger.warn(`Received ${signal}; stopping and cleaning up`);
        controller.abort(new Error(`Interrupted by ${signal}`));
      };
      process.on('SIGINT', onSignal);
      process.on('SIGTERM', onSignal);

      spinner.text = options.simulate ? 'Provisioning (simulated)...' : 'Provisioning in Azure...';
      let result: RunResult;
      try {
        result = await orchestrator.run(config, { signal: controller.signal });
      } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
      }

      if (result.success) {
        if (result.cleanup.error) {
          spinner.warn('Provisioning succeeded, but some resources could not be deleted');
        } else {
          spinner.succeed('Provisioning and cleanup completed successfully!');
        }
        printResult(result);
      } else {
        spinner.fail('Provisioning failed');
        printResult(result);
        process.exit(1);
      }
    } catch (error) {
      spinner.fail('Run failed');
      console.error(chalk.red('❌ Error:'), describeError(error));
      if (options.verbose) {
        console.error(error);
      }
      process.exit(1);
    }
  });

program
  .command('plan')
  .description('Show the ordered resource plan without touching Azure')
  .option('-c, --config <path>', `Path to configuration file (default: ./${DEFAULT_CONFIG_FILE} if present)`)
  .action(async (options: PlanCommandOptions) => {
    const spinner = ora('Planning resources...').start();

    try {
      const config = await loadConfig(configPath(options.config), simulatedEnvironment(process.env));
      const plan = new ResourcePlanner(new RandomNamingStrategy()).plan(config);

      spinner.succeed(`Planned ${plan.length} resources in ${config.azure.region}`);
      console.log(chalk.blue('\n📋 Creation order:'));
      plan.forEach((descriptor, index) => {
        const dependsOn = descriptor.dependsOn.length > 0 ? chalk.gray(` <- ${descriptor.dependsOn.join(', ')}`) : '';
        console.log(`  ${index + 1}. ${descriptor.kind} ${chalk.bold(descriptor.name)}${dependsOn}`);
      });
      console.log(chalk.gray('\nCleanup deletes them in reverse order. Generated names change on every run.'));
    } catch (error) {
      spinner.fail('Planning failed');
      console.error(chalk.red('❌ Error:'), describeError(error));
      process.exit(1);
    }
  });

program
  .command('init')
  .description('Write a sample configuration file')
  .option('-o, --output <path>', 'Output configuration file path', DEFAULT_CONFIG_FILE)
  .action(async (options: InitCommandOptions) => {
    const spinner = ora('Writing configuration...').start();

    try {
      const config: ProvisionerConfig = {
        azure: { subscription_id: '${AZURE_SUBSCRIPTION_ID}', region: 'eastus' },
        naming: { resource_group_prefix: 'rgEvHb', namespace_prefix: 'ns', cosmos_prefix: 'docdb' },
        cosmos: {
          kind: 'MongoDB',
          consistency_level: 'Eventual',
          max_interval_seconds: 0,
          max_staleness_prefix: 0,
          locations: [
            { name: 'westus', failover_priority: 0, zone_redundant: false },
            { name: 'southcentralus', failover_priority: 1, zone_redundant: false }
          ]
        },
        event_hub: {
          name: 'FirstEventHub',
          sku: 'Standard',
          partition_count: 4,
          message_retention_days: 1,
          authorization_rule: 'DiagnosticsStream'
        },
        diagnostics: {
          name: 'DiaEventHub',
          metrics: [{ category: 'AllMetrics', time_grain: 'PT5M' }],
          logs: ['DataPlaneRequests', 'MongoRequests']
        },
        run: { poll_interval_ms: 5000, operation_timeout_ms: 1800000, tags: { ManagedBy: 'ehub-provisioner' } }
      };

      const header = [
        '# Event Hub diagnostics provisioner configuration',
        `# Generated on ${new Date().toISOString()}`,
        '#',
        '# ${VAR} and ${VAR:-default} are replaced from the environment.',
        '# Resource group, namespace and Cosmos DB account names are the prefixes',
        '# below plus a random suffix.',
        ''
      ].join('\n');

      writeFileSync(options.output, `${header}\n${stringifyYaml(config)}`);

      spinner.succeed(`Configuration file created: ${options.output}`);
      console.log(chalk.green('\n✅ Next steps:'));
      console.log('1. Review and customize the configuration file');
      console.log('2. Set AZURE_SUBSCRIPTION_ID and sign in (az login or a service principal)');
      console.log(`3. Run: ${chalk.cyan('ehub-provision run')}`);
    } catch (error) {
      spinner.fail('Initialization failed');
      console.error(chalk.red('❌ Error:'), describeError(error));
      process.exit(1);
    }
  });

// Error handling for unknown commands
program.on('command:*', () => {
  console.error(chalk.red('❌ Invalid command. See --help for available commands.'));
  process.exit(1);
});

// Show help if no command provided
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  await program.parseAsync();
}
