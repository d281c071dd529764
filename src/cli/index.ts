#!/usr/bin/env node

/**
 * JSM Alerts: Command Line Interface
 *
 * Interactive alert console plus one-shot commands for scripting.
 *
 * @module cli
 * @version 1.0.0
 */

import { Command } from 'commander';
import { AlertConsole } from '../alerts/console.js';
import { loadConfig } from '../config/config.js';
import { JsmOpsClient } from '../integrations/jsm/client.js';
import { runTui } from '../tui/index.js';
import { formatDescription, formatRows } from './output.js';
import type { Config } from '../types/index.js';
import { closeLogging, configureLogging, createLogger } from '../utils/logger.js';

// ═══════════════════════════════════════════════════════════════════════════
// BOOTSTRAP
// ═══════════════════════════════════════════════════════════════════════════

interface Runtime {
  config: Config;
  client: JsmOpsClient;
  alertConsole: AlertConsole;
}

function fail(message: string): never {
  createLogger('cli').error({ error: message }, 'Command failed');
  closeLogging();
  process.stderr.write(`Error: ${message}\n`);
  process.exit(1);
}

function bootstrap(): Runtime {
  const result = loadConfig();
  if (!result.success) {
    fail(result.error.message);
  }
  const config = result.data;

  configureLogging({ level: config.logging.level, file: config.logging.file });
  createLogger('cli').info({ logFile: config.logging.file }, 'Starting JSM alerts console');

  try {
    const client = JsmOpsClient.fromConfig(config);
    const alertConsole = new AlertConsole(client, {
      refreshIntervalSeconds: config.refresh.interval_seconds,
      actor: config.actor,
    });
    return { config, client, alertConsole };
  } catch (error) {
    fail(error instanceof Error ? error.message : String(error));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM SETUP
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('jsm-alerts')
  .description('Terminal console for Jira Service Management Ops alerts')
  .version('1.0.0');

program
  .command('tui', { isDefault: true })
  .description('Open the interactive alert console')
  .action(async () => {
    const { alertConsole } = bootstrap();
    await runTui(alertConsole);
    closeLogging();
    process.exit(0);
  });

program
  .command('list')
  .description('Print the open alerts once')
  .option('--json', 'Print rows as JSON', false)
  .action(async (options: { json: boolean }) => {
    const { alertConsole } = bootstrap();
    const outcome = await alertConsole.triggerRefresh();
    if (!outcome.ok) {
      fail(outcome.message);
    }

    const rows = alertConsole.currentView();
    process.stdout.write(options.json ? `${JSON.stringify(rows, null, 2)}\n` : `${formatRows(rows)}\n`);
  });

program
  .command('show <alertId>')
  .description('Print the full detail of one alert')
  .action(async (alertId: string) => {
    const { alertConsole } = bootstrap();
    const outcome = await alertConsole.requestDetail(alertId);
    if (!outcome.ok) {
      fail(outcome.message);
    }

    process.stdout.write(`${formatDescription(outcome.description)}\n`);
  });

program
  .command('ack <alertId>')
  .description('Acknowledge an alert')
  .action(async (alertId: string) => {
    const { client } = bootstrap();
    try {
      await client.acknowledgeAlert(alertId);
    } catch (error) {
      fail(error instanceof Error ? error.message : String(error));
    }
    process.stdout.write(`Acknowledged alert ${alertId}\n`);
  });

program
  .command('close <alertId>')
  .description('Close an alert')
  .action(async (alertId: string) => {
    const { client } = bootstrap();
    try {
      await client.closeAlert(alertId);
    } catch (error) {
      fail(error instanceof Error ? error.message : String(error));
    }
    process.stdout.write(`Closed alert ${alertId}\n`);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  fail(error instanceof Error ? error.message : String(error));
});
