#!/usr/bin/env node

/**
 * Command-line tool for the broadcast service: reports, scheduled messages,
 * templates and channel configuration.
 */

import { Command } from 'commander';
import { Table } from 'console-table-printer';
import chalk from 'chalk';
import { EnvLoader } from '../utils/env';
import { ConfigManager } from '../system/config';
import { ValidationError, toError } from '../system/error-handling';
import { System } from '../system/system';
import { BatchSummary } from '../system/delivery';
import { buildContentCalendar } from '../content/event-content';
import { CONTENT_CATEGORIES } from '../content/types';
import { formatCount, formatSigned, formatTimestamp } from '../analytics/report-builder';

export interface TimeOfDay {
  hour: number;
  minute: number;
}

/** Parses `HH:MM` (24-hour clock). */
export function parseTimeOfDay(value: string): TimeOfDay {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  const hour = match ? Number(match[1]) : NaN;
  const minute = match ? Number(match[2]) : NaN;

  if (!match || hour > 23 || minute > 59) {
    throw new ValidationError(`Invalid time "${value}", expected HH:MM`);
  }
  return { hour, minute };
}

/** Accepts anything `Date` parses, e.g. `2026-03-01T09:30` or an ISO timestamp. */
export function parseDueAt(value: string): Date {
  const dueAt = new Date(value);
  if (Number.isNaN(dueAt.getTime())) {
    throw new ValidationError(`Invalid date "${value}"`);
  }
  return dueAt;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ValidationError(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

function printError(error: Error): void {
  console.error(chalk.red('✗'), error.message);
  if (error instanceof ValidationError && error.problems.length > 1) {
    for (const problem of error.problems) {
      console.error(chalk.red(`  - ${problem}`));
    }
  }
}

function printSummary(summary: BatchSummary): void {
  if (summary.results.length === 0) {
    console.log(chalk.yellow('Nothing to send'));
    return;
  }

  const table = new Table({
    columns: [
      { name: 'destination', title: 'Channel', alignment: 'left' },
      { name: 'status', title: 'Status', alignment: 'left' },
      { name: 'detail', title: 'Detail', alignment: 'left', maxLen: 60 }
    ]
  });
  for (const result of summary.results) {
    table.addRow({
      destination: result.destinationId,
      status: result.status,
      detail: result.reason ?? (result.messageId !== undefined ? `message ${result.messageId}` : '')
    }, { color: result.status === 'sent' ? 'green' : result.status === 'failed' ? 'red' : 'yellow' });
  }
  table.printTable();
  console.log(chalk.blue(`Sent: ${summary.sent}, failed: ${summary.failed}, skipped: ${summary.skipped}`));
}

export function buildProgram(createSystem: (configPath?: string) => System): Command {
  const program = new Command();

  program
    .name('broadcast-cli')
    .description('Manage scheduled broadcasts, polls and channel analytics')
    .version('1.0.0')
    .option('--config <path>', 'path to bot-config.yaml');

  const system = (): System => createSystem(program.opts<{ config?: string }>().config);

  const run = (action: () => Promise<void>) => async (): Promise<void> => {
    try {
      await action();
    } catch (error) {
      printError(toError(error));
      process.exitCode = 1;
    }
  };

  program
    .command('report <channel>')
    .description('Print the growth and engagement report for a channel')
    .option('-d, --days <days>', 'window in days', '7')
    .option('-m, --monthly', '30-day report with a weekly breakdown')
    .action((channel: string, options: { days: string; monthly?: boolean }) => run(async () => {
      const analytics = system().analytics;
      const report = options.monthly
        ? await analytics.monthlyReport(channel)
        : await analytics.report(channel, parsePositiveInt(options.days));
      console.log(report);
    })());

  program
    .command('dashboard <channel>')
    .description('Show key figures for a channel')
    .action((channel: string) => run(async () => {
      const data = await system().analytics.dashboard(channel);
      console.log(chalk.bold(`📊 Dashboard - ${channel}`));
      console.log(`Subscribers:      ${formatCount(data.currentSubscribers)}`);
      console.log(`Growth (7 days):  ${formatSigned(data.growth7d)}`);
      console.log(`Engagement rate:  ${data.engagementRate.toFixed(1)}%`);
      console.log(`Messages (7d):    ${data.totalMessages}`);
      console.log(`Average views:    ${data.avgViews.toFixed(0)}`);
    })());

  program
    .command('schedule <channel> <dueAt> <text...>')
    .description('Queue a message for later delivery')
    .option('-c, --category <category>', 'content category', 'general')
    .action((channel: string, dueAt: string, text: string[], options: { category: string }) => run(async () => {
      const message = await system().scheduledMessages.schedule({
        destinationId: channel,
        body: text.join(' '),
        dueAt: parseDueAt(dueAt),
        category: options.category
      });
      console.log(chalk.green(`✓ Scheduled ${message.id} for ${formatTimestamp(new Date(message.dueAt))}`));
    })());

  program
    .command('cancel <id>')
    .description('Cancel a pending scheduled message')
    .action((id: string) => run(async () => {
      await system().scheduledMessages.cancel(id);
      console.log(chalk.green(`✓ Cancelled ${id}`));
    })());

  program
    .command('pending [channel]')
    .description('List pending scheduled messages')
    .action((channel: string | undefined) => run(async () => {
      const messages = await system().scheduledMessages.listPending(channel);
      if (messages.length === 0) {
        console.log(chalk.yellow('No pending messages'));
        return;
      }

      const table = new Table({
        columns: [
          { name: 'id', title: 'ID', alignment: 'left' },
          { name: 'channel', title: 'Channel', alignment: 'left' },
          { name: 'due', title: 'Due', alignment: 'left' },
          { name: 'body', title: 'Message', alignment: 'left', maxLen: 40 }
        ]
      });
      for (const message of messages) {
        table.addRow({
          id: message.id,
          channel: message.destinationId,
          due: formatTimestamp(new Date(message.dueAt)),
          body: message.body
        });
      }
      table.printTable();
    })());

  program
    .command('sweep')
    .description('Send every scheduled message that is due now')
    .action(() => run(async () => {
      printSummary(await system().delivery.sweepDue());
    })());

  program
    .command('send-daily')
    .description('Run the daily broadcast now')
    .action(() => run(async () => {
      printSummary(await system().delivery.dailyBroadcast());
    })());

  program
    .command('send-poll')
    .description('Run the daily poll now')
    .action(() => run(async () => {
      printSummary(await system().delivery.dailyPoll());
    })());

  program
    .command('snapshot')
    .description('Record the current subscriber count of every active channel')
    .action(() => run(async () => {
      const results = await system().delivery.captureSnapshots();
      for (const result of results) {
        if (result.subscriberCount === null) {
          console.log(chalk.red(`✗ ${result.destinationId}: member count unavailable`));
        } else {
          console.log(chalk.green(`✓ ${result.destinationId}: ${formatCount(result.subscriberCount)} subscribers`));
        }
      }
    })());

  const templates = program.command('templates').description('Manage content templates');

  templates
    .command('list')
    .description('List templates')
    .option('-c, --category <category>', 'only this category')
    .action((options: { category?: string }) => run(async () => {
      const items = await system().catalog.getTemplates(options.category);
      if (items.length === 0) {
        console.log(chalk.yellow('No templates'));
        return;
      }

      const table = new Table({
        columns: [
          { name: 'id', title: 'ID', alignment: 'left' },
          { name: 'name', title: 'Name', alignment: 'left', maxLen: 24 },
          { name: 'category', title: 'Category', alignment: 'left' },
          { name: 'uses', title: 'Uses', alignment: 'right' }
        ]
      });
      for (const item of items) {
        table.addRow({ id: item.id, name: item.name, category: item.category, uses: item.usageCount });
      }
      table.printTable();
    })());

  templates
    .command('add <name> <category> <body...>')
    .description(`Add a template (categories: ${Object.keys(CONTENT_CATEGORIES).join(', ')})`)
    .action((name: string, category: string, body: string[]) => run(async () => {
      const item = await system().catalog.createTemplate({ name, category, body: body.join(' ') });
      console.log(chalk.green(`✓ Created template ${item.id}`));
    })());

  program
    .command('calendar <channel>')
    .description('Show the content plan for the coming days')
    .option('-d, --days <days>', 'number of days', '7')
    .action((channel: string, options: { days: string }) => run(async () => {
      const entries = await buildContentCalendar(system().catalog, channel, parsePositiveInt(options.days));
      const table = new Table({
        columns: [
          { name: 'date', title: 'Date', alignment: 'left' },
          { name: 'day', title: 'Day', alignment: 'left' },
          { name: 'category', title: 'Category', alignment: 'left' },
          { name: 'templates', title: 'Templates', alignment: 'right' },
          { name: 'event', title: 'Event', alignment: 'left', maxLen: 40 }
        ]
      });
      for (const entry of entries) {
        table.addRow({
          date: entry.date,
          day: entry.dayName,
          category: entry.category,
          templates: entry.templatesAvailable,
          event: entry.eventContent ?? ''
        });
      }
      table.printTable();
    })());

  const channels = program.command('channels').description('Manage configured channels');

  channels
    .command('list')
    .description('List configured channels')
    .action(() => run(async () => {
      const configured = system().config.getChannels();
      if (configured.length === 0) {
        console.log(chalk.yellow('No channels configured'));
        return;
      }
      for (const channel of configured) {
        const state = channel.active ? chalk.green('active') : chalk.gray('inactive');
        console.log(`${channel.id}  ${channel.displayName}  ${state}`);
      }
    })());

  channels
    .command('add <id> [displayName]')
    .description('Add a channel (numeric id such as -1001234567890, or @name)')
    .action((id: string, displayName: string | undefined) => run(async () => {
      system().config.addChannel({ id, displayName: displayName ?? id, active: true });
      console.log(chalk.green(`✓ Added ${id}`));
    })());

  channels
    .command('remove <id>')
    .description('Remove a channel')
    .action((id: string) => run(async () => {
      if (!system().config.removeChannel(id)) {
        throw new ValidationError(`Unknown channel ${id}`);
      }
      console.log(chalk.green(`✓ Removed ${id}`));
    })());

  for (const [command, active] of [['enable', true], ['disable', false]] as const) {
    channels
      .command(`${command} <id>`)
      .description(`${active ? 'Resume' : 'Pause'} deliveries to a channel`)
      .action((id: string) => run(async () => {
        if (!system().config.setChannelActive(id, active)) {
          throw new ValidationError(`Unknown channel ${id}`);
        }
        console.log(chalk.green(`✓ ${id} ${active ? 'enabled' : 'disabled'}`));
      })());
  }

  program
    .command('poll-options <options...>')
    .description('Replace the daily poll options')
    .action((options: string[]) => run(async () => {
      system().config.updatePollOptions(options);
      console.log(chalk.green(`✓ Poll options updated (${options.length})`));
    })());

  program
    .command('set-time <job> <time>')
    .description('Move dailyBroadcast or dailyPoll to HH:MM')
    .action((job: string, time: string) => run(async () => {
      if (job !== 'dailyBroadcast' && job !== 'dailyPoll') {
        throw new ValidationError(`Unknown job "${job}", expected dailyBroadcast or dailyPoll`);
      }
      const { hour, minute } = parseTimeOfDay(time);
      system().config.setSchedule(job, hour, minute);
      console.log(chalk.green(`✓ ${job} now runs at ${time}`));
    })());

  program
    .command('validate')
    .description('Check the configuration')
    .action(() => run(async () => {
      const problems = system().config.validate();
      if (problems.length === 0) {
        console.log(chalk.green('✓ Configuration is valid'));
        return;
      }
      for (const problem of problems) {
        console.log(chalk.yellow(`⚠ ${problem}`));
      }
      process.exitCode = 1;
    })());

  return program;
}

if (require.main === module) {
  EnvLoader.initialize();

  let instance: System | null = null;
  const program = buildProgram(configPath => {
    instance ??= new System({ config: new ConfigManager(configPath) });
    return instance;
  });

  if (process.argv.length <= 2) {
    program.help();
  } else {
    program.parseAsync(process.argv).catch(error => {
      printError(toError(error));
      process.exitCode = 1;
    });
  }
}
