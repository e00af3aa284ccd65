/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { DeployReport, OutcomeAction, TemplateOutcome } from '../reconcilers/policies/types.js';
import type { PlanEntry } from '../reconcilers/policies/plan.js';
import type { GroupResolution } from '../reconcilers/groups/types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(
  result: CommandResult<T>,
  format: OutputFormat
): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  // Human-readable format
  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print the per-template outcomes of a deploy run
 */
export function printDeployReport(report: DeployReport, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  if (report.sharedGroups.length > 0) {
    header('Shared Groups');
    for (const group of report.sharedGroups) {
      console.log(`  ${formatGroup(group)}`);
    }
  }

  header(report.dryRun ? 'Planned Changes' : 'Deployment Results');

  if (report.outcomes.length === 0) {
    console.log(chalk.gray('No templates found'));
    return;
  }

  for (const outcome of report.outcomes) {
    printOutcome(outcome, report.dryRun);
  }

  const { created, updated, skipped, failed } = report.stats;
  console.log(
    `\n  ${chalk.green(`${created} created`)}, ${chalk.yellow(`${updated} updated`)}, ` +
      `${chalk.gray(`${skipped} skipped`)}, ${failed > 0 ? chalk.red(`${failed} failed`) : `${failed} failed`}`
  );
}

/**
 * Print an offline preview of a deploy run
 */
export function printPlan(entries: PlanEntry[], format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(entries, null, 2));
    return;
  }

  header('Deployment Plan');

  if (entries.length === 0) {
    console.log(chalk.gray('No templates found'));
    return;
  }

  for (const entry of entries) {
    if (entry.error) {
      console.log(chalk.red(`✗ ${entry.fileName}`));
      console.log(chalk.red(`    ${entry.error.message}`));
      continue;
    }

    console.log(`${chalk.cyan(entry.sequence ?? '')} ${entry.displayName ?? ''} ${chalk.gray(`(${entry.fileName})`)}`);
    console.log(`  ${chalk.gray('Match name:')} ${formatValue(entry.matchName)}`);
    console.log(`  ${chalk.gray('Exclusion group:')} ${formatValue(entry.exclusionGroup)}`);
    console.log(`  ${chalk.gray('Placeholders:')} ${entry.placeholders.length > 0 ? entry.placeholders.join(', ') : chalk.gray('(none)')}`);
    for (const warning of entry.warnings) {
      console.log(chalk.yellow(`  ⚠ ${warning.message}`));
    }
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose/debug output should never go to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}

// Helper functions

/**
 * Label for an outcome action, e.g. "would create" in a dry run
 */
export function describeAction(action: OutcomeAction, dryRun: boolean): string {
  switch (action) {
    case 'create':
      return dryRun ? 'would create' : 'created';
    case 'update':
      return dryRun ? 'would update' : 'updated';
    case 'skip':
      return 'skipped';
    case 'error':
      return 'failed';
  }
}

function getActionIcon(action: OutcomeAction): string {
  switch (action) {
    case 'create':
      return '+';
    case 'update':
      return '~';
    case 'skip':
      return '-';
    case 'error':
      return '✗';
  }
}

function getActionColor(action: OutcomeAction): typeof chalk.green {
  switch (action) {
    case 'create':
      return chalk.green;
    case 'update':
      return chalk.yellow;
    case 'skip':
      return chalk.gray;
    case 'error':
      return chalk.red;
  }
}

function printOutcome(outcome: TemplateOutcome, dryRun: boolean): void {
  const color = getActionColor(outcome.action);
  const name = outcome.displayName ?? outcome.fileName;
  const sequence = outcome.sequence ? `${outcome.sequence} ` : '';

  console.log(
    color(`${getActionIcon(outcome.action)} ${sequence}${name}`),
    chalk.gray(`[${describeAction(outcome.action, dryRun)}]`)
  );

  if (outcome.displayName) {
    console.log(chalk.gray(`    File: ${outcome.fileName}`));
  }
  if (outcome.policyId) {
    console.log(chalk.gray(`    Policy: ${outcome.policyId}`));
  }
  if (outcome.exclusionGroup) {
    console.log(chalk.gray(`    Exclusion group: ${formatGroup(outcome.exclusionGroup)}`));
  }
  for (const warning of outcome.warnings) {
    console.log(chalk.yellow(`    ⚠ ${warning.message}`));
  }
  if (outcome.error) {
    console.log(chalk.red(`    ${outcome.error.message}`));
  }
}

function formatGroup(group: GroupResolution): string {
  const status =
    group.status === 'created'
      ? chalk.green('created')
      : group.status === 'planned'
        ? chalk.yellow('would be created')
        : chalk.gray('exists');
  return `${group.name} (${status})`;
}

function formatValue(value: unknown): string {
  if (value === undefined || value === null || value === '') {
    return chalk.gray('(none)');
  }
  if (typeof value === 'string') {
    return value.length > 80 ? value.slice(0, 80) + '...' : value;
  }
  return JSON.stringify(value);
}
