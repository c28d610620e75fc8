import { confirm } from '@inquirer/prompts';
import chalk from 'chalk';
import { formatDuration, formatFileSize } from './metadata.js';
import { planToRows, summarizePlan } from './planner.js';
import type {
  DuplicateGroup,
  ExecutionReport,
  Plan,
  PlanOperation,
  PlanRow,
  PurgeReport,
  TrackId,
  TrackRecord,
  UndoBatchSummary,
  UndoReport,
} from './types.js';

export interface PlanSummary {
  counts: Record<PlanOperation, number>;
  bytesAffected: number;
  trashCount: number;
  rows: PlanRow[];
}

const OPERATION_COLORS: Record<PlanOperation, (text: string) => string> = {
  noop: chalk.gray,
  move: chalk.cyan,
  copy: chalk.cyan,
  link: chalk.cyan,
  quarantine: chalk.yellow,
  trash: chalk.red,
  conflict: chalk.magenta,
};

function rule(char: string = '═'): string {
  return char.repeat(60);
}

export function calculatePlanSummary(plan: Plan, tracks: TrackRecord[]): PlanSummary {
  const sizes = new Map<TrackId, number>(tracks.map((track) => [track.id, track.size]));
  const counts = summarizePlan(plan);
  let bytesAffected = 0;

  for (const entry of plan.entries) {
    if (entry.operation !== 'noop' && entry.operation !== 'conflict') {
      bytesAffected += sizes.get(entry.trackId) ?? 0;
    }
  }

  return { counts, bytesAffected, trashCount: counts.trash, rows: planToRows(plan) };
}

export function displayPlanPreview(plan: Plan, summary: PlanSummary): void {
  console.log(chalk.cyan('\n' + rule()));
  console.log(chalk.cyan('  REORGANIZATION PLAN'));
  console.log(chalk.cyan(rule()));

  console.log(chalk.gray(`\n  Destination: ${plan.destinationRoot}`));
  console.log(chalk.gray(`  Template:    ${plan.template}`));
  console.log(`\n  Files to ${plan.operation}: ${chalk.yellow(summary.counts[plan.operation].toString())}`);
  console.log(`  Already in place: ${summary.counts.noop}`);

  if (summary.counts.quarantine > 0) {
    console.log(`  Duplicates to quarantine: ${chalk.yellow(summary.counts.quarantine.toString())}`);
  }

  if (summary.trashCount > 0) {
    console.log(`  Duplicates to safe-trash: ${chalk.red(summary.trashCount.toString())}`);
  }

  if (summary.counts.conflict > 0) {
    console.log(`  Conflicts: ${chalk.magenta(summary.counts.conflict.toString())}`);
  }

  if (plan.skipped.length > 0) {
    console.log(`  Skipped tracks: ${plan.skipped.length}`);
  }

  console.log(`  Data affected: ${chalk.green(formatFileSize(summary.bytesAffected))}`);
  console.log(chalk.cyan('\n' + rule('─')));
}

function formatRow(row: PlanRow, index: number): string[] {
  const color = OPERATION_COLORS[row.operation];
  const lines = [color(`  ${index}. ${row.operation.toUpperCase()}: ${row.source}`)];

  if (row.target && row.target !== row.source) {
    lines.push(chalk.green(`     TO:   ${row.target}`));
  }

  if (row.reason) {
    lines.push(chalk.gray(`     (${row.reason})`));
  }

  return lines;
}

export async function promptViewFullList(rows: PlanRow[]): Promise<void> {
  const visible = rows.filter((row) => row.operation !== 'noop');

  if (visible.length === 0) {
    return;
  }

  const view = await confirm({
    message: `View all ${visible.length} planned changes?`,
    default: false,
  });

  if (!view) {
    return;
  }

  const pageSize = 50;
  let offset = 0;

  while (offset < visible.length) {
    const page = visible.slice(offset, offset + pageSize);

    console.log('');

    for (const [i, row] of page.entries()) {
      for (const line of formatRow(row, offset + i + 1)) {
        console.log(line);
      }
    }

    offset += pageSize;

    if (offset < visible.length) {
      const remaining = visible.length - offset;
      const continueViewing = await confirm({
        message: `Show next ${Math.min(pageSize, remaining)} of ${remaining} remaining?`,
        default: true,
      });

      if (!continueViewing) {
        break;
      }
    }
  }
}

/** Asks once for ordinary batches and twice when duplicates go to the safe-trash. */
export async function promptExecuteConfirmation(plan: Plan, summary: PlanSummary): Promise<boolean> {
  console.log(chalk.gray('\n(Every change is recorded and can be reverted with "tidytracks undo")\n'));

  const actionable = plan.entries.filter((entry) => entry.operation !== 'noop' && entry.operation !== 'conflict');
  const firstConfirm = await confirm({
    message: `Apply ${actionable.length} changes?`,
    default: false,
  });

  if (!firstConfirm || summary.trashCount === 0) {
    return firstConfirm;
  }

  return confirm({
    message: chalk.red(`FINAL CONFIRMATION: move ${summary.trashCount} duplicates to the safe-trash?`),
    default: false,
  });
}

export function displayDuplicateGroups(groups: DuplicateGroup[], tracks: TrackRecord[]): void {
  const byId = new Map<TrackId, TrackRecord>(tracks.map((track) => [track.id, track]));

  for (const group of groups) {
    console.log(chalk.cyan(`\n${group.id} (${group.matchReasons.join(', ')}; kept by ${group.ruleApplied})`));

    for (const id of group.members) {
      const track = byId.get(id);
      const label = track
        ? `${track.path} [${track.format}, ${track.bitrate ?? '?'} kbps, ${formatDuration(track.duration)}]`
        : String(id);

      console.log(id === group.keeper ? chalk.green(`  KEEP:   ${label}`) : chalk.red(`  LOSER:  ${label}`));
    }
  }
}

export function displayExecutionReport(report: ExecutionReport): void {
  console.log(chalk.cyan('\n' + rule()));
  console.log(chalk.cyan(report.mode === 'simulate' ? '  SIMULATION RESULT' : '  EXECUTION RESULT'));
  console.log(chalk.cyan(rule()));

  if (report.batchId) {
    console.log(chalk.gray(`\n  Batch: ${report.batchId}`));
  }

  const verb = report.mode === 'simulate' ? 'Would apply' : 'Applied';

  console.log(`\n  ${verb}: ${chalk.green(report.succeeded.toString())}`);
  console.log(`  Failed: ${report.failed > 0 ? chalk.red(report.failed.toString()) : '0'}`);
  console.log(`  Conflicts: ${report.conflicts}`);
  console.log(`  Unchanged: ${report.skipped}`);

  if (report.cancelled) {
    console.log(chalk.yellow('  Cancelled before completion'));
  }

  for (const failure of report.failures) {
    console.log(chalk.red(`  ✗ ${failure.source} → ${failure.target}: ${failure.reason}`));
    console.log(chalk.gray(`    ${failure.message}`));
  }
}

export function displayUndoReport(report: UndoReport): void {
  if (!report.batchId) {
    console.log(chalk.yellow('Nothing to undo.'));
    return;
  }

  console.log(chalk.green(`\n✓ Undid batch ${report.batchId}`));
  console.log(chalk.gray(`  Restored: ${report.succeeded}`));

  if (report.failed > 0) {
    console.log(chalk.red(`  Failed: ${report.failed}`));

    for (const failure of report.failures) {
      console.log(chalk.red(`  ✗ ${failure.target} → ${failure.source}: ${failure.reason}`));
    }
  }
}

export function displayHistory(batches: UndoBatchSummary[]): void {
  if (batches.length === 0) {
    console.log(chalk.yellow('No batches recorded.'));
    return;
  }

  for (const batch of batches) {
    console.log(`${chalk.cyan(batch.id)}  ${batch.sealedAt}  ${batch.mode.padEnd(5)}  ${batch.entryCount} entries`);
  }
}

export function displayPurgeReport(report: PurgeReport): void {
  console.log(chalk.green(`\n✓ Purged ${report.purged} files from the safe-trash`));
  console.log(chalk.gray(`  Moved to system trash: ${report.method.trash}`));
  console.log(chalk.gray(`  Deleted permanently: ${report.method.permanent}`));

  if (report.failed > 0) {
    console.log(chalk.red(`  Failed: ${report.failed}`));
  }
}
