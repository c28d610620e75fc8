#!/usr/bin/env node
import { writeFile, mkdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { parseArgs } from 'node:util';
import chalk from 'chalk';
import ora from 'ora';
import cliProgress from 'cli-progress';
import { dataPaths, loadConfig, resolveTemplate } from './config.js';
import { findDuplicates } from './duplicates.js';
import { ConfigError, errorMessage } from './errors.js';
import { executePlan } from './executor.js';
import { logger } from './logger.js';
import { buildPlan, planDisposals, planToCsv, withDisposals } from './planner.js';
import {
  calculatePlanSummary,
  displayDuplicateGroups,
  displayExecutionReport,
  displayHistory,
  displayPlanPreview,
  displayPurgeReport,
  displayUndoReport,
  promptExecuteConfirmation,
  promptViewFullList,
} from './review-summary.js';
import { ingestDirectory } from './scanner.js';
import { compileTemplate, RELEASE_FALLBACK_TEMPLATE } from './template.js';
import { NdjsonTrackStore } from './track-store.js';
import { UndoLog } from './undo-log.js';
import type { Config, Disposition, DuplicateGroup, ExecutionMode, Plan, TrackRecord } from './types.js';

const MODES: readonly ExecutionMode[] = ['simulate', 'move', 'copy', 'link'];
const DISPOSITIONS: readonly Disposition[] = ['skip', 'quarantine', 'delete'];

function parseMode(value: string | undefined, fallback: ExecutionMode): ExecutionMode {
  if (value === undefined) {
    return fallback;
  }

  const mode = MODES.find((candidate) => candidate === value);

  if (!mode) {
    throw new ConfigError(`Unknown mode "${value}" (expected ${MODES.join(', ')})`);
  }

  return mode;
}

function parseDisposition(value: string | undefined, fallback: Disposition): Disposition {
  if (value === undefined) {
    return fallback;
  }

  const disposition = DISPOSITIONS.find((candidate) => candidate === value);

  if (!disposition) {
    throw new ConfigError(`Unknown disposition "${value}" (expected ${DISPOSITIONS.join(', ')})`);
  }

  return disposition;
}

function openStores(config: Config): { store: NdjsonTrackStore; undoLog: UndoLog } {
  const paths = dataPaths(config);
  return { store: new NdjsonTrackStore(paths.tracks), undoLog: new UndoLog(paths.undoLog) };
}

async function detectDuplicates(config: Config, tracks: TrackRecord[], useContentHash: boolean): Promise<DuplicateGroup[]> {
  const spinner = ora('Finding duplicates...').start();

  const groups = await findDuplicates(tracks, {
    ...config.duplicates,
    useContentHash,
    onHashed: (done, total) => {
      spinner.text = `Hashing candidates... (${done}/${total})`;
    },
  });

  spinner.succeed(`Found ${groups.length} duplicate groups`);

  return groups;
}

async function runPlan(plan: Plan, mode: ExecutionMode, config: Config, tracks: TrackRecord[], yes: boolean): Promise<void> {
  const { store, undoLog } = openStores(config);
  const summary = calculatePlanSummary(plan, tracks);

  displayPlanPreview(plan, summary);

  if (mode !== 'simulate' && !yes) {
    await promptViewFullList(summary.rows);

    if (!(await promptExecuteConfirmation(plan, summary))) {
      console.log(chalk.yellow('\nCancelled.'));
      return;
    }
  }

  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  const progressBar = new cliProgress.SingleBar({
    format: 'Applying |{bar}| {percentage}% | {value}/{total} entries',
    barCompleteChar: '█',
    barIncompleteChar: '░',
  });

  const showProgress = mode !== 'simulate' && plan.entries.length > 0;

  if (showProgress) {
    progressBar.start(plan.entries.length, 0);
  }

  try {
    const report = await executePlan(plan, mode, {
      store,
      undoLog,
      retries: config.execution.transientRetries,
      signal: controller.signal,
      onProgress: (_result, done) => {
        progressBar.update(done);
      },
    });

    if (showProgress) {
      progressBar.stop();
    }

    displayExecutionReport(report);

    if (report.failed > 0) {
      process.exitCode = 1;
    }
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

async function runIngest(args: string[]): Promise<void> {
  console.log(chalk.cyan('\n🔍 Ingest\n'));

  const { positionals } = parseArgs({ args, allowPositionals: true });
  const [dir] = positionals;

  if (!dir) {
    throw new ConfigError('Usage: tidytracks ingest <dir>');
  }

  const config = await loadConfig();
  const { store } = openStores(config);

  console.log(chalk.gray(`Extensions: ${config.supportedExtensions.join(', ')}\n`));

  const progressBar = new cliProgress.SingleBar({
    format: 'Extracting metadata |{bar}| {percentage}% | {value}/{total} files | {eta}s remaining',
    barCompleteChar: '█',
    barIncompleteChar: '░',
  });

  let started = false;

  const summary = await ingestDirectory(resolve(dir), store, {
    extensions: config.supportedExtensions,
    onProgress: (_path, done, total) => {
      if (!started) {
        progressBar.start(total, 0);
        started = true;
      }

      progressBar.update(done);
    },
  });

  if (started) {
    progressBar.stop();
  }

  console.log(chalk.green(`\n✓ Ingest complete!`));
  console.log(chalk.gray(`  Files found: ${summary.discovered}`));
  console.log(chalk.gray(`  Tracks stored: ${summary.stored}`));
  console.log(chalk.gray(`  Unreadable: ${summary.unreadable.length}`));
  console.log(chalk.gray(`  Records saved to: ${dataPaths(config).tracks}`));
}

async function runDupes(args: string[]): Promise<void> {
  console.log(chalk.cyan('\n🔎 Duplicate Finder\n'));

  const { values } = parseArgs({
    args,
    options: {
      hash: { type: 'boolean', default: false },
      resolve: { type: 'string' },
      mode: { type: 'string' },
      yes: { type: 'boolean', default: false },
    },
  });

  const config = await loadConfig();
  const { store } = openStores(config);
  const tracks = await store.load();

  if (tracks.length === 0) {
    console.log(chalk.yellow('No tracks found. Run "tidytracks ingest <dir>" first.'));
    return;
  }

  const groups = await detectDuplicates(config, tracks, values.hash || config.duplicates.useContentHash);

  displayDuplicateGroups(groups, tracks);

  const disposition = parseDisposition(values.resolve, 'skip');

  if (disposition === 'skip' || groups.length === 0) {
    return;
  }

  const mode = parseMode(values.mode, 'simulate');
  const paths = dataPaths(config);
  const root = disposition === 'quarantine' ? config.duplicates.quarantineDir ?? '' : paths.trash;
  const base = buildPlan([], compileTemplate(resolveTemplate(config), config.rules), root, 'move');
  const disposals = planDisposals(groups, tracks, disposition, {
    quarantineDir: config.duplicates.quarantineDir,
    trashDir: join(paths.trash, base.id),
  });

  await runPlan(withDisposals(base, disposals), mode === 'simulate' ? mode : 'move', config, tracks, values.yes);
}

async function runOrganize(args: string[]): Promise<void> {
  console.log(chalk.cyan('\n🎵 Organize\n'));

  const { values } = parseArgs({
    args,
    options: {
      dest: { type: 'string' },
      template: { type: 'string', default: 'default' },
      mode: { type: 'string' },
      'require-year': { type: 'boolean', default: false },
      'album-mode': { type: 'string', default: 'tags' },
      'fallback-tags': { type: 'boolean', default: false },
      yes: { type: 'boolean', default: false },
      export: { type: 'boolean', default: false },
    },
  });

  if (!values.dest) {
    throw new ConfigError('Usage: tidytracks organize --dest <dir> [--mode simulate|move|copy|link]');
  }

  const albumMode = values['album-mode'];

  if (albumMode !== 'tags' && albumMode !== 'release') {
    throw new ConfigError(`Unknown album mode "${albumMode}" (expected tags, release)`);
  }

  const config = await loadConfig();
  const template = compileTemplate(resolveTemplate(config, values.template), config.rules);
  const mode = parseMode(values.mode, 'simulate');
  const { store } = openStores(config);
  const tracks = await store.load();

  if (tracks.length === 0) {
    console.log(chalk.yellow('No tracks found. Run "tidytracks ingest <dir>" first.'));
    return;
  }

  const disposition = config.duplicates.disposition;
  const groups =
    disposition === 'skip' ? [] : await detectDuplicates(config, tracks, config.duplicates.useContentHash);

  let plan = buildPlan(tracks, template, values.dest, mode === 'simulate' ? 'move' : mode, {
    requireYear: values['require-year'],
    albumMode,
    fallbackToTags: values['fallback-tags'],
    fallbackTemplate: compileTemplate(RELEASE_FALLBACK_TEMPLATE, config.rules),
    exclude: groups.flatMap((group) => group.losers),
  });

  plan = withDisposals(
    plan,
    planDisposals(groups, tracks, disposition, {
      quarantineDir: config.duplicates.quarantineDir,
      trashDir: join(dataPaths(config).trash, plan.id),
    })
  );

  if (values.export) {
    const file = dataPaths(config).planExport;
    await mkdir(config.dataDir, { recursive: true });
    await writeFile(file, planToCsv(plan));
    console.log(chalk.gray(`Plan exported to: ${file}`));
  }

  await runPlan(plan, mode, config, tracks, values.yes);
}

async function runUndo(args: string[]): Promise<void> {
  console.log(chalk.cyan('\n↩️  Undo\n'));

  const { values } = parseArgs({ args, options: { steps: { type: 'string', default: '1' } } });
  const steps = Number.parseInt(values.steps, 10);

  if (!Number.isInteger(steps) || steps < 1) {
    throw new ConfigError(`--steps must be a positive integer, got "${values.steps}"`);
  }

  const config = await loadConfig();
  const { store, undoLog } = openStores(config);

  for (let step = 0; step < steps; step++) {
    const batch = await undoLog.peek();

    if (!batch) {
      if (step === 0) {
        console.log(chalk.yellow('Nothing to undo.'));
      }

      return;
    }

    const progressBar = new cliProgress.SingleBar({
      format: `Undoing ${batch.id.slice(0, 8)} |{bar}| {value}/{total} entries`,
      barCompleteChar: '█',
      barIncompleteChar: '░',
    });

    progressBar.start(batch.entries.length, 0);

    const report = await undoLog.undoLastBatch({
      store,
      retries: config.execution.transientRetries,
      onProgress: (_result, done) => progressBar.update(done),
    });

    progressBar.stop();
    displayUndoReport(report);

    if (report.failed > 0) {
      process.exitCode = 1;
    }
  }
}

async function runHistory(): Promise<void> {
  const config = await loadConfig();
  const { undoLog } = openStores(config);

  displayHistory(await undoLog.list());
}

async function runPurgeTrash(args: string[]): Promise<void> {
  const { values } = parseArgs({ args, options: { batch: { type: 'string' } } });
  const config = await loadConfig();
  const { undoLog } = openStores(config);

  displayPurgeReport(await undoLog.purgeTrash(values.batch));
}

function printUsage(): void {
  console.log(chalk.cyan('\n🎵 tidytracks\n'));
  console.log('Usage: tidytracks <command> [options]\n');
  console.log('  ingest <dir>                 Read tags from audio files into the track store');
  console.log('  dupes [--hash] [--resolve skip|quarantine|delete] [--mode simulate|move]');
  console.log('  organize --dest <dir> [--template <name|pattern>] [--mode simulate|move|copy|link]');
  console.log('           [--require-year] [--album-mode tags|release] [--fallback-tags] [--yes] [--export]');
  console.log('  undo [--steps n]             Revert the most recent batches');
  console.log('  history                      List recorded batches');
  console.log('  purge-trash [--batch <id>]   Empty the safe-trash');
}

function handleError(error: unknown): void {
  logger.error(errorMessage(error), error);
  process.exitCode = 1;
}

const [command, ...rest] = process.argv.slice(2);

switch (command) {
  case 'ingest':
    runIngest(rest).catch(handleError);
    break;

  case 'dupes':
    runDupes(rest).catch(handleError);
    break;

  case 'organize':
    runOrganize(rest).catch(handleError);
    break;

  case 'undo':
    runUndo(rest).catch(handleError);
    break;

  case 'history':
    runHistory().catch(handleError);
    break;

  case 'purge-trash':
    runPurgeTrash(rest).catch(handleError);
    break;

  default:
    printUsage();
}
