/**
 * Command-line interface for Cloud Cost Inventory.
 *
 * Exit codes: 0 complete, 2 partial (some region scans failed),
 * 130 interrupted, 1 invalid input or unexpected failure.
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import packageJson from '../package.json';
import type { InventoryStatus, ReportFormat } from '@shared/types';
import { setGlobalLogLevel, setupLogger } from '@shared/utils/logger';
import { formatCurrency } from '@shared/utils/money';
import type { ClientFactory } from '@functions/inventory/core/clients';
import { loadConfigFromFile, resolveInventoryOptions } from '@functions/inventory/core/config';
import { runInventory } from '@functions/inventory/core/inventory';
import { isReportFormat, REPORT_FORMATS, writeReport } from '@functions/inventory/report';

const logger = setupLogger('cost-inventory:cli');

export const VERSION: string = packageJson.version;

export const EXIT_CODES: Readonly<Record<InventoryStatus | 'failure', number>> = {
  complete: 0,
  partial: 2,
  interrupted: 130,
  failure: 1,
};

interface ScanCommandOptions {
  regions?: string;
  services?: string;
  profile?: string;
  /** False when --no-cost is given. */
  cost: boolean;
  output?: string;
  format: string;
  concurrency?: number;
  config?: string;
  quiet?: boolean;
}

/**
 * Seams for tests. Defaults write to the process streams and listen for SIGINT.
 */
export interface CliDependencies {
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  clients?: ClientFactory;
  signal?: AbortSignal;
  now?: () => Date;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function linkAbort(controller: AbortController, signal?: AbortSignal): () => void {
  const onSigint = (): void => {
    logger.warn('Interrupt received; finishing with partial results');
    controller.abort();
  };
  const onAbort = (): void => controller.abort();

  process.once('SIGINT', onSigint);
  if (signal?.aborted) {
    controller.abort();
  }
  signal?.addEventListener('abort', onAbort, { once: true });

  return () => {
    process.removeListener('SIGINT', onSigint);
    signal?.removeEventListener('abort', onAbort);
  };
}

type ResolvedDependencies = CliDependencies &
  Required<Pick<CliDependencies, 'stdout' | 'stderr' | 'now'>>;

async function scan(options: ScanCommandOptions, deps: ResolvedDependencies): Promise<number> {
  if (options.quiet) {
    setGlobalLogLevel('silent');
  }

  const format: ReportFormat = isReportFormat(options.format) ? options.format : 'txt';
  const config = options.config ? await loadConfigFromFile(options.config) : undefined;
  const inventoryOptions = resolveInventoryOptions(config, {
    regions: options.regions,
    services: options.services,
    profile: options.profile,
    noCost: options.cost ? undefined : true,
    concurrency: options.concurrency,
  });

  const controller = new AbortController();
  const unlink = linkAbort(controller, deps.signal);

  try {
    const result = await runInventory(inventoryOptions, {
      signal: controller.signal,
      clients: deps.clients,
    });

    try {
      const report = await writeReport(format, result, {
        output: options.output,
        generatedAt: deps.now(),
        version: VERSION,
      });

      if (!options.quiet) {
        if (format === 'txt') {
          deps.stdout(report.content);
        }
        deps.stdout(`Report saved to ${report.filename}\n`);
        const total = formatCurrency(result.costSummary.overallTotal);
        deps.stdout(`Total estimated monthly cost: $${total}\n`);
      }
    } catch (error) {
      // An interrupted run still exits 130 when the best-effort report fails.
      if (result.status !== 'interrupted') {
        throw error;
      }
      logger.error({ error: String(error) }, 'Could not write report for interrupted scan');
    }

    if (result.status === 'interrupted' && !options.quiet) {
      deps.stderr('Scan interrupted by user; report contains partial results.\n');
    }

    return EXIT_CODES[result.status];
  } finally {
    unlink();
  }
}

/**
 * Build the commander program. `setExitCode` receives the scan outcome.
 */
export function buildProgram(deps: CliDependencies, setExitCode: (code: number) => void): Command {
  const stdout = deps.stdout ?? ((text: string) => void process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => void process.stderr.write(text));
  const now = deps.now ?? (() => new Date());

  const program = new Command();

  program
    .name('cost-inventory')
    .description('Multi-region AWS resource inventory with monthly cost estimates')
    .version(VERSION)
    .exitOverride()
    .configureOutput({ writeOut: stdout, writeErr: stderr });

  program
    .command('scan', { isDefault: true })
    .description('Discover resources, estimate monthly cost and write a report')
    .option('--regions <list>', 'Regions to scan (comma-separated) or "all"')
    .option(
      '--services <list>',
      'Services to scan: ec2, ebs, s3, eip, snapshots, or all (comma-separated)'
    )
    .option('--profile <name>', 'AWS profile name to use')
    .option('--no-cost', 'Skip cost calculations (all prices zero)')
    .option('--output <file>', 'Output filename for the report')
    .addOption(
      new Option('--format <format>', 'Report format').choices([...REPORT_FORMATS]).default('txt')
    )
    .option('--concurrency <n>', 'Number of region scans in flight', parsePositiveInt)
    .option('--config <file>', 'YAML configuration file')
    .option('--quiet', 'Suppress logs and console output')
    .action(async (options: ScanCommandOptions) => {
      setExitCode(await scan(options, { ...deps, stdout, stderr, now }));
    });

  return program;
}

/**
 * Run the CLI and resolve to the process exit code. Invalid input
 * (unknown services, a bad config file) is reported on stderr as
 * "Error: <message>" and exits 1.
 */
export async function run(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const stderr = deps.stderr ?? ((text: string) => void process.stderr.write(text));
  let exitCode = EXIT_CODES.complete;
  const program = buildProgram({ ...deps, stderr }, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }

    const message = error instanceof Error ? error.message : String(error);
    logger.error({ error: message }, 'Scan failed');
    stderr(`Error: ${message}\n`);
    return EXIT_CODES.failure;
  }
}
