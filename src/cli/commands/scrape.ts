import type { Command } from 'commander';

import { readSettings, type Credential, type Settings } from '../../bootstrap/env.js';
import { bindProcessSignals } from '../../bootstrap/signals.js';
import { buildLoginUrl, defaultPageTargets, sourceDomain, type PageTarget } from '../../config.js';
import { createFileDiagnosticSink } from '../../debugging.js';
import { describeError } from '../../errors.js';
import { createFileSnapshotStore } from '../../io/snapshot-store.js';
import { maskIdentity } from '../../login.js';
import { PortfolioScraper, type ScrapeRunResult } from '../../modules/portfolio/scraper.js';
import { toDisk } from '../../modules/portfolio/snapshot.js';
import { loadPageTargets } from '../pages.js';
import { printJson, resolveEnv, resolvePath, type CommandContext } from './shared.js';

type ScrapeOptions = {
  pages?: string;
  output?: string;
  diagnostics?: string;
  headed?: boolean;
  json?: boolean;
  dryRun?: boolean;
};

export interface ScrapePlan {
  readonly credential: Credential;
  readonly settings: Settings;
  readonly loginUrl: string;
  readonly outputPath: string;
  readonly diagnosticsDir: string;
  readonly headless: boolean;
  readonly pages: readonly PageTarget[];
}

async function resolvePlan(options: ScrapeOptions, context: CommandContext): Promise<ScrapePlan> {
  const settings = readSettings(resolveEnv(context));
  if (!settings.credential) {
    throw new Error('PORTAL_EMAIL and PORTAL_PASSWORD must both be set.');
  }

  const pages = options.pages
    ? await loadPageTargets(resolvePath(context, options.pages), settings.baseUrl)
    : defaultPageTargets(settings.baseUrl);

  return {
    credential: settings.credential,
    settings,
    loginUrl: buildLoginUrl(settings.baseUrl),
    outputPath: options.output ? resolvePath(context, options.output) : settings.outputPath,
    diagnosticsDir: options.diagnostics ? resolvePath(context, options.diagnostics) : settings.diagnosticsDir,
    headless: options.headed ? false : settings.headless,
    pages,
  };
}

function describePlan(plan: ScrapePlan) {
  return {
    identity: maskIdentity(plan.credential.identity),
    loginUrl: plan.loginUrl,
    output: plan.outputPath,
    diagnostics: plan.diagnosticsDir,
    headless: plan.headless,
    pages: plan.pages.map((page) => ({
      portfolio: page.portfolio,
      label: page.label,
      url: page.url,
      alternates: page.alternateUrls,
    })),
  };
}

function printPlan(plan: ScrapePlan, json: boolean, context: CommandContext): void {
  const description = describePlan(plan);
  if (json) {
    printJson(context, { dryRun: true, ...description });
    return;
  }

  const { log } = context.output;
  log('Dry run: no browser will be launched.');
  log(`Identity: ${description.identity}`);
  log(`Login URL: ${description.loginUrl}`);
  log(`Output: ${description.output}`);
  log(`Diagnostics: ${description.diagnostics}`);
  log(`Headless: ${description.headless}`);
  log('Pages:');
  for (const page of description.pages) {
    const alternates = page.alternates.length > 0 ? ` (alternates: ${page.alternates.join(', ')})` : '';
    log(`- ${page.label} (${page.portfolio}): ${page.url}${alternates}`);
  }
}

function printResult(result: ScrapeRunResult, plan: ScrapePlan, json: boolean, context: CommandContext): void {
  if (json) {
    printJson(context, {
      status: result.status,
      exitCode: result.exitCode,
      written: result.written,
      output: plan.outputPath,
      error: result.error ? result.error.message : null,
      pages: result.pages,
      snapshot: result.snapshot ? toDisk(result.snapshot) : null,
    });
    return;
  }

  const { log, error } = context.output;
  log(`Status: ${result.status} (exit ${result.exitCode})`);
  for (const page of result.pages) {
    log(`- ${page.label} [${page.outcome}] ${page.positions} positions from ${page.url}`);
  }
  if (result.error) {
    error(result.error.message);
  }
  log(result.written ? `Snapshot written to ${plan.outputPath}` : `Snapshot unchanged at ${plan.outputPath}`);
}

async function runScrape(plan: ScrapePlan, json: boolean, context: CommandContext): Promise<number> {
  const { settings } = plan;
  const logger = context.createLogger({ name: 'scrape', directory: settings.logDir, echo: !json });
  bindProcessSignals();

  try {
    const scraper = new PortfolioScraper({
      store: createFileSnapshotStore(plan.outputPath, logger),
      diagnostics: createFileDiagnosticSink(plan.diagnosticsDir, logger),
      launchBrowser: () =>
        context.launchBrowser(
          { headless: plan.headless },
          { debugNetwork: settings.debugNetwork, debugConsole: settings.debugConsole },
          logger,
        ),
      logger,
      loginUrl: plan.loginUrl,
      source: sourceDomain(settings.baseUrl),
      timing: settings.timing,
    });

    logger.info('[cli] scrape started', { identity: maskIdentity(plan.credential.identity), pages: plan.pages.length });
    const result = await scraper.run(plan.credential, plan.pages);
    printResult(result, plan, json, context);
    return result.exitCode;
  } catch (error) {
    logger.error('[cli] scrape failed', { error: describeError(error) });
    throw error;
  } finally {
    await logger.close();
  }
}

export function registerScrapeCommand(program: Command, context: CommandContext): Command {
  return program
    .command('scrape')
    .description('Logs in, scrapes every portfolio page and updates the snapshot file.')
    .option('--pages <file>', 'YAML file with the page targets to scrape')
    .option('--output <file>', 'Snapshot file to update (defaults to OUTPUT_PATH)')
    .option('--diagnostics <dir>', 'Directory for debug page captures (defaults to DIAGNOSTICS_DIR)')
    .option('--headed', 'Show the browser window')
    .option('--json', 'Print the run result as JSON')
    .option('--dry-run', 'Print the resolved plan without launching a browser')
    .action(async (options: ScrapeOptions) => {
      const json = Boolean(options.json);
      const plan = await resolvePlan(options, context);

      if (options.dryRun) {
        printPlan(plan, json, context);
        context.setExitCode(0);
        return;
      }

      context.setExitCode(await runScrape(plan, json, context));
    });
}
