import type { Command } from 'commander';

const INTRO = `Portfolio scraper CLI.

Credentials come from PORTAL_EMAIL and PORTAL_PASSWORD (.env and .env.local are loaded).
Command flags take precedence over environment variables, which take precedence over defaults.`;

const EXAMPLES = `
Examples:
  portfolio-scraper scrape
  portfolio-scraper scrape --pages pages.yaml --output data/portfolios.json --headed
  portfolio-scraper scrape --dry-run --json
  portfolio-scraper show
`;

const EXIT_STATUS = `
Exit status:
  0  snapshot updated
  1  login failure or configuration error
  2  both sub-portfolios empty after falling back to the prior snapshot
  3  no page yielded positions, prior snapshot kept
`;

export function attachHelp(program: Command): void {
  program.addHelpText('beforeAll', `${INTRO}\n`);
  program.addHelpText('afterAll', `${EXAMPLES}${EXIT_STATUS}`);
  program.configureHelp({
    commandUsage: () => 'portfolio-scraper <command> [options]',
  });
}
