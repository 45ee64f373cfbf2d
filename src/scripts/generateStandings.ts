#!/usr/bin/env npx tsx

import { config as loadEnv } from 'dotenv';
loadEnv(); // Load SWID / ESPN_S2 / ESPN_LEAGUE_ID from .env

import chalk from 'chalk';
import { ConfigurationError, loadConfig } from '../config';
import { EspnAPIError, EspnClient } from '../services/espnClient';
import { generateStandingsReport } from '../services/standingsPipeline';
import type { StandingsReportRow } from '../../shared/types/standings';

const USAGE = 'Usage: npm run standings -- [--out <file>] [--external <file>] [--week <n>] [--dry-run]';

interface CliArgs {
  out?: string;
  external?: string;
  week?: number;
  dryRun: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { dryRun: false };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    const value = argv[i + 1];
    switch (flag) {
      case '--out':
      case '--external':
        if (!value) throw new ConfigurationError(`${flag} needs a file path\n${USAGE}`);
        if (flag === '--out') args.out = value;
        else args.external = value;
        i++;
        break;
      case '--week': {
        const week = Number(value);
        if (!Number.isInteger(week) || week < 1) {
          throw new ConfigurationError(`--week needs a positive integer\n${USAGE}`);
        }
        args.week = week;
        i++;
        break;
      }
      case '--dry-run':
        args.dryRun = true;
        break;
      default:
        throw new ConfigurationError(`Unknown argument ${flag}\n${USAGE}`);
    }
  }

  return args;
}

function printStandings(rows: StandingsReportRow[]): void {
  const sorted = [...rows].sort((a, b) => a.Rank - b.Rank);
  console.log(chalk.bold('\n  #  Team                          Overall    Median   GB      PF'));
  for (const row of sorted) {
    const line = [
      String(row.Rank).padStart(3),
      row.Team.padEnd(29).slice(0, 29),
      row['Overall Record'].padEnd(10),
      row['Median Score Record'].padEnd(8),
      String(row.GB).padStart(4),
      row.PF.toFixed(2).padStart(9),
    ].join('  ');
    console.log(row.GB === 0 ? chalk.green(line) : line);
  }
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();

  console.log(chalk.blue(`🏈 Building standings for league ${config.leagueId} (${config.season})`));

  const client = new EspnClient(config);
  const result = await generateStandingsReport(
    {
      ...config,
      outputFile: args.out ?? config.outputFile,
      externalResultsFile: args.external ?? config.externalResultsFile,
    },
    client,
    { currentWeek: args.week, write: !args.dryRun }
  );

  printStandings(result.rows);
  console.log(chalk.gray(`\nScored ${result.weeksScored} of ${result.lastWeek} weeks, merged ${result.externalRows} external rows`));

  if (result.outputFile) {
    console.log(chalk.green(`✅ Data written to ${result.outputFile}`));
  } else {
    console.log(chalk.yellow('🧪 Dry run, nothing written'));
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    console.error(chalk.red(`❌ Configuration error: ${error.message}`));
  } else if (error instanceof EspnAPIError) {
    console.error(chalk.red(`❌ ESPN request failed (${error.statusCode ?? 'network'}) at ${error.endpoint ?? 'unknown endpoint'}: ${error.message}`));
  } else {
    console.error(chalk.red('❌ Standings run failed:'));
    console.error(error);
  }
  process.exit(1);
});
