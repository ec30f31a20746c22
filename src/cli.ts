#!/usr/bin/env node
import dotenv from 'dotenv';

// Load environment variables before any other imports
dotenv.config();

import {
  CatalogClient,
  DiscogsClient,
} from './backend/services/discogsClient';
import {
  DEFAULT_INSPECT_COUNT,
  InspectionService,
  MAX_INSPECT_COUNT,
} from './backend/services/inspectionService';
import { VinylOnlyService } from './backend/services/vinylOnlyService';
import { FinderConfig, loadConfig } from './backend/utils/config';
import {
  formatFormatReport,
  formatListingInspection,
} from './backend/utils/formatting';
import { createLogger } from './backend/utils/logger';
import {
  DEFAULT_GENRE_FILTER,
  parseSellerUrl,
  resolveGenreFilter,
} from './backend/utils/sellerUrl';
import {
  parseBoundedInt,
  validateNumericId,
  validateSellerName,
} from './backend/utils/validation';

const logger = createLogger('CLI');

export type CliCommand =
  | { kind: 'scan'; sellerUrl: string; genre: string | undefined }
  | { kind: 'listings'; seller: string; count: number }
  | { kind: 'formats'; releaseId: number; raw: boolean }
  | { kind: 'usage'; error?: string };

export const USAGE = `Usage:
  vinyl-only-finder <discogs_seller_url> [genre]
  vinyl-only-finder scan <discogs_seller_url> [genre]
  vinyl-only-finder listings <seller_username> [count]
  vinyl-only-finder formats <release_id> [--raw]

Examples:
  vinyl-only-finder 'https://www.discogs.com/seller/some-shop/profile'
  vinyl-only-finder 'https://www.discogs.com/seller/some-shop/profile' Rock
  vinyl-only-finder 'https://www.discogs.com/seller/some-shop/profile' ''  # No genre filter
  vinyl-only-finder listings some-shop 5
  vinyl-only-finder formats 123456
  vinyl-only-finder formats 123456 --raw  # Also dump each version's JSON

Default genre filter: ${DEFAULT_GENRE_FILTER}
A genre= parameter in the seller URL overrides the genre argument.
Set DISCOGS_API_KEY to use authenticated requests.`;

export function parseArgs(argv: string[]): CliCommand {
  const [first, ...rest] = argv;
  if (first === undefined || first === '-h' || first === '--help') {
    return { kind: 'usage' };
  }

  switch (first) {
    case 'scan': {
      const [sellerUrl, genre] = rest;
      if (!sellerUrl) {
        return { kind: 'usage', error: 'Missing seller URL' };
      }
      return { kind: 'scan', sellerUrl, genre };
    }

    case 'listings': {
      const [seller, rawCount] = rest;
      if (!seller) {
        return { kind: 'usage', error: 'Missing seller username' };
      }
      if (!validateSellerName(seller)) {
        return { kind: 'usage', error: `Invalid seller username: ${seller}` };
      }
      if (rawCount === undefined) {
        return { kind: 'listings', seller, count: DEFAULT_INSPECT_COUNT };
      }
      const count = parseBoundedInt(rawCount, 1, MAX_INSPECT_COUNT);
      if (count === null) {
        return {
          kind: 'usage',
          error: `Count must be a whole number from 1 to ${MAX_INSPECT_COUNT}`,
        };
      }
      return { kind: 'listings', seller, count };
    }

    case 'formats': {
      const raw = rest.includes('--raw');
      const [id] = rest.filter(arg => arg !== '--raw');
      if (!id) {
        return { kind: 'usage', error: 'Missing release ID' };
      }
      if (!validateNumericId(id)) {
        return { kind: 'usage', error: `Invalid release ID: ${id}` };
      }
      return { kind: 'formats', releaseId: Number(id), raw };
    }

    default:
      return { kind: 'scan', sellerUrl: first, genre: rest[0] };
  }
}

type RunnableCommand =
  | { kind: 'scan'; seller: string; genreFilter: string | null }
  | Extract<CliCommand, { kind: 'listings' | 'formats' }>;

/**
 * Resolve the seller and genre filter of a scan. Throws SellerUrlError on a
 * malformed URL, before any request is made.
 */
function prepareCommand(
  command: Exclude<CliCommand, { kind: 'usage' }>
): RunnableCommand {
  if (command.kind !== 'scan') {
    return command;
  }
  const { seller, query } = parseSellerUrl(command.sellerUrl);
  return {
    kind: 'scan',
    seller,
    genreFilter: resolveGenreFilter(command.genre, query),
  };
}

async function runCommand(
  command: RunnableCommand,
  client: CatalogClient,
  output: (line: string) => void
): Promise<void> {
  switch (command.kind) {
    case 'scan': {
      const service = new VinylOnlyService(client, output);
      await service.scanSeller(command.seller, command.genreFilter);
      break;
    }
    case 'listings': {
      const service = new InspectionService(client);
      const inspections = await service.inspectListings(
        command.seller,
        command.count
      );
      output(`Found ${inspections.length} listings`);
      inspections.forEach((inspection, i) => {
        formatListingInspection(inspection, i + 1).forEach(line =>
          output(line)
        );
      });
      break;
    }
    case 'formats': {
      const service = new InspectionService(client);
      const report = await service.buildFormatReport(command.releaseId);
      formatFormatReport(report, { raw: command.raw }).forEach(line =>
        output(line)
      );
      break;
    }
  }
}

export interface CliDeps {
  config?: FinderConfig;
  /** Builds the API client for the run; defaults to a {@link DiscogsClient} */
  createClient?: (config: FinderConfig) => CatalogClient;
  output?: (line: string) => void;
}

/**
 * Run one command. Resolves to the process exit code.
 */
export async function main(
  argv: string[],
  deps: CliDeps = {}
): Promise<number> {
  const output = deps.output ?? ((line: string) => console.log(line));
  const parsed = parseArgs(argv);

  if (parsed.kind === 'usage') {
    if (parsed.error) {
      console.error(`Error: ${parsed.error}\n`);
    }
    console.error(USAGE);
    return 1;
  }

  let command: RunnableCommand;
  let config: FinderConfig;
  try {
    command = prepareCommand(parsed);
    config = deps.config ?? loadConfig();
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  const client = deps.createClient
    ? deps.createClient(config)
    : new DiscogsClient(config);

  try {
    await runCommand(command, client, output);
    return 0;
  } catch (error) {
    logger.error('Command failed', error);
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      logger.error('Unexpected failure', error);
      process.exitCode = 1;
    });
}
