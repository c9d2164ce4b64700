import { Logger } from './utils/logger.js';
import { getConfigWarnings, type Config } from './utils/config.js';
import { invalidArgument } from './utils/errors.js';
import { SharePointListSource, assertValidLimit, type ListTransport } from './sources/sharepoint-list.js';
import { saveToCsv } from './export/csv.js';
import { formatPreview } from './export/display.js';

export interface CliOptions {
  limit?: number;
  output?: string;
  help: boolean;
}

export const USAGE = `
SharePoint List Export

Usage: sp-list-export [options]

Options:
  --limit <n>       Retrieve at most n items (first page only)
  --output <file>   CSV file to write (default: derived from the list title)
  --help, -h        Show this help message

Environment Variables:
  SP_SITE_URL       SharePoint site address (default: https://sgi.cedia.org.ec)
  SP_USERNAME       Account name (default: nintexinstall)
  SP_PASSWORD       Account password (required)
  SP_DOMAIN         NTLM domain (optional)
  SP_WORKSTATION    NTLM workstation (optional)
  SP_LIST_TITLE     List display name (default: RA4-1 Solicitud para Viajes)
  SP_TIMEOUT_MS     Per-request timeout in milliseconds (default: 30000)
  SP_OUTPUT_FILE    CSV file to write
  LOG_LEVEL         Log level: debug, info, warning, error (default: info)
  OTEL_ENABLED      Enable OpenTelemetry (default: false)
  OTEL_EXPORTER_OTLP_ENDPOINT  OpenTelemetry endpoint URL
`;

function optionValue(args: string[], index: number, name: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw invalidArgument(`${name} requires a value`);
  }
  return value;
}

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = { help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--limit') {
      const raw = optionValue(args, i++, arg);
      const limit = Number(raw);
      assertValidLimit(limit);
      options.limit = limit;
    } else if (arg === '--output') {
      options.output = optionValue(args, i++, arg);
    } else {
      throw invalidArgument(`Unknown option: ${arg}`);
    }
  }

  return options;
}

/**
 * Fetch, preview and export the configured list. Returns the CSV path.
 */
export async function run(
  options: CliOptions,
  config: Config,
  transport: ListTransport,
  logger: Logger,
  print: (text: string) => void = (text) => process.stdout.write(`${text}\n`)
): Promise<string> {
  for (const warning of getConfigWarnings(config)) {
    logger.warning('main', { message: warning });
  }

  logger.info('main', {
    action: 'starting',
    site: config.siteUrl,
    list: config.listTitle,
    limit: options.limit ?? null,
  });

  const source = new SharePointListSource(config, transport, logger);
  const table =
    options.limit === undefined
      ? await source.getAllItems()
      : await source.getItemsWithLimit(options.limit);

  print(formatPreview(table));

  return saveToCsv(table, config.listTitle, logger, options.output ?? config.outputFile);
}
