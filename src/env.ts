import { config } from 'dotenv';
import type { TransportPreference } from './serverTarget';
import { UsageError } from './shared/errors';

config();

export const USAGE = `Usage: optimade-mcp-client <server-script-or-url> [options]

Options:
  --server <path>        local MCP server script (.py or .js), connected over stdio
  --server-url <url>     remote MCP server (.../mcp for Streamable HTTP, .../sse for SSE)
  --transport <kind>     auto | stdio | http | sse (default: auto)
  --model <name>         override the provider's default model
  --query <text>         answer a single query and exit
  --list-tools           print the server's tools and exit
  --log-file <path>      mirror console output into a file
  --debug                verbose logging
  -h, --help             show this message

Examples:
  optimade-mcp-client ../optimade-mcp-server/src/optimade_mcp_server/main.py
  optimade-mcp-client http://localhost:8080/mcp`;

export interface CliOptions {
  server?: string;
  transport: TransportPreference;
  model?: string;
  query?: string;
  logFile?: string;
  debug: boolean;
  listTools: boolean;
  showUsage: boolean;
}

const TRANSPORTS: readonly TransportPreference[] = ['auto', 'stdio', 'http', 'sse'];

function isTransportPreference(value: string): value is TransportPreference {
  return (TRANSPORTS as readonly string[]).includes(value);
}

/**
 * Parses the argument vector without the node executable and script path.
 * Unknown flags are ignored; the first bare argument is the server.
 */
export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    transport: 'auto',
    debug: false,
    listTools: false,
    showUsage: false,
  };
  let serverPath: string | undefined;
  let serverUrl: string | undefined;
  let positional: string | undefined;

  const valueFor = (flag: string, index: number): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`Missing value for ${flag}.`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--server':
        serverPath = valueFor(arg, i++);
        break;
      case '--server-url':
        serverUrl = valueFor(arg, i++);
        break;
      case '--transport': {
        const value = valueFor(arg, i++).toLowerCase();
        if (!isTransportPreference(value)) {
          throw new UsageError(`Unsupported transport "${value}". Use one of: ${TRANSPORTS.join(', ')}.`);
        }
        options.transport = value;
        break;
      }
      case '--model':
        options.model = valueFor(arg, i++);
        break;
      case '--query':
        options.query = valueFor(arg, i++);
        break;
      case '--log-file':
        options.logFile = valueFor(arg, i++);
        break;
      case '--debug':
        options.debug = true;
        break;
      case '--list-tools':
        options.listTools = true;
        break;
      case '-h':
      case '--help':
        options.showUsage = true;
        break;
      default:
        if (!arg.startsWith('-') && positional === undefined) {
          positional = arg;
        }
        break;
    }
  }

  if (serverPath && serverUrl) {
    throw new UsageError('Use either --server or --server-url, not both.');
  }

  options.server = serverPath ?? serverUrl ?? positional;
  return options;
}
