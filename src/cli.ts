/**
 * CLI Argument Parsing and Help
 *
 * Handles command-line argument parsing, help text and response formatting.
 */

import type { AgentResponse } from './types.js';
import { isErrorResponse } from './types.js';
import { ValidationError } from './errors/index.js';

// ANSI color codes for terminal output
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

export function c(text: string, color: keyof typeof colors): string {
  return `${colors[color]}${text}${colors.reset}`;
}

export const VERSION = '0.1.0';

/**
 * CLI arguments structure.
 */
export interface CLIArgs {
  help: boolean;
  version: boolean;
  debug: boolean;
  broadcast: boolean;
  summary: boolean;
  configPath?: string;
  maxTurns?: number;
  /** Transcript key when persistence is configured */
  sessionId?: string;
  message?: string;
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('--')) {
    throw new ValidationError(`${flag} expects a value`, [flag]);
  }
  return value;
}

/**
 * Parse command-line arguments. Everything from the first positional
 * argument on is the message.
 */
export function parseArgs(args: string[] = process.argv.slice(2)): CLIArgs {
  const result: CLIArgs = {
    help: false,
    version: false,
    debug: false,
    broadcast: false,
    summary: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (arg === '--debug') {
      result.debug = true;
    } else if (arg === '--broadcast' || arg === '-b') {
      result.broadcast = true;
    } else if (arg === '--summary' || arg === '-s') {
      result.summary = true;
    } else if (arg === '--config' || arg === '-c') {
      result.configPath = requireValue(args, ++i, arg);
    } else if (arg === '--session') {
      result.sessionId = requireValue(args, ++i, arg);
    } else if (arg === '--max-turns' || arg === '-n') {
      const raw = requireValue(args, ++i, arg);
      const value = Number(raw);
      if (!Number.isInteger(value) || value <= 0) {
        throw new ValidationError(`${arg} expects a positive integer, got "${raw}"`, ['maxTurns']);
      }
      result.maxTurns = value;
    } else if (arg === '--') {
      result.message = args.slice(i + 1).join(' ');
      break;
    } else if (arg.startsWith('-')) {
      throw new ValidationError(`Unknown option: ${arg}`, [arg]);
    } else {
      result.message = args.slice(i).join(' ');
      break;
    }
  }

  return result;
}

export function helpText(): string {
  return `
${c('CONVENE - MULTI-AGENT GROUP CHAT', 'bold')}

${c('USAGE:', 'bold')}
  convene [OPTIONS] <MESSAGE>

${c('OPTIONS:', 'bold')}
  -h, --help              Show this help
  -v, --version           Show version (${VERSION})
  -c, --config PATH       Config file, applied over user and project config
  -n, --max-turns N       Turn budget for this run
  -b, --broadcast         Ask every active participant at once
  -s, --summary           Print a summary after the responses
  --session ID            Transcript key (with persistence configured)
  --debug                 Debug logging, also written to the log file

${c('CONFIG:', 'bold')}
  ~/.config/convene/config.json   User config
  .convene/config.json            Project config
  Without configured agents, two offline demo agents are used.

${c('EXAMPLES:', 'bold')}
  ${c('# Let the agents discuss until one says TERMINATE', 'dim')}
  convene "Who owns the onboarding guide?"

  ${c('# Everyone answers once, then summarize', 'dim')}
  convene --broadcast --summary "What should we cover in the Q3 review?"
`;
}

export function showHelp(): void {
  console.log(helpText());
}

/**
 * One response as a terminal line: `[agent] content`, red when the response
 * reports a failure.
 */
export function formatResponse(response: AgentResponse): string {
  const label = c(`[${response.agentName}]`, isErrorResponse(response) ? 'red' : 'cyan');
  return `${label} ${response.content}`;
}
