#!/usr/bin/env node
/**
 * convene - multi-agent group chat from the command line
 *
 * Loads config, builds the agent registry and one group chat, posts the
 * message, and prints every agent response.
 *
 * Run: convene "Who owns the onboarding guide?"
 */

// Load environment
import { config as loadEnv } from 'dotenv';
loadEnv();

import { randomUUID } from 'node:crypto';
import { parseArgs, showHelp, formatResponse, c, VERSION, type CLIArgs } from './cli.js';
import { loadConfig } from './config/config-manager.js';
import type { ValidatedUserConfig } from './config/schema.js';
import { buildRegistry, createChatFactory } from './setup.js';
import { SessionManager } from './sessions/session-manager.js';
import { SQLiteTranscriptStore, type TranscriptStore } from './sessions/transcript-store.js';
import { CancellationError, toError } from './errors/index.js';
import { configureLogger, ConsoleSink, FileSink, createComponentLogger, type LogSink } from './observability/logger.js';
import { getLogPath, getTranscriptsDbPath } from './paths.js';
import type { AgentResponse } from './types.js';

const log = createComponentLogger('CLI');

function setupLogging(args: CLIArgs, config: ValidatedUserConfig): void {
  const sinks: LogSink[] = [new ConsoleSink()];
  const file = config.logging?.file ?? (args.debug ? getLogPath() : undefined);
  if (file) {
    sinks.push(new FileSink(file));
  }
  configureLogger({
    level: args.debug ? 'debug' : (config.logging?.level ?? 'warn'),
    sinks,
  });
}

function printResponses(responses: readonly AgentResponse[]): void {
  for (const response of responses) {
    console.log(formatResponse(response));
  }
}

async function main(): Promise<number> {
  const args = parseArgs();

  if (args.help) {
    showHelp();
    return 0;
  }
  if (args.version) {
    console.log(`convene v${VERSION}`);
    return 0;
  }

  const message = args.message;
  if (message === undefined || message.trim() === '') {
    console.error(c('No message given. Run convene --help for usage.', 'red'));
    return 1;
  }

  const { config, warnings } = loadConfig({ configPath: args.configPath });
  setupLogging(args, config);
  for (const warning of warnings) {
    log.warn('Config warning', { warning });
  }

  const registry = await buildRegistry(config);
  let store: TranscriptStore | undefined;
  if (config.persistence) {
    store = new SQLiteTranscriptStore({ dbPath: config.persistence.dbPath ?? getTranscriptsDbPath() });
  }
  const sessions = new SessionManager({
    createChat: createChatFactory({ config, registry, maxTurns: args.maxTurns }),
    store,
    idleTimeoutMs: config.persistence?.idleTimeoutMs,
  });

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);

  try {
    const sessionId = args.sessionId ?? randomUUID();
    await sessions.run(sessionId, async (chat) => {
      const responses = args.broadcast
        ? await chat.broadcast(message, 'User', {}, { signal: controller.signal })
        : await chat.send(message, 'User', {}, { signal: controller.signal });
      printResponses(responses);

      const stats = chat.getConversationSummary();
      const reason = chat.getLastTransitionReason() ?? 'unknown';
      console.log(c(`\n${stats.totalTurns} turn(s), ended by ${reason}`, 'dim'));

      if (args.summary) {
        console.log(`\n${c('SUMMARY', 'bold')}\n${await chat.summarize()}`);
      }
    });
    return 0;
  } catch (err) {
    if (err instanceof CancellationError) {
      printResponses(err.partialResponses);
      console.error(c('Interrupted', 'yellow'));
      return 130;
    }
    throw err;
  } finally {
    process.off('SIGINT', onInterrupt);
    sessions.closeAll();
    store?.close();
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(c(`Error: ${toError(err).message}`, 'red'));
    process.exit(1);
  }
);
