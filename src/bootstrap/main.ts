#!/usr/bin/env node
import { pathToFileURL } from 'node:url';
import { loadConfig } from '../infra/config/config.js';
import { createLogger } from '../infra/logger/logger.js';
import { DispatchError } from '../core/errors.js';
import { consoleOutput, type OutputSink } from '../core/event/OutputSink.js';
import { bootstrapHandlers, createEvent } from './createEvent.js';

export const USAGE = 'Usage: sitehook <event-type> [key=value ...]';

function parseValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

/**
 * Parses `key=value` pairs into an event context. Values that are valid
 * JSON are decoded, anything else is kept as a string.
 */
export function parseContextArgs(args: string[]): Record<string, unknown> {
  const context: Record<string, unknown> = {};
  for (const arg of args) {
    const eq = arg.indexOf('=');
    if (eq <= 0) {
      throw new Error(`Expected key=value, got "${arg}"`);
    }
    context[arg.slice(0, eq)] = parseValue(arg.slice(eq + 1));
  }
  return context;
}

/**
 * Runs one event from the command line.
 * @returns process exit code: 0 all handlers completed, 1 some failed, 2 usage or dispatch error
 */
export async function start(argv: string[], output: OutputSink = consoleOutput()): Promise<number> {
  const cfg = loadConfig();
  const logger = createLogger(cfg);
  const [type, ...rest] = argv;

  if (!type) {
    output.writeln(USAGE);
    return 2;
  }

  try {
    const context = parseContextArgs(rest);
    await bootstrapHandlers();
    logger.info('bootstrap', `Running ${type} in ${cfg.app.env}`);

    const event = createEvent(type, context, output, { logger });
    const summary = await event.run();

    output.writeln(JSON.stringify(event.debug(), null, 2));
    return summary.failed > 0 ? 1 : 0;
  } catch (err) {
    const kind = err instanceof DispatchError ? err.name : 'Error';
    logger.error('bootstrap', `${kind}: ${err instanceof Error ? err.message : String(err)}`);
    return 2;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  start(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 2;
    },
  );
}
