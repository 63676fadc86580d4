#!/usr/bin/env node
import 'dotenv/config';
import { createClientFromConfig, loadConfig } from './config.js';
import { InvalidArgumentError, PIClientError } from './errors.js';
import type { PIClient } from './pi-client.js';
import {
  type BufferOption,
  type RetrievalMode,
  type UpdateOption,
  parseBufferOption,
  parseRetrievalMode,
  parseUpdateOption,
} from './pi-consts.js';
import type { PIScalar } from './pi-types.js';
import type { InterpolatedQuery } from './value-fetchers.js';

export type Command =
  | { name: 'servers' }
  | { name: 'resolve'; pattern: string }
  | { name: 'get'; tag: string; query?: InterpolatedQuery }
  | { name: 'get-many'; pattern: string }
  | { name: 'recorded'; tag: string; time: string; mode: RetrievalMode }
  | { name: 'recorded-many'; pattern: string; time: string; mode: RetrievalMode }
  | {
      name: 'write';
      tag: string;
      value: PIScalar;
      timestamp?: Date;
      updateOption: UpdateOption;
      bufferOption: BufferOption;
    };

export const USAGE = [
  'Usage: pi-tags <command> [args]',
  '  servers',
  '  resolve <pattern>',
  '  get <tag> [startTime] [endTime] [interval]',
  '  get-many <pattern>',
  '  recorded <tag> <time> [mode=Exact]',
  '  recorded-many <pattern> <time> [mode=Exact]',
  '  write <tag> <value> [timestamp] [updateOption=Replace] [bufferOption=BufferIfPossible]',
].join('\n');

function required(args: string[], index: number, name: string): string {
  const value = args[index];
  if (value === undefined || value === '') {
    throw new InvalidArgumentError(`Missing <${name}>\n${USAGE}`);
  }
  return value;
}

/** Numbers and booleans are written as such; anything else as a string. */
export function parseScalar(raw: string): PIScalar {
  if (/^-?\d+(\.\d+)?([eE][-+]?\d+)?$/.test(raw)) return Number(raw);
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  return raw;
}

function parseTimestamp(raw: string): Date {
  const date = new Date(raw);
  if (isNaN(date.getTime())) {
    throw new InvalidArgumentError(`Invalid timestamp "${raw}"`);
  }
  return date;
}

export function parseCommand(argv: string[]): Command {
  const [name, ...args] = argv;
  switch (name) {
    case 'servers':
      return { name: 'servers' };
    case 'resolve':
      return { name: 'resolve', pattern: required(args, 0, 'pattern') };
    case 'get-many':
      return { name: 'get-many', pattern: required(args, 0, 'pattern') };
    case 'get': {
      const tag = required(args, 0, 'tag');
      const [startTime, endTime, interval] = args.slice(1);
      if (startTime === undefined) return { name: 'get', tag };
      return { name: 'get', tag, query: { startTime, endTime, interval } };
    }
    case 'recorded':
      return {
        name: 'recorded',
        tag: required(args, 0, 'tag'),
        time: required(args, 1, 'time'),
        mode: parseRetrievalMode(args[2] ?? 'Exact'),
      };
    case 'recorded-many':
      return {
        name: 'recorded-many',
        pattern: required(args, 0, 'pattern'),
        time: required(args, 1, 'time'),
        mode: parseRetrievalMode(args[2] ?? 'Exact'),
      };
    case 'write': {
      const timestamp = args[2];
      return {
        name: 'write',
        tag: required(args, 0, 'tag'),
        value: parseScalar(required(args, 1, 'value')),
        timestamp: timestamp ? parseTimestamp(timestamp) : undefined,
        updateOption: parseUpdateOption(args[3] ?? 'Replace'),
        bufferOption: parseBufferOption(args[4] ?? 'BufferIfPossible'),
      };
    }
    default:
      throw new InvalidArgumentError(
        name ? `Unknown command "${name}"\n${USAGE}` : USAGE
      );
  }
}

/** Run one command; the result is plain JSON-serializable data. */
export async function runCommand(client: PIClient, command: Command): Promise<unknown> {
  switch (command.name) {
    case 'servers':
      return client.getAllDataServers();
    case 'resolve':
      return Object.fromEntries(await client.resolve(command.pattern));
    case 'get':
      return client.getValue(command.tag, command.query);
    case 'get-many':
      return Object.fromEntries(await client.getValues(command.pattern));
    case 'recorded':
      return client.getRecordedValue(command.tag, command.time, command.mode);
    case 'recorded-many':
      return Object.fromEntries(
        await client.getRecordedValues(command.pattern, command.time, command.mode)
      );
    case 'write': {
      const location = await client.updateValue(
        { timestamp: command.timestamp ?? new Date(), value: command.value },
        { updateOption: command.updateOption, bufferOption: command.bufferOption },
        { tag: command.tag }
      );
      return { location };
    }
  }
}

async function main(): Promise<void> {
  try {
    const command = parseCommand(process.argv.slice(2));
    const client = createClientFromConfig(loadConfig());
    const result = await runCommand(client, command);
    console.log(JSON.stringify(result, null, 2));
  } catch (err) {
    if (err instanceof PIClientError) {
      console.error(`[PI Client] ${err.name}: ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

if (require.main === module) {
  main().catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}
