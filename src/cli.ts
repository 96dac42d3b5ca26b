#!/usr/bin/env node
import { ConfigError, readConfig, type RuntimeConfig } from './config';
import { rollCompound } from './dice/combiner';
import { DiceError } from './dice/errors';
import { formatRollMessage } from './dice/formatter';
import { createRandomSource } from './dice/random';
import { checkLogs, purgeOldLogs } from './logRotation';
import { formatQuestList } from './quests/format';
import { migrate } from './quests/pgQuestRepository';
import { createQuestRepository } from './quests/repoFactory';
import { listQuests } from './quests/repository';
import { QUEST_LIST_KINDS, type QuestListKind } from './quests/types';

/**
 * Command-line interface
 *
 * Maintenance tasks (schema migration, quest listing, log checks), a local
 * dice roller that prints exactly what the bot would post, and `start`.
 * Every command reads `config.json` the same way the bot does.
 *
 * @module cli
 */

function printUsage(): void {
  console.log('Quest Dice Bot CLI');
  console.log('Usage: node dist/src/index.js <command> [args]');
  console.log('Commands:');
  console.log('  start                          Start the Slack bot');
  console.log('  roll <notation> [--name NAME]  Roll dice locally, e.g. roll 2d6+1 and 1d20');
  console.log('  migrate                        Apply sql/quests.sql to the configured database');
  console.log('  list-quests [kind] [n]         List quests (active|newest|updated|inactive|all)');
  console.log('  check-logs                     Run log rotation checks once and exit');
  console.log('  purge-logs                     Purge old rotated logs');
  console.log('  help, -h, --help               Show this help');
}

/** Remove `--name <value>` from `args`, returning the value. */
function takeOption(args: string[], flag: string): string | undefined {
  const i = args.indexOf(flag);
  if (i === -1) return undefined;
  const [, value] = args.splice(i, 2);
  return value;
}

function isListKind(value: string): value is QuestListKind {
  return QUEST_LIST_KINDS.some(k => k === value);
}

async function rollCommand(config: RuntimeConfig, args: string[]): Promise<number> {
  const name = takeOption(args, '--name') ?? 'you';
  const notation = args.join(' ').trim();
  if (!notation) {
    console.error('Usage: roll <notation> [--name NAME]');
    return 2;
  }
  const random = createRandomSource(config.rng.method, config.rng.seed);
  try {
    console.log(formatRollMessage(name, rollCompound(notation, { random, limits: config.dice })));
    return 0;
  } catch (e) {
    if (e instanceof DiceError) {
      console.error(e.message);
      return 1;
    }
    throw e;
  }
}

async function migrateCommand(config: RuntimeConfig): Promise<number> {
  const store = createQuestRepository(config.quests);
  try {
    if (!store.pool) {
      console.error('migrate needs quests.repo set to "pg"');
      return 2;
    }
    await migrate(store.pool, config.paths.schemaFile);
    console.log(`Applied ${config.paths.schemaFile}`);
    return 0;
  } finally {
    await store.close();
  }
}

async function listQuestsCommand(config: RuntimeConfig, args: string[]): Promise<number> {
  const [rawKind = 'active', rawLimit] = args;
  const kind = rawKind.toLowerCase();
  const limit = rawLimit === undefined ? config.quests.listDefault : Number(rawLimit);
  if (!isListKind(kind) || !Number.isInteger(limit) || limit < 1) {
    console.error(`Usage: list-quests [${QUEST_LIST_KINDS.join('|')}] [n]`);
    return 2;
  }
  const store = createQuestRepository(config.quests);
  try {
    console.log(formatQuestList(kind, await listQuests(store.repo, kind, limit)));
    return 0;
  } finally {
    await store.close();
  }
}

/**
 * Execute a CLI command.
 *
 * @param argv - Arguments after the script name (`process.argv.slice(2)`).
 * @returns Exit code: 0 success, 1 failure, 2 usage error.
 */
export async function runCLI(argv: string[]): Promise<number> {
  const args = [...argv];
  const cmd = args.shift();
  if (cmd === undefined || cmd === 'help' || cmd === '--help' || cmd === '-h') {
    printUsage();
    return 0;
  }

  let config: RuntimeConfig;
  try {
    config = await readConfig();
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(e.message);
      return 1;
    }
    throw e;
  }

  try {
    switch (cmd) {
      case 'roll':
        return await rollCommand(config, args);
      case 'migrate':
        return await migrateCommand(config);
      case 'list-quests':
        return await listQuestsCommand(config, args);
      case 'check-logs': {
        const report = await checkLogs(config.paths.logsDir, { retainDays: config.logging.retainDays });
        return report.dirExists && report.suspect.length === 0 ? 0 : 1;
      }
      case 'purge-logs': {
        const removed = await purgeOldLogs(config.paths.logsDir, config.logging.retainDays);
        console.log(`Purged ${removed} files`);
        return 0;
      }
      case 'start': {
        const bot = await import('./bot');
        await bot.start();
        return 0;
      }
      default:
        console.error('Unknown command:', cmd);
        printUsage();
        return 2;
    }
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(e.message);
      return 1;
    }
    throw e;
  }
}

/** Commands that keep the process alive after `runCLI` resolves. */
const LONG_RUNNING = new Set(['start']);

/**
 * Run the CLI for `process.argv` and exit with its code. Successful
 * long-running commands leave the process up.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  try {
    const code = await runCLI(argv);
    if (code !== 0 || !LONG_RUNNING.has(argv[0] ?? '')) process.exit(code);
  } catch (err) {
    console.error('CLI error:', err);
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
