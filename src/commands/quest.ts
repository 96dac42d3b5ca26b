import { QuestError, QuestNotFoundError } from '../quests/errors';
import { formatQuest, formatQuestList, titleCase } from '../quests/format';
import { listQuests, type QuestRepository } from '../quests/repository';
import { QUEST_LIST_KINDS, type QuestChanges, type QuestListKind } from '../quests/types';
import { BaseCommand, type ChatGateway, type CommandContext } from './types';

/**
 * `!quest` command
 *
 * A small quest log on top of a `QuestRepository`. Sub-commands:
 * `new`, `edit`, `detail`, `complete`, `show`, `list`. Unknown ids and
 * invalid input get a one-line reply; storage failures propagate.
 *
 * @module commands/quest
 */

export const QUEST_USAGE =
  'Usage: `!quest new|edit|detail|complete|show|list ...` (see `!help quest`)';

const QUEST_HELP = `\`\`\`
command:
    !quest

description:
    Keeps track of the party's quests.

usage:
    !quest new [TITLE] | [DESCRIPTION] | [QUEST GIVER] | [LOCATION]
    !quest edit [ID] [title|description|giver|location] [VALUE]
    !quest detail [ID] [MORE DETAIL]
    !quest complete [ID]
    !quest show [ID or TITLE]
    !quest list [active|newest|updated|inactive|all] [HOW MANY]

examples:
    !quest new Rescue the miller | Bandits took him | Greta | Oakvale
    !quest detail 1 The bandits camp by the river
    !quest list newest 3
\`\`\``;

const EDIT_FIELDS = new Map<string, keyof QuestChanges>([
  ['title', 'title'],
  ['description', 'description'],
  ['giver', 'questGiver'],
  ['location', 'locationGiven'],
]);

export interface QuestCommandOptions {
  /** How many rows `list` shows when no count is given. */
  listDefault: number;
}

function parseId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

function isListKind(value: string): value is QuestListKind {
  return QUEST_LIST_KINDS.some(k => k === value);
}

/** First whitespace-separated word and the untouched remainder. */
function splitWord(text: string): [string, string] {
  const trimmed = text.trim();
  const m = /^(\S+)\s*([\s\S]*)$/.exec(trimmed);
  return m ? [m[1], m[2]] : ['', ''];
}

export class QuestCommand extends BaseCommand {
  readonly name = 'quest';
  readonly helpText = QUEST_HELP;

  constructor(
    gateway: ChatGateway,
    private readonly repo: QuestRepository,
    private readonly options: QuestCommandOptions,
  ) {
    super(gateway);
  }

  async run(context: CommandContext, args: string): Promise<void> {
    const [sub, rest] = splitWord(args);
    let reply: string;
    try {
      reply = await this.execute(sub.toLowerCase(), rest);
    } catch (e) {
      if (e instanceof QuestError) {
        await this.gateway.postMessage(context, e.message);
        return;
      }
      throw e;
    }
    await this.gateway.postMessage(context, reply);
  }

  private async execute(sub: string, rest: string): Promise<string> {
    switch (sub) {
      case 'new':
        return this.create(rest);
      case 'edit':
        return this.edit(rest);
      case 'detail':
        return this.detail(rest);
      case 'complete':
        return this.complete(rest);
      case 'show':
        return this.show(rest);
      case 'list':
        return this.list(rest);
      default:
        return QUEST_USAGE;
    }
  }

  private async create(rest: string): Promise<string> {
    const [title = '', description, questGiver, locationGiven] = rest.split('|');
    const quest = await this.repo.create({ title, description, questGiver, locationGiven });
    return `Created quest #${quest.id}: *${titleCase(quest.title)}*`;
  }

  private async edit(rest: string): Promise<string> {
    const [rawId, afterId] = splitWord(rest);
    const [rawField, value] = splitWord(afterId);
    const id = parseId(rawId);
    const field = EDIT_FIELDS.get(rawField.toLowerCase());
    if (id === null || !field || !value.trim()) {
      return 'Usage: `!quest edit [ID] [title|description|giver|location] [VALUE]`';
    }
    const changes: QuestChanges = {};
    changes[field] = value;
    const quest = await this.repo.modify(id, changes);
    return `Updated quest #${quest.id}: *${titleCase(quest.title)}*`;
  }

  private async detail(rest: string): Promise<string> {
    const [rawId, text] = splitWord(rest);
    const id = parseId(rawId);
    if (id === null || !text.trim()) return 'Usage: `!quest detail [ID] [MORE DETAIL]`';
    const quest = await this.repo.addDetail(id, text);
    return `Added a detail to quest #${quest.id}: *${titleCase(quest.title)}*`;
  }

  private async complete(rest: string): Promise<string> {
    const id = parseId(rest.trim());
    if (id === null) return 'Usage: `!quest complete [ID]`';
    const quest = await this.repo.complete(id);
    return `Completed quest #${quest.id}: *${titleCase(quest.title)}*`;
  }

  private async show(rest: string): Promise<string> {
    const ref = rest.trim();
    if (!ref) return 'Usage: `!quest show [ID or TITLE]`';
    const id = parseId(ref);
    const quest = id === null ? await this.repo.getByTitle(ref) : await this.repo.getById(id);
    if (!quest) throw new QuestNotFoundError(id ?? ref);
    return formatQuest(quest);
  }

  private async list(rest: string): Promise<string> {
    const words = rest.trim().split(/\s+/).filter(Boolean);
    let kind: QuestListKind = 'active';
    const first = words[0]?.toLowerCase();
    if (first && isListKind(first)) {
      kind = first;
      words.shift();
    }
    let limit = this.options.listDefault;
    if (words[0] !== undefined) {
      const n = parseId(words[0]);
      if (n === null) return 'Usage: `!quest list [active|newest|updated|inactive|all] [HOW MANY]`';
      limit = n;
    }
    return formatQuestList(kind, await listQuests(this.repo, kind, limit));
  }
}
