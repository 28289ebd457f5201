import { createLogger, NAMESPACES } from '../logging.js';
import { InvalidStateTransition, MalformedScenario } from '../engine/errors.js';
import { countTokens } from '../utils/tokenCounter.js';
import type { Character } from '../types/Character.js';
import type { NamedEntity, ScenarioOption } from '../types/Scenario.js';
import type { Scene } from '../types/Scene.js';

const storyLog = createLogger(NAMESPACES.services.story);

export interface ParsedScenario {
  title?: string;
  setting: string;
  plot: string;
  mainQuest: string;
  npcs: NamedEntity[];
  locations: NamedEntity[];
}

const SCENE_TEXT_FIELDS = [
  'id', 'title', 'text', 'dmNotes', 'prompt', 'promptingCharacterIndex',
  'action', 'actingCharacterIndex', 'imageDescription'
] as const;

type SectionKey = 'setting' | 'plot' | 'mainQuest' | 'npcs' | 'locations';

// Checked in order; "Main Quest" must win over "Plot" and "NPCs" over "Locations"
const SECTION_PATTERNS: Array<[SectionKey, RegExp]> = [
  ['mainQuest', /quest|objective|goal/],
  ['npcs', /npc|non-player|characters|people|figures/],
  ['locations', /location|places|landmarks/],
  ['setting', /setting|world|backdrop/],
  ['plot', /plot|story|premise/]
];

function classifyHeading(heading: string): SectionKey | null {
  const lower = heading.toLowerCase();
  for (const [key, pattern] of SECTION_PATTERNS) {
    if (pattern.test(lower)) return key;
  }
  return null;
}

/**
 * "- **Elara, the Seer** – offers visions." -> { name: 'Elara, the Seer', description: 'offers visions.' }
 */
export function parseEntityLine(line: string): NamedEntity | null {
  const body = line.replace(/^\s*(?:[-*+]|\d+[.)])\s+/, '').trim();
  if (!body) return null;

  const bold = body.match(/^\*\*(.+?)\*\*\s*[:,–—-]?\s*(.*)$/);
  if (bold) {
    const name = bold[1].replace(/[:,]$/, '').trim();
    const description = bold[2].trim();
    if (!name) return null;
    return description ? { name, description } : { name };
  }

  const split = body.match(/^(.+?)\s+[–—-]\s+(.+)$/) ?? body.match(/^([^:]+):\s*(.+)$/);
  if (split) {
    return { name: split[1].trim(), description: split[2].trim() };
  }
  return { name: body };
}

/**
 * Split scenario DM notes (markdown with "## " sections) into story fields.
 * Text before the first recognised heading is ignored; a "# " line is the title.
 */
export function parseScenarioDetails(details: string): ParsedScenario {
  const sections: Record<SectionKey, string[]> = { setting: [], plot: [], mainQuest: [], npcs: [], locations: [] };
  let title: string | undefined;
  let current: SectionKey | null = null;

  for (const line of details.split(/\r?\n/)) {
    const h1 = line.match(/^#\s+(.+?)\s*$/);
    if (h1) {
      title ??= h1[1];
      current = null;
      continue;
    }
    const heading = line.match(/^#{2,6}\s+(.+?)\s*#*\s*$/);
    if (heading) {
      current = classifyHeading(heading[1]);
      continue;
    }
    if (current) sections[current].push(line);
  }

  const prose = (key: SectionKey) => sections[key].join('\n').trim();
  const entities = (key: SectionKey) => sections[key]
    .filter(line => /^\s*(?:[-*+]|\d+[.)])\s+/.test(line))
    .map(parseEntityLine)
    .filter((entity): entity is NamedEntity => entity !== null);

  return {
    title,
    setting: prose('setting'),
    plot: prose('plot'),
    mainQuest: prose('mainQuest'),
    npcs: entities('npcs'),
    locations: entities('locations')
  };
}

export interface RenderContextOptions {
  /** Token budget for the whole rendering; older scenes are dropped first. */
  maxTokens?: number;
}

/**
 * Everything later generation calls need to stay consistent with the story so far.
 * Scalar fields are written once; entity sets, party and scenes only grow.
 */
export class StoryState {
  private initialized = false;
  private _title = '';
  private _setting = '';
  private _plot = '';
  private _mainQuest = '';
  private _dmNotes = '';
  private readonly npcs = new Map<string, NamedEntity>();
  private readonly locations = new Map<string, NamedEntity>();
  private _party: readonly Character[] | null = null;
  private readonly _scenes: Scene[] = [];

  get isInitialized(): boolean { return this.initialized; }
  get title(): string { return this._title; }
  get setting(): string { return this._setting; }
  get plot(): string { return this._plot; }
  get mainQuest(): string { return this._mainQuest; }
  get dmNotes(): string { return this._dmNotes; }
  get party(): readonly Character[] { return this._party ?? []; }
  get hasParty(): boolean { return this._party !== null; }
  get scenes(): readonly Scene[] { return this._scenes; }
  get knownNpcs(): readonly NamedEntity[] { return [...this.npcs.values()]; }
  get knownLocations(): readonly NamedEntity[] { return [...this.locations.values()]; }

  lastScene(): Scene | undefined {
    return this._scenes[this._scenes.length - 1];
  }

  initialize(scenario: ScenarioOption): void {
    if (this.initialized) {
      throw new InvalidStateTransition('Story has already been initialized');
    }
    const parsed = parseScenarioDetails(scenario.details);
    const missing: string[] = [];
    if (!parsed.setting) missing.push('setting');
    if (!parsed.plot) missing.push('plot');
    if (!parsed.mainQuest) missing.push('main quest');
    if (missing.length > 0) {
      throw new MalformedScenario(missing);
    }

    this._title = scenario.title || parsed.title || 'Untitled Adventure';
    this._setting = parsed.setting;
    this._plot = parsed.plot;
    this._mainQuest = parsed.mainQuest;
    this._dmNotes = scenario.details;
    parsed.npcs.forEach(npc => this.addEntity(this.npcs, npc));
    parsed.locations.forEach(location => this.addEntity(this.locations, location));
    this.initialized = true;
    storyLog('[STORY] Initialized "%s" with %d NPCs and %d locations', this._title, this.npcs.size, this.locations.size);
  }

  addParty(characters: readonly Character[]): void {
    if (!this.initialized) {
      throw new InvalidStateTransition('Cannot add a party before the story is initialized');
    }
    if (this._party !== null) {
      throw new InvalidStateTransition('The party has already been assembled');
    }
    this._party = Object.freeze(characters.map(c => Object.freeze({ ...c, abilities: Object.freeze([...c.abilities]) })));
    storyLog('[STORY] Party assembled: %s', this._party.map(c => c.name).join(', '));
  }

  appendScene(scene: Scene): void {
    if (this._party === null) {
      throw new InvalidStateTransition('Scenes can only be added once the party is assembled');
    }
    const expectedId = this._scenes.length + 1;
    if (scene.id !== expectedId) {
      throw new InvalidStateTransition(`Scene ${scene.id} appended out of order; expected ${expectedId}`);
    }
    for (const field of SCENE_TEXT_FIELDS) {
      if (field in scene) {
        Object.defineProperty(scene, field, { writable: false, configurable: false });
      }
    }
    this._scenes.push(scene);
  }

  /** Returns the names that were new. Known names (case-insensitive) are left as they are. */
  introduceNpcs(names: readonly string[]): string[] {
    return names.filter(name => this.addEntity(this.npcs, { name }));
  }

  introduceLocations(names: readonly string[]): string[] {
    return names.filter(name => this.addEntity(this.locations, { name }));
  }

  private addEntity(target: Map<string, NamedEntity>, entity: NamedEntity): boolean {
    const name = entity.name.trim();
    const key = name.toLowerCase();
    if (!key || target.has(key)) return false;
    target.set(key, Object.freeze({ ...entity, name }));
    return true;
  }

  renderContext(options: RenderContextOptions = {}): string {
    const header = this.renderHeader();
    if (this._scenes.length === 0) return header;

    const blocks = this._scenes.map(scene => this.renderScene(scene));
    const budget = options.maxTokens !== undefined
      ? options.maxTokens - countTokens(header)
      : Number.POSITIVE_INFINITY;

    // Newest first; the latest scene is always kept
    const kept: string[] = [blocks[blocks.length - 1]];
    let used = countTokens(kept[0]);
    for (let i = blocks.length - 2; i >= 0; i--) {
      const cost = countTokens(blocks[i]);
      if (used + cost > budget) break;
      kept.unshift(blocks[i]);
      used += cost;
    }

    const omitted = blocks.length - kept.length;
    const history = ['## Scene History'];
    if (omitted > 0) {
      history.push(`(${omitted} earlier scene${omitted === 1 ? '' : 's'} omitted)`);
    }
    return [header, history.join('\n'), ...kept].join('\n\n');
  }

  private renderHeader(): string {
    const parts: string[] = [
      `# ${this._title}`,
      `## Setting\n${this._setting}`,
      `## Plot\n${this._plot}`,
      `## Main Quest\n${this._mainQuest}`
    ];
    const entityList = (entities: readonly NamedEntity[]) => entities
      .map(e => (e.description ? `- ${e.name}: ${e.description}` : `- ${e.name}`))
      .join('\n');
    if (this.npcs.size > 0) parts.push(`## Known NPCs\n${entityList(this.knownNpcs)}`);
    if (this.locations.size > 0) parts.push(`## Known Locations\n${entityList(this.knownLocations)}`);
    if (this._party && this._party.length > 0) {
      const roster = this._party.map(c =>
        `- ${c.name} (STR ${c.strength}, INT ${c.intelligence}, AGI ${c.agility}, HP ${c.currentHealth}/${c.maximumHealth}): ${c.description}` +
        (c.abilities.length > 0 ? ` Abilities: ${c.abilities.join(', ')}.` : '')
      );
      parts.push(`## Party\n${roster.join('\n')}`);
    }
    return parts.join('\n\n');
  }

  private renderScene(scene: Scene): string {
    const lines = [`### Scene ${scene.id}: ${scene.title}`];
    if (scene.action !== undefined) {
      const actor = scene.actingCharacterIndex !== undefined ? this.party[scene.actingCharacterIndex]?.name : undefined;
      lines.push(`${actor ?? 'The party'} acted: ${scene.action}`);
    }
    lines.push(scene.text);
    if (scene.dmNotes) lines.push(`DM notes: ${scene.dmNotes}`);
    if (scene.prompt) {
      lines.push(`Asked of ${scene.prompt.targetCharacter ?? 'the party'}: ${scene.prompt.text}`);
    }
    return lines.join('\n');
  }
}
