/**
 * MediaWiki namespace definitions and the per-session namespace table
 *
 * MediaWiki uses numeric namespace IDs to organize content. Names vary by
 * site and language, so the authoritative mapping comes from the site's
 * `siteinfo` and is cached on the session as a NamespaceTable.
 */

/** Standard MediaWiki namespace IDs */
export enum Namespace {
  Media = -2,
  Special = -1,
  Main = 0,
  Talk = 1,
  User = 2,
  UserTalk = 3,
  Project = 4,
  ProjectTalk = 5,
  File = 6,
  FileTalk = 7,
  MediaWiki = 8,
  MediaWikiTalk = 9,
  Template = 10,
  TemplateTalk = 11,
  Help = 12,
  HelpTalk = 13,
  Category = 14,
  CategoryTalk = 15,
}

/** Canonical namespace names (empty string for Main namespace) */
export const CANONICAL_NAMESPACES: Record<number, string> = {
  [Namespace.Media]: 'Media',
  [Namespace.Special]: 'Special',
  [Namespace.Main]: '',
  [Namespace.Talk]: 'Talk',
  [Namespace.User]: 'User',
  [Namespace.UserTalk]: 'User talk',
  [Namespace.Project]: 'Project',
  [Namespace.ProjectTalk]: 'Project talk',
  [Namespace.File]: 'File',
  [Namespace.FileTalk]: 'File talk',
  [Namespace.MediaWiki]: 'MediaWiki',
  [Namespace.MediaWikiTalk]: 'MediaWiki talk',
  [Namespace.Template]: 'Template',
  [Namespace.TemplateTalk]: 'Template talk',
  [Namespace.Help]: 'Help',
  [Namespace.HelpTalk]: 'Help talk',
  [Namespace.Category]: 'Category',
  [Namespace.CategoryTalk]: 'Category talk',
};

/**
 * Normalize a title the way the server does for comparisons:
 * underscores become spaces, surrounding whitespace is dropped.
 */
export function normalizeTitle(title: string): string {
  return title.replace(/_/g, ' ').trim();
}

/**
 * Bidirectional namespace name/ID mapping for one site.
 * Name lookups are case-insensitive and accept aliases.
 */
export class NamespaceTable {
  private readonly byId = new Map<number, string>();
  private readonly byName = new Map<string, number>();

  constructor(entries: Iterable<readonly [number, string]>, aliases: Iterable<readonly [string, number]> = []) {
    for (const [id, name] of entries) {
      this.byId.set(id, name);
      if (name) this.byName.set(name.toLowerCase(), id);
    }
    for (const [alias, id] of aliases) {
      if (alias) this.byName.set(normalizeTitle(alias).toLowerCase(), id);
    }
  }

  /** Table holding only the canonical names */
  static defaults(): NamespaceTable {
    return NamespaceTable.fromRecord(
      Object.fromEntries(
        Object.entries(CANONICAL_NAMESPACES).map(([id, name]) => [name, Number(id)])
      )
    );
  }

  /** Restore from a name → ID record (as kept in a session snapshot) */
  static fromRecord(record: Record<string, number>): NamespaceTable {
    const entries: Array<[number, string]> = [];
    const aliases: Array<[string, number]> = [];
    for (const [name, id] of Object.entries(record)) {
      // first name seen for an ID is its display name; later ones are aliases
      if (entries.some(([known]) => known === id)) {
        aliases.push([name, id]);
      } else {
        entries.push([id, name]);
      }
    }
    return new NamespaceTable(entries, aliases);
  }

  toRecord(): Record<string, number> {
    const record: Record<string, number> = {};
    for (const [id, name] of this.byId) record[name] = id;
    for (const [name, id] of this.byName) {
      if (!(name in record) && this.byId.get(id)?.toLowerCase() !== name) record[name] = id;
    }
    return record;
  }

  /** Namespace ID of a title; titles without a known prefix are in Main */
  namespaceOf(title: string): number {
    const normalized = normalizeTitle(title);
    const colon = normalized.indexOf(':');
    if (colon <= 0) return Namespace.Main;
    const id = this.byName.get(normalized.slice(0, colon).trim().toLowerCase());
    return id ?? Namespace.Main;
  }

  /** Local name of a namespace ID (empty for Main) */
  nameOf(id: number): string | undefined {
    return this.byId.get(id);
  }

  /** Title with its namespace prefix removed */
  stripNamespace(title: string): string {
    const normalized = normalizeTitle(title);
    if (this.namespaceOf(normalized) === Namespace.Main) return normalized;
    return normalized.slice(normalized.indexOf(':') + 1).trim();
  }

  /** Full title of a page name placed in a namespace */
  inNamespace(id: number, name: string): string {
    const prefix = this.byId.get(id);
    return prefix ? `${prefix}:${name}` : name;
  }

  get size(): number {
    return this.byId.size;
  }
}

/** True for talk namespaces (odd, non-negative IDs) */
export function isTalkNamespace(id: number): boolean {
  return id >= 0 && id % 2 === 1;
}
