import type { UserInfo } from '../api/types.js';

/**
 * The account a session is logged in as, with its cached rights and groups.
 * The cache only changes through `update` or `invalidate`.
 */
export class Identity {
  private rights: Set<string> | null = null;
  private groups: Set<string> | null = null;
  private cachedEditCount: number | null = null;

  constructor(readonly name: string) {}

  /** Whether rights and groups have been fetched since the last invalidation */
  get loaded(): boolean {
    return this.rights !== null;
  }

  get editCount(): number | null {
    return this.cachedEditCount;
  }

  update(info: UserInfo): void {
    this.rights = new Set(info.rights);
    this.groups = new Set(info.groups);
    this.cachedEditCount = info.editCount;
  }

  invalidate(): void {
    this.rights = null;
    this.groups = null;
    this.cachedEditCount = null;
  }

  isAllowedTo(right: string): boolean {
    return this.rights?.has(right) ?? false;
  }

  isA(group: string): boolean {
    return this.groups?.has(group) ?? false;
  }

  get isAdmin(): boolean {
    return this.isA('sysop');
  }

  listGroups(): string[] {
    return [...(this.groups ?? [])];
  }
}
