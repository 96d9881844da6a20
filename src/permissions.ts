export const WILDCARD = '*';

/** Tool names a caller may invoke; "*" grants every tool. */
export class PermissionSet {
  private readonly entries: ReadonlySet<string>;

  constructor(permissions: Iterable<string> = []) {
    this.entries = new Set(Array.from(permissions, (item) => item.trim()).filter(Boolean));
  }

  allows(toolName: string): boolean {
    return this.entries.has(WILDCARD) || this.entries.has(toolName);
  }

  toArray(): string[] {
    return Array.from(this.entries);
  }

  get size(): number {
    return this.entries.size;
  }
}
