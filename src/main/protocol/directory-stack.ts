import { join as joinPath, sep } from "node:path";

export class DirectoryStack {
  private entries: string[];

  constructor(segments: readonly string[] = []) {
    this.entries = [...segments];
  }

  get depth(): number {
    return this.entries.length;
  }

  get segments(): readonly string[] {
    return [...this.entries];
  }

  push(name: string): void {
    this.entries.push(name);
  }

  // Never goes below empty.
  pop(): void {
    this.entries.pop();
  }

  replace(segments: readonly string[]): void {
    this.entries = [...segments];
  }

  current(): string {
    return joinPath(...this.entries);
  }

  /**
   * Number of path components in `current()`, counted the way source-side
   * depth comparisons need it: an empty stack has no depth at all.
   */
  pathDepth(): number {
    return this.entries.length === 0 ? 0 : countSegments(this.current());
  }
}

export function countSegments(pathValue: string): number {
  return pathValue.split(sep).length;
}
