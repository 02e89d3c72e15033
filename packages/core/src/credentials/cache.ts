import type { Credential } from "./types.js";

/**
 * Run-scoped memo of credentials that were found or written during this run.
 *
 * Only positive results are kept; a name that was looked up and not found
 * has no entry.
 */
export class CredentialCache {
  private readonly entries = new Map<string, Credential>();

  get(name: string): Credential | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  set(credential: Credential): void {
    this.entries.set(credential.name, credential);
  }

  delete(name: string): boolean {
    return this.entries.delete(name);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
