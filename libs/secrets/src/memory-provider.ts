import type { ISecretProvider } from "./interfaces";

/**
 * Process-local secrets. Values vanish on restart, so a credential key held
 * here makes stored credentials unreadable after the process exits.
 */
export class MemorySecretProvider implements ISecretProvider {
  private readonly values: Map<string, string>;

  constructor(initial: Record<string, string> = {}) {
    this.values = new Map(Object.entries(initial));
  }

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }
}
