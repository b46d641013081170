import type { ISecretProvider } from "./interfaces";

/**
 * Environment-based secret provider for development and single-host installs.
 * Reads from process.env unless another environment map is supplied.
 */
export class EnvSecretProvider implements ISecretProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async get(key: string): Promise<string | null> {
    const value = this.env[key];
    return value === undefined || value === "" ? null : value;
  }
}
