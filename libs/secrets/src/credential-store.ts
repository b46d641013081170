import type { Database } from "@fleet-link/database";
import {
  BrokerConfigSchema,
  EncryptedSecretSchema,
  type BrokerConfig,
  type BrokerConfigInput
} from "@fleet-link/schemas";
import { z } from "zod";
import { decryptSecret, encryptSecret } from "./cipher";
import { ConfigError } from "./errors";

export const CREDENTIAL_SCHEMA = `
CREATE TABLE IF NOT EXISTS credential_records (
  config_key TEXT PRIMARY KEY,
  config_json TEXT NOT NULL,
  algorithm TEXT NOT NULL,
  nonce TEXT NOT NULL,
  auth_tag TEXT NOT NULL,
  ciphertext TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
`;

interface CredentialRow {
  config_json: string;
  algorithm: string;
  nonce: string;
  auth_tag: string;
  ciphertext: string;
}

const SecretFieldsSchema = z.object({ password: z.string() });

export interface CredentialStoreOptions {
  db: Database;
  key: Buffer;
  /** Row key; also bound into the ciphertext as additional authenticated data. */
  recordKey?: string;
  now?: () => Date;
}

/**
 * Broker settings at rest. Non-secret fields are stored as JSON, the
 * password as an AES-256-GCM blob; `get` yields a complete config or throws.
 */
export class CredentialStore {
  private readonly db: Database;
  private readonly key: Buffer;
  private readonly recordKey: string;
  private readonly now: () => Date;

  private constructor(options: CredentialStoreOptions) {
    this.db = options.db;
    this.key = options.key;
    this.recordKey = options.recordKey ?? "broker";
    this.now = options.now ?? (() => new Date());
  }

  static async open(options: CredentialStoreOptions): Promise<CredentialStore> {
    await options.db.execRaw(CREDENTIAL_SCHEMA);
    return new CredentialStore(options);
  }

  async put(input: BrokerConfigInput): Promise<BrokerConfig> {
    const parsed = BrokerConfigSchema.safeParse(input);
    if (!parsed.success) {
      throw new ConfigError(`Invalid broker config: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }
    const { password, ...publicFields } = parsed.data;
    const sealed = encryptSecret(this.key, JSON.stringify({ password }), this.recordKey);

    await this.db.exec(
      `INSERT INTO credential_records (config_key, config_json, algorithm, nonce, auth_tag, ciphertext, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(config_key) DO UPDATE SET
         config_json = excluded.config_json,
         algorithm = excluded.algorithm,
         nonce = excluded.nonce,
         auth_tag = excluded.auth_tag,
         ciphertext = excluded.ciphertext,
         updated_at = excluded.updated_at`,
      [
        this.recordKey,
        JSON.stringify(publicFields),
        sealed.algorithm,
        sealed.nonce,
        sealed.authTag,
        sealed.ciphertext,
        this.now().toISOString()
      ]
    );
    return parsed.data;
  }

  async get(): Promise<BrokerConfig | null> {
    const result = await this.db.query<CredentialRow>(
      "SELECT config_json, algorithm, nonce, auth_tag, ciphertext FROM credential_records WHERE config_key = ?",
      [this.recordKey]
    );
    const row = result.rows[0];
    if (!row) return null;

    const sealed = EncryptedSecretSchema.safeParse({
      algorithm: row.algorithm,
      nonce: row.nonce,
      authTag: row.auth_tag,
      ciphertext: row.ciphertext
    });
    if (!sealed.success) {
      throw new ConfigError("Stored credential record is malformed");
    }

    const secretFields = SecretFieldsSchema.safeParse(
      parseJson(decryptSecret(this.key, sealed.data, this.recordKey))
    );
    if (!secretFields.success) {
      throw new ConfigError("Stored credential secret is malformed");
    }

    const publicFields = parseJson(row.config_json);
    if (typeof publicFields !== "object" || publicFields === null) {
      throw new ConfigError("Stored broker config is malformed");
    }
    const config = BrokerConfigSchema.safeParse({ ...publicFields, ...secretFields.data });
    if (!config.success) {
      throw new ConfigError("Stored broker config failed validation");
    }
    return config.data;
  }

  async clear(): Promise<void> {
    await this.db.exec("DELETE FROM credential_records WHERE config_key = ?", [this.recordKey]);
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigError("Stored credential record is not valid JSON", { cause: err });
  }
}
