import fs from 'node:fs';
import path from 'node:path';
import { config, safeLog } from './config.js';
import { StoredSettingsSchema, type StoredSettings } from './schemas.js';

export interface Credentials {
  email: string;
  token: string;
}

export interface SettingsOverrides {
  email?: string;
  token?: string;
  organizationId?: string;
}

/**
 * Login and default selections, kept as `config.json` in the settings
 * directory. Environment overrides win over stored values when reading.
 */
export class SettingsStore {
  readonly file: string;

  constructor(
    dir: string = config.FAVRO_CONFIG_DIR,
    private readonly overrides: SettingsOverrides = {
      email: config.FAVRO_EMAIL,
      token: config.FAVRO_TOKEN,
      organizationId: config.FAVRO_ORGANIZATION_ID,
    }
  ) {
    this.file = path.join(dir, 'config.json');
  }

  read(): StoredSettings {
    let raw: string;
    try {
      raw = fs.readFileSync(this.file, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return {};
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      safeLog.warn(`⚠️  Ignoring unreadable settings file ${this.file}: ${String(error)}`);
      return {};
    }

    const result = StoredSettingsSchema.safeParse(parsed);
    if (!result.success) {
      safeLog.warn(`⚠️  Ignoring invalid settings file ${this.file}`);
      return {};
    }
    return result.data;
  }

  private write(settings: StoredSettings): void {
    fs.mkdirSync(path.dirname(this.file), { recursive: true, mode: 0o700 });
    fs.writeFileSync(this.file, `${JSON.stringify(settings, null, 2)}\n`, { mode: 0o600 });
  }

  private update(patch: Partial<StoredSettings>): void {
    const next: StoredSettings = { ...this.read(), ...patch };
    // JSON drops undefined keys, so cleared values disappear from the file
    this.write(next);
  }

  getCredentials(): Credentials | null {
    const stored = this.read();
    const email = this.overrides.email ?? stored.email;
    const token = this.overrides.token ?? stored.token;
    return email && token ? { email, token } : null;
  }

  setCredentials(credentials: Credentials): void {
    this.update({ email: credentials.email, token: credentials.token });
  }

  /** Logging out also forgets the selected organization and board. */
  clearCredentials(): void {
    this.write({});
  }

  getOrganizationId(): string | undefined {
    return this.overrides.organizationId ?? this.read().organizationId;
  }

  /** A new organization invalidates the default board. */
  setOrganizationId(organizationId: string): void {
    this.update({ organizationId, boardId: undefined });
  }

  getBoardId(): string | undefined {
    return this.read().boardId;
  }

  setBoardId(boardId: string): void {
    this.update({ boardId });
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
