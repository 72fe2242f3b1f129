/**
 * Credential profiles for the completion candidates.
 *
 * keys.json: { "profiles": [{ "label": "Account A", "keys": { "primary": "...", "secondary": "..." } }] }
 * settings.json: { "active_profile_index": 0 }
 *
 * Rotation is manual only (operator command); a quota error never switches profiles by itself.
 */

import * as fs from "fs";
import { ConfigError, toError } from "../../errors";
import { logger } from "../../logging";

export interface CredentialProfile {
  label: string;
  /** Candidate name -> API key. */
  keys: Record<string, string>;
}

export const ENV_DEFAULT_LABEL = "ENV_DEFAULT";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseProfile(raw: unknown, index: number): CredentialProfile {
  if (!isRecord(raw)) throw new ConfigError([`keys.json profile ${index + 1} must be an object`]);
  const label = typeof raw.label === "string" && raw.label.trim() ? raw.label.trim() : `Profile ${index + 1}`;
  const keys: Record<string, string> = {};
  if (isRecord(raw.keys)) {
    for (const [name, value] of Object.entries(raw.keys)) {
      if (typeof value === "string" && value.trim()) keys[name] = value.trim();
    }
  }
  return { label, keys };
}

/** Parse keys.json content. Throws ConfigError on a malformed document. */
export function parseProfiles(json: string): CredentialProfile[] {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw new ConfigError([`keys.json is not valid JSON: ${toError(err).message}`]);
  }
  if (!isRecord(data) || !Array.isArray(data.profiles)) {
    throw new ConfigError(["keys.json must contain a top-level 'profiles' list"]);
  }
  if (data.profiles.length === 0) throw new ConfigError(["keys.json contains no profiles"]);
  return data.profiles.map(parseProfile);
}

export interface ProfileStoreOptions {
  keysFile: string;
  settingsFile: string;
}

export class ProfileStore {
  private active: number;

  constructor(private readonly profiles: readonly CredentialProfile[], private readonly settingsFile?: string, activeIndex = 0) {
    if (profiles.length === 0) throw new ConfigError(["at least one credential profile is required"]);
    this.active = ((activeIndex % profiles.length) + profiles.length) % profiles.length;
  }

  /** Load profiles from disk; a missing keys file yields the single ENV_DEFAULT profile. */
  static load(opts: ProfileStoreOptions): ProfileStore {
    const profiles = fs.existsSync(opts.keysFile)
      ? parseProfiles(fs.readFileSync(opts.keysFile, "utf8"))
      : [{ label: ENV_DEFAULT_LABEL, keys: {} }];
    const store = new ProfileStore(profiles, opts.settingsFile, readActiveIndex(opts.settingsFile));
    logger.info({ event: "PROFILES_LOADED", count: profiles.length, active: store.activeLabel() }, "Credential profiles loaded");
    return store;
  }

  labels(): string[] {
    return this.profiles.map((p) => p.label);
  }

  get activeIndex(): number {
    return this.active;
  }

  activeLabel(): string {
    return this.profiles[this.active].label;
  }

  /** Key for a candidate in the active profile; undefined means "use the env fallback". */
  keyFor(candidate: string): string | undefined {
    return this.profiles[this.active].keys[candidate];
  }

  switchTo(index: number): string {
    this.active = ((index % this.profiles.length) + this.profiles.length) % this.profiles.length;
    this.persist();
    logger.info({ event: "PROFILE_SWITCH", index: this.active, label: this.activeLabel() }, "Credential profile switched");
    return this.activeLabel();
  }

  next(): string {
    return this.switchTo(this.active + 1);
  }

  private persist(): void {
    if (!this.settingsFile) return;
    try {
      fs.writeFileSync(this.settingsFile, JSON.stringify({ active_profile_index: this.active }, null, 2));
    } catch (err) {
      logger.warn({ event: "PROFILE_PERSIST_FAILED", err: toError(err).message }, "Could not save active profile");
    }
  }
}

function readActiveIndex(settingsFile: string): number {
  if (!fs.existsSync(settingsFile)) return 0;
  try {
    const data: unknown = JSON.parse(fs.readFileSync(settingsFile, "utf8"));
    if (isRecord(data)) {
      const idx = Number(data.active_profile_index);
      if (Number.isInteger(idx)) return idx;
    }
  } catch (err) {
    logger.warn({ event: "PROFILE_SETTINGS_INVALID", err: toError(err).message }, "Ignoring unreadable settings file");
  }
  return 0;
}
