import { z } from "zod";

/**
 * Plugin settings as the host hands them over. List values are kept as the
 * comma-separated strings an administrator types into the settings screen,
 * and the flag may still be the raw text of the variable.
 */
export type PluginConfiguration = {
  version: number;
  enableWebUi: boolean | string;
  permittedUsers: string;
  allowedEmailDomains: string;
};

export type ValidatedConfiguration = {
  version: number;
  enableWebUi: boolean;
  permittedUsers: string[];
  allowedEmailDomains: string[];
};

export type ConfigurationCheck =
  | { ok: true; configuration: ValidatedConfiguration }
  | { ok: false; error: Error };

export interface ConfigurationProvider {
  current(): PluginConfiguration;
}

const USER_ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const EMAIL_DOMAIN_PATTERN = /^(?=.{1,253}$)([a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,63}$/i;

const BoolFromString = z
  .union([z.boolean(), z.string().trim().toLowerCase().pipe(z.enum(["true", "false", "1", "0"]))])
  .transform((value) => value === true || value === "true" || value === "1");

const csvList = (field: string, pattern: RegExp) =>
  z
    .string()
    .transform((value) =>
      value
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean)
    )
    .pipe(z.array(z.string().regex(pattern, { message: `${field} contains an invalid entry` })));

const ConfigurationSchema = z.object({
  version: z.number().int().min(0),
  enableWebUi: BoolFromString,
  permittedUsers: csvList("permittedUsers", USER_ID_PATTERN),
  allowedEmailDomains: csvList("allowedEmailDomains", EMAIL_DOMAIN_PATTERN),
});

export function validateConfiguration(configuration: PluginConfiguration): ConfigurationCheck {
  const parsed = ConfigurationSchema.safeParse(configuration);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    return { ok: false, error: new Error(`invalid plugin configuration: ${message}`) };
  }
  return { ok: true, configuration: parsed.data };
}

/**
 * Holds the live settings. Readers take a snapshot through `current()`;
 * `update()` swaps the whole object, so a request never sees a half-applied change.
 */
export class ConfigurationStore implements ConfigurationProvider {
  private configuration: PluginConfiguration;

  constructor(initial: Omit<PluginConfiguration, "version">) {
    this.configuration = Object.freeze({ ...initial, version: 1 });
  }

  current(): PluginConfiguration {
    return this.configuration;
  }

  update(next: Omit<PluginConfiguration, "version">): PluginConfiguration {
    this.configuration = Object.freeze({ ...next, version: this.configuration.version + 1 });
    return this.configuration;
  }
}

export type PluginSettingsSource = {
  SWITCHBOARD_ENABLE_WEB_UI?: string;
  SWITCHBOARD_PERMITTED_USERS?: string;
  SWITCHBOARD_ALLOWED_EMAIL_DOMAINS?: string;
};

/** Reads only the plugin variables, untouched; the gate judges them per request. */
export function configurationFromEnv(source: PluginSettingsSource): Omit<PluginConfiguration, "version"> {
  return {
    enableWebUi: source.SWITCHBOARD_ENABLE_WEB_UI?.trim() || "false",
    permittedUsers: source.SWITCHBOARD_PERMITTED_USERS ?? "",
    allowedEmailDomains: source.SWITCHBOARD_ALLOWED_EMAIL_DOMAINS ?? "",
  };
}
