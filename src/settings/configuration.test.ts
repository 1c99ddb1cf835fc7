import test from "node:test";
import assert from "node:assert/strict";
import { readEnv } from "../config/env";
import { ConfigurationStore, configurationFromEnv, validateConfiguration } from "./configuration";

test("validateConfiguration splits and trims list settings", () => {
  const check = validateConfiguration({
    version: 3,
    enableWebUi: true,
    permittedUsers: " user1 , user_2,,",
    allowedEmailDomains: "example.com, Corp.Example.org",
  });
  assert.equal(check.ok, true);
  if (!check.ok) return;
  assert.deepEqual(check.configuration, {
    version: 3,
    enableWebUi: true,
    permittedUsers: ["user1", "user_2"],
    allowedEmailDomains: ["example.com", "Corp.Example.org"],
  });
});

test("validateConfiguration accepts blank lists", () => {
  const check = validateConfiguration({ version: 1, enableWebUi: false, permittedUsers: "", allowedEmailDomains: "  " });
  assert.equal(check.ok, true);
});

test("validateConfiguration rejects a user id with whitespace", () => {
  const check = validateConfiguration({
    version: 1,
    enableWebUi: true,
    permittedUsers: "user1,bad user",
    allowedEmailDomains: "",
  });
  assert.equal(check.ok, false);
  if (check.ok) return;
  assert.match(check.error.message, /permittedUsers/);
});

test("validateConfiguration rejects an email domain written as an address", () => {
  const check = validateConfiguration({
    version: 1,
    enableWebUi: true,
    permittedUsers: "",
    allowedEmailDomains: "someone@example.com",
  });
  assert.equal(check.ok, false);
  if (check.ok) return;
  assert.match(check.error.message, /allowedEmailDomains/);
});

test("ConfigurationStore bumps the version on every update", () => {
  const store = new ConfigurationStore({ enableWebUi: false, permittedUsers: "", allowedEmailDomains: "" });
  const first = store.current();
  assert.equal(first.version, 1);

  const next = store.update({ enableWebUi: true, permittedUsers: "user1", allowedEmailDomains: "" });
  assert.equal(next.version, 2);
  assert.equal(store.current(), next);
  assert.equal(first.enableWebUi, false);
  assert.equal(Object.isFrozen(next), true);
});

test("configurationFromEnv maps the plugin settings variables", () => {
  const env = readEnv({
    SWITCHBOARD_ENABLE_WEB_UI: "true",
    SWITCHBOARD_PERMITTED_USERS: "user1",
    SWITCHBOARD_ALLOWED_EMAIL_DOMAINS: "example.com",
  });
  assert.deepEqual(configurationFromEnv(env), {
    enableWebUi: "true",
    permittedUsers: "user1",
    allowedEmailDomains: "example.com",
  });
});

test("configurationFromEnv treats an unset or blank flag as off", () => {
  assert.deepEqual(configurationFromEnv({}), { enableWebUi: "false", permittedUsers: "", allowedEmailDomains: "" });
  assert.equal(configurationFromEnv({ SWITCHBOARD_ENABLE_WEB_UI: "  " }).enableWebUi, "false");
});

test("validateConfiguration parses the raw flag", () => {
  for (const [raw, expected] of [
    ["true", true],
    [" TRUE ", true],
    ["1", true],
    ["false", false],
    ["0", false],
  ] as const) {
    const check = validateConfiguration({ version: 1, enableWebUi: raw, permittedUsers: "", allowedEmailDomains: "" });
    assert.equal(check.ok, true, raw);
    if (!check.ok) return;
    assert.equal(check.configuration.enableWebUi, expected, raw);
  }
});

test("an unparseable flag reaches the store and fails validation", () => {
  const store = new ConfigurationStore(configurationFromEnv({ SWITCHBOARD_ENABLE_WEB_UI: "true" }));
  const next = store.update(configurationFromEnv(readEnv({ SWITCHBOARD_ENABLE_WEB_UI: "yes" })));
  assert.equal(next.version, 2);
  assert.equal(next.enableWebUi, "yes");

  const check = validateConfiguration(store.current());
  assert.equal(check.ok, false);
  if (check.ok) return;
  assert.match(check.error.message, /enableWebUi/);
});
