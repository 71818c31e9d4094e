import test from "node:test";
import assert from "node:assert/strict";

import { parseServerEnv } from "../server";

test("parseServerEnv: defaults with an empty environment", () => {
  const env = parseServerEnv({});
  assert.equal(env.OPENAI_API_KEY, undefined);
  assert.equal(env.OPENAI_MODEL, "gpt-4o-mini");
  assert.equal(env.OPENAI_TEMPERATURE, 0.1);
  assert.equal(env.OPENAI_MAX_RETRIES, 2);
  assert.equal(env.MODEL_TIMEOUT_MS, 20_000);
  assert.equal(env.FILL_STORAGE_BUCKET, "fill-templates");
  assert.equal(env.STORE_DRIVER, "memory");
  assert.equal(env.PORT, 8080);
});

test("parseServerEnv: coerces numeric strings", () => {
  const env = parseServerEnv({ PORT: "3001", MODEL_TIMEOUT_MS: "5000", OPENAI_TEMPERATURE: "0" });
  assert.equal(env.PORT, 3001);
  assert.equal(env.MODEL_TIMEOUT_MS, 5000);
  assert.equal(env.OPENAI_TEMPERATURE, 0);
});

test("parseServerEnv: rejects invalid values", () => {
  const original = console.error;
  console.error = () => {};
  try {
    assert.throws(() => parseServerEnv({ STORE_DRIVER: "redis" }), /Invalid server environment/);
    assert.throws(() => parseServerEnv({ MODEL_TIMEOUT_MS: "-1" }), /Invalid server environment/);
  } finally {
    console.error = original;
  }
});

test("parseServerEnv: supabase driver requires credentials", () => {
  assert.throws(
    () => parseServerEnv({ STORE_DRIVER: "supabase" }),
    /STORE_DRIVER=supabase requires SUPABASE_URL/,
  );
  const env = parseServerEnv({
    STORE_DRIVER: "supabase",
    SUPABASE_URL: "http://localhost:54321",
    SUPABASE_SERVICE_ROLE_KEY: "test-secret",
  });
  assert.equal(env.STORE_DRIVER, "supabase");
});
