import OpenAI from "openai";

import { serverEnv } from "@/lib/env/server";

let _client: OpenAI | null = null;

/** Null when no API key is configured. */
export function getOpenAI(): OpenAI | null {
  if (_client) return _client;

  const apiKey = serverEnv().OPENAI_API_KEY;
  if (!apiKey) return null;

  // SDK retries disabled; withOpenAIResilience owns the retry loop.
  _client = new OpenAI({ apiKey, maxRetries: 0 });
  return _client;
}

export function getModel() {
  return serverEnv().OPENAI_MODEL;
}

export function getTemp() {
  return serverEnv().OPENAI_TEMPERATURE;
}

export function getTimeoutMs() {
  return serverEnv().MODEL_TIMEOUT_MS;
}

export function getMaxRetries() {
  return serverEnv().OPENAI_MAX_RETRIES;
}
