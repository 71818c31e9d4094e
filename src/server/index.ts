// src/server/index.ts
import { getLanguageModel } from "@/lib/ai/provider";
import { createMemoryFillRepository, createSupabaseFillRepository } from "@/lib/db/store";
import { serverEnv } from "@/lib/env/server";
import { createFillService } from "@/lib/fill/fillService";
import { createMemoryBlobStore, createSupabaseBlobStore } from "@/lib/storage/blobStore";
import { supabaseAdmin } from "@/lib/supabase/admin";
import { createApp } from "@/server/app";

const env = serverEnv();

const persistence =
  env.STORE_DRIVER === "supabase"
    ? {
        repo: createSupabaseFillRepository(supabaseAdmin()),
        blobs: createSupabaseBlobStore(supabaseAdmin(), env.FILL_STORAGE_BUCKET),
      }
    : { repo: createMemoryFillRepository(), blobs: createMemoryBlobStore() };

const model = getLanguageModel();
if (!model) {
  console.warn("[FillService] OPENAI_API_KEY not set; running deterministic extraction and answer matching");
}

const app = createApp(createFillService({ ...persistence, model }));

app.listen(env.PORT, () => {
  console.log(`Template fill engine listening on :${env.PORT}`, {
    store: env.STORE_DRIVER,
    model: model ? env.OPENAI_MODEL : null,
  });
});
