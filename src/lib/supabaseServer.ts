import { createClient, type SupabaseClient } from "@supabase/supabase-js";

export type AwardTables = {
  awards: string;
  awardPeriods: string;
};

let serverClient: SupabaseClient | null = null;

function readEnv(name: string): string | null {
  const value = process.env[name];
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

// Service-role client, created on first use so imports and unit tests work
// without env vars.
export function supabaseServer(): SupabaseClient {
  if (serverClient) {
    return serverClient;
  }

  const url = readEnv("SUPABASE_URL");
  if (!url || !/^https?:\/\//i.test(url)) {
    throw new Error("SUPABASE_URL is required (check your env vars).");
  }
  const serviceKey = readEnv("SUPABASE_SERVICE_ROLE_KEY");
  if (!serviceKey) {
    throw new Error("SUPABASE_SERVICE_ROLE_KEY is required");
  }

  serverClient = createClient(url, serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return serverClient;
}

export function awardTables(): AwardTables {
  return {
    awards: readEnv("AWARDS_TABLE") ?? "awards",
    awardPeriods: readEnv("AWARD_PERIODS_TABLE") ?? "award_periods",
  };
}
